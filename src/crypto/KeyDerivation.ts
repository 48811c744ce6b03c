import { pbkdf2 } from "node:crypto";
import { promisify } from "node:util";
import * as argon2 from "argon2";
import { VAULT_CONSTANTS } from "../constants";
import { CryptoError, ValidationError, errorMessage } from "../errors";
import type { KdfAlgorithm, KdfParams } from "../types";

const pbkdf2Async = promisify(pbkdf2);

const KDF_ALGORITHMS: readonly string[] = ["argon2id", "pbkdf2-sha256"] satisfies KdfAlgorithm[];

export function isKdfAlgorithm(v: unknown): v is KdfAlgorithm {
  return typeof v === "string" && KDF_ALGORITHMS.includes(v);
}

/** Fill in defaults for whatever the caller left out. */
export function resolveKdfParams(partial?: Partial<KdfParams>): KdfParams {
  const algorithm = partial?.algorithm ?? "argon2id";
  if (algorithm === "pbkdf2-sha256") {
    return { algorithm, rounds: partial?.rounds ?? VAULT_CONSTANTS.PBKDF2.ITERATIONS };
  }
  return {
    algorithm,
    rounds: partial?.rounds ?? VAULT_CONSTANTS.ARGON2.ITERATIONS,
    memoryKib: partial?.memoryKib ?? VAULT_CONSTANTS.ARGON2.MEMORY_KIB,
    parallelism: partial?.parallelism ?? VAULT_CONSTANTS.ARGON2.PARALLELISM
  };
}

function inRange(n: unknown, min: number, max: number): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= min && n <= max;
}

/** Returns a message describing what is wrong with `params`, or null when valid. */
export function checkKdfParams(params: KdfParams): string | null {
  if (!isKdfAlgorithm(params.algorithm)) {
    return `Unsupported KDF algorithm ${String(params.algorithm)}`;
  }
  if (params.algorithm === "pbkdf2-sha256") {
    const { MIN_ITERATIONS, MAX_ITERATIONS } = VAULT_CONSTANTS.PBKDF2;
    if (!inRange(params.rounds, MIN_ITERATIONS, MAX_ITERATIONS)) {
      return `pbkdf2 rounds must be an integer in [${MIN_ITERATIONS}, ${MAX_ITERATIONS}]`;
    }
    return null;
  }

  const a = VAULT_CONSTANTS.ARGON2;
  if (!inRange(params.rounds, 1, a.MAX_ITERATIONS)) {
    return `argon2id rounds must be an integer in [1, ${a.MAX_ITERATIONS}]`;
  }
  if (!inRange(params.memoryKib, a.MIN_MEMORY_KIB, a.MAX_MEMORY_KIB)) {
    return `argon2id memoryKib must be an integer in [${a.MIN_MEMORY_KIB}, ${a.MAX_MEMORY_KIB}]`;
  }
  if (!inRange(params.parallelism, 1, a.MAX_PARALLELISM)) {
    return `argon2id parallelism must be an integer in [1, ${a.MAX_PARALLELISM}]`;
  }
  return null;
}

/**
 * Derives the 256-bit storage key from a password and the storage salt.
 *
 * Deterministic: the same password, salt and params always produce the same
 * key. A wrong password is not detected here; it surfaces later when the
 * canary fails to authenticate.
 */
export async function deriveKeyFromPassword(
  password: string,
  salt: Uint8Array,
  params: KdfParams
): Promise<Buffer> {
  if (typeof password !== "string" || password.length === 0) {
    throw new ValidationError("Password must be a non-empty string");
  }

  if (!(salt instanceof Uint8Array) || salt.byteLength < VAULT_CONSTANTS.SALT_LEN) {
    throw new ValidationError(`Salt must be a Uint8Array of at least ${VAULT_CONSTANTS.SALT_LEN} bytes`);
  }

  const problem = checkKdfParams(params);
  if (problem) throw new ValidationError(problem);

  const keyLen = VAULT_CONSTANTS.AES.KEY_LENGTH;
  let key: Buffer;
  try {
    if (params.algorithm === "pbkdf2-sha256") {
      key = await pbkdf2Async(password, salt, params.rounds, keyLen, VAULT_CONSTANTS.PBKDF2.DIGEST);
    } else {
      const raw = await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: params.rounds,
        memoryCost: params.memoryKib,
        parallelism: params.parallelism,
        hashLength: keyLen,
        salt: Buffer.from(salt),
        raw: true
      });
      key = Buffer.from(raw);
    }
  } catch (e) {
    throw new CryptoError(`${params.algorithm} derivation failed: ${errorMessage(e)}`, { cause: e });
  }

  if (key.byteLength !== keyLen) {
    key.fill(0);
    throw new CryptoError(`${params.algorithm} returned invalid key size (expected ${keyLen} bytes)`);
  }
  return key;
}
