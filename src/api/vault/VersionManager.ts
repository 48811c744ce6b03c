import type {
  EncryptedBlob,
  KdfParams,
  PersistedEntry,
  PersistedVault,
  VaultContext,
  VaultHeaderV1
} from "../../types";
import { VAULT_CONSTANTS } from "../../constants";
import { CorruptDataError } from "../../errors";
import { base64ToBytes } from "../../utils/base64";
import { isRecord } from "../../utils/json";
import { checkKdfParams, isKdfAlgorithm } from "../../crypto/KeyDerivation";

const SUPPORTED_VERSIONS: readonly number[] = VAULT_CONSTANTS.SUPPORTED_VERSIONS;

function corrupt(message: string): CorruptDataError {
  return new CorruptDataError(message);
}

function readBase64(b64: unknown, where: string): { text: string; length: number } {
  if (typeof b64 !== "string") throw corrupt(`Invalid ${where}`);
  try {
    return { text: b64, length: base64ToBytes(b64).byteLength };
  } catch (e) {
    throw new CorruptDataError(`Invalid base64 in ${where}`, { cause: e });
  }
}

/**
 * Knows the persisted layout: which versions are readable, how a raw parsed
 * document is validated, and how AAD binds ciphertext to its context.
 */
export class VersionManager {
  public isSupported(v: unknown): boolean {
    return typeof v === "number" && SUPPORTED_VERSIONS.includes(v);
  }

  /**
   * Validates a parsed document and returns a freshly built, canonically
   * ordered vault.
   *
   * @throws {CorruptDataError} on any structural problem.
   */
  public validate(raw: unknown, expectedCtx?: VaultContext): PersistedVault {
    if (!isRecord(raw) || !isRecord(raw.header) || !Array.isArray(raw.entries)) {
      throw corrupt("Invalid vault structure");
    }
    const h = raw.header;

    if (h.format !== VAULT_CONSTANTS.FORMAT_TAG) throw corrupt("Unrecognized format tag");
    if (!this.isSupported(h.v)) throw corrupt(`Unsupported format version ${String(h.v)}`);

    if (typeof h.name !== "string" || h.name.length === 0) throw corrupt("Invalid header.name");
    if (typeof h.createdAt !== "string" || Number.isNaN(Date.parse(h.createdAt))) {
      throw corrupt("Invalid header.createdAt");
    }
    if (h.ctx !== "store" && h.ctx !== "export") throw corrupt("Invalid header.ctx");
    if (expectedCtx && h.ctx !== expectedCtx) {
      throw corrupt(`Expected a "${expectedCtx}" vault but found "${h.ctx}"`);
    }

    const salt = readBase64(h.salt, "header.salt");
    if (salt.length < VAULT_CONSTANTS.SALT_LEN) {
      throw corrupt(`header.salt must be at least ${VAULT_CONSTANTS.SALT_LEN} bytes`);
    }
    const kdf = this.parseKdf(h.kdf);
    const canary = h.canary === null ? null : this.parseBlob(h.canary, "header.canary");

    const seen = new Set<string>();
    const entries: PersistedEntry[] = raw.entries.map((e, i) => {
      if (!isRecord(e) || typeof e.key !== "string" || e.key.length === 0) {
        throw corrupt(`Invalid entries[${i}].key`);
      }
      if (seen.has(e.key)) throw corrupt(`Duplicate entry key "${e.key}"`);
      seen.add(e.key);
      return { key: e.key, ...this.parseBlob(e, `entries[${i}]`) };
    });

    if (entries.length > 0 && canary === null) {
      throw corrupt("Entries present without a password canary");
    }

    return this.build(
      {
        format: VAULT_CONSTANTS.FORMAT_TAG,
        v: VAULT_CONSTANTS.CURRENT_FORMAT_VERSION,
        name: h.name,
        createdAt: h.createdAt,
        salt: salt.text,
        kdf,
        canary,
        ctx: h.ctx
      },
      entries
    );
  }

  /** Rebuilds a vault with a fixed key order so encoding is stable. */
  public build(header: VaultHeaderV1, entries: readonly PersistedEntry[]): PersistedVault {
    return {
      header: {
        format: header.format,
        v: header.v,
        name: header.name,
        createdAt: header.createdAt,
        salt: header.salt,
        kdf: { ...header.kdf },
        canary: header.canary ? { iv: header.canary.iv, ciphertext: header.canary.ciphertext } : null,
        ctx: header.ctx
      },
      entries: entries.map((e) => ({ key: e.key, iv: e.iv, ciphertext: e.ciphertext }))
    };
  }

  public buildEntryAad(ctx: VaultContext, version: number, salt: string, key: string): Uint8Array {
    return new TextEncoder().encode(`mv|entry|v${version}|${ctx}|${salt}|${key}`);
  }

  public buildCanaryAad(ctx: VaultContext, version: number, salt: string): Uint8Array {
    return new TextEncoder().encode(`mv|canary|v${version}|${ctx}|${salt}`);
  }

  public entryAadFor(header: VaultHeaderV1, key: string): Uint8Array {
    return this.buildEntryAad(header.ctx, header.v, header.salt, key);
  }

  public canaryAadFor(header: VaultHeaderV1): Uint8Array {
    return this.buildCanaryAad(header.ctx, header.v, header.salt);
  }

  private parseBlob(v: unknown, where: string): EncryptedBlob {
    if (!isRecord(v)) throw corrupt(`Invalid ${where}`);
    const iv = readBase64(v.iv, `${where}.iv`);
    if (iv.length !== VAULT_CONSTANTS.AES.IV_LENGTH) {
      throw corrupt(`${where}.iv must be ${VAULT_CONSTANTS.AES.IV_LENGTH} bytes`);
    }
    const ct = readBase64(v.ciphertext, `${where}.ciphertext`);
    if (ct.length < VAULT_CONSTANTS.AES.TAG_LENGTH) {
      throw corrupt(`${where}.ciphertext is shorter than the authentication tag`);
    }
    return { iv: iv.text, ciphertext: ct.text };
  }

  private parseKdf(v: unknown): KdfParams {
    if (!isRecord(v) || !isKdfAlgorithm(v.algorithm)) throw corrupt("Invalid header.kdf");
    const num = (n: unknown) => (typeof n === "number" ? n : Number.NaN);

    const kdf: KdfParams =
      v.algorithm === "pbkdf2-sha256"
        ? { algorithm: v.algorithm, rounds: num(v.rounds) }
        : {
            algorithm: v.algorithm,
            rounds: num(v.rounds),
            memoryKib: num(v.memoryKib),
            parallelism: num(v.parallelism)
          };

    const problem = checkKdfParams(kdf);
    if (problem) throw corrupt(`Invalid header.kdf: ${problem}`);
    return kdf;
  }
}
