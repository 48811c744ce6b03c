import { argon2Mock } from "../setup";
import { pbkdf2Sync } from "node:crypto";
import {
  checkKdfParams,
  deriveKeyFromPassword,
  resolveKdfParams
} from "../../src/crypto/KeyDerivation";
import { CryptoError, ValidationError } from "../../src/errors";
import type { KdfParams } from "../../src/types";

const salt = Buffer.alloc(16, 7);
const argon: KdfParams = { algorithm: "argon2id", rounds: 3, memoryKib: 65536, parallelism: 4 };
const pbkdf2: KdfParams = { algorithm: "pbkdf2-sha256", rounds: 1000 };

describe("resolveKdfParams", () => {
  it("defaults to argon2id", () => {
    expect(resolveKdfParams()).toEqual(argon);
  });

  it("fills pbkdf2 defaults without argon2 fields", () => {
    expect(resolveKdfParams({ algorithm: "pbkdf2-sha256" })).toEqual({
      algorithm: "pbkdf2-sha256",
      rounds: 480_000
    });
  });

  it("keeps caller overrides", () => {
    expect(resolveKdfParams({ rounds: 5 })).toEqual({ ...argon, rounds: 5 });
  });
});

describe("checkKdfParams", () => {
  it("accepts the defaults", () => {
    expect(checkKdfParams(resolveKdfParams())).toBeNull();
    expect(checkKdfParams(pbkdf2)).toBeNull();
  });

  it("describes out-of-range values", () => {
    expect(checkKdfParams({ algorithm: "pbkdf2-sha256", rounds: 999 })).toBe(
      "pbkdf2 rounds must be an integer in [1000, 10000000]"
    );
    expect(checkKdfParams({ ...argon, memoryKib: 1024 })).toBe(
      "argon2id memoryKib must be an integer in [8192, 1048576]"
    );
    expect(checkKdfParams({ ...argon, rounds: 1.5 })).toBe("argon2id rounds must be an integer in [1, 64]");
    expect(checkKdfParams({ ...argon, parallelism: 0 })).toBe(
      "argon2id parallelism must be an integer in [1, 16]"
    );
  });
});

describe("deriveKeyFromPassword", () => {
  it("derives a deterministic 32-byte key with argon2id", async () => {
    const a = await deriveKeyFromPassword("pw", salt, argon);
    const b = await deriveKeyFromPassword("pw", salt, argon);

    expect(a).toHaveLength(32);
    expect(a.equals(b)).toBe(true);
    expect(argon2Mock.hash).toHaveBeenCalledWith(
      "pw",
      expect.objectContaining({
        type: 2,
        timeCost: 3,
        memoryCost: 65536,
        parallelism: 4,
        hashLength: 32,
        raw: true
      })
    );
  });

  it("gives different keys for different passwords or salts", async () => {
    const base = await deriveKeyFromPassword("pw", salt, argon);
    const otherPw = await deriveKeyFromPassword("pw2", salt, argon);
    const otherSalt = await deriveKeyFromPassword("pw", Buffer.alloc(16, 8), argon);

    expect(base.equals(otherPw)).toBe(false);
    expect(base.equals(otherSalt)).toBe(false);
  });

  it("matches PBKDF2-HMAC-SHA256 for the pbkdf2 algorithm", async () => {
    const key = await deriveKeyFromPassword("pw", salt, pbkdf2);
    expect(key.equals(pbkdf2Sync("pw", salt, 1000, 32, "sha256"))).toBe(true);
  });

  it("validates its inputs", async () => {
    await expect(deriveKeyFromPassword("", salt, argon)).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveKeyFromPassword("pw", new Uint8Array(8), argon)).rejects.toBeInstanceOf(ValidationError);
    await expect(deriveKeyFromPassword("pw", salt, { ...argon, rounds: 0 })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("wraps argon2 failures as CryptoError", async () => {
    argon2Mock.hash.mockRejectedValueOnce(new Error("boom"));
    const error = await deriveKeyFromPassword("pw", salt, argon).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CryptoError);
    expect(error).toHaveProperty("message", "argon2id derivation failed: boom");
  });

  it("rejects a key of the wrong size", async () => {
    argon2Mock.hash.mockResolvedValueOnce(Buffer.alloc(16));
    await expect(deriveKeyFromPassword("pw", salt, argon)).rejects.toBeInstanceOf(CryptoError);
  });
});
