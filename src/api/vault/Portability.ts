import { VAULT_CONSTANTS } from "../../constants";
import { AuthenticationError, CorruptDataError, ValidationError } from "../../errors";
import type { KdfParams, PersistedEntry, PersistedVault, VaultHeaderV1 } from "../../types";
import { EncryptionManager } from "../../crypto/EncryptionManager";
import { VersionManager } from "./VersionManager";
import { decodeVault, encodeVault } from "./VaultCodec";

/** Key material a bundle is sealed under. */
export type BundleKeySpec = {
  key: Buffer;
  salt: string; // base64, embedded in the bundle header
  kdf: KdfParams;
};

/** Where an entry currently lives: the key that opens it and the header its AAD comes from. */
export type EntrySource = {
  key: Buffer;
  header: VaultHeaderV1;
};

const MAX_BUNDLE_CHARS = 64 * 1024 * 1024;

export const Portability = {
  /**
   * Moves one entry from `from` to `to`: authenticate under the old AAD,
   * seal under the new one with a fresh nonce.
   *
   * @throws {CorruptDataError} if the entry does not authenticate under `from`.
   */
  reseal: (
    enc: EncryptionManager,
    versions: VersionManager,
    entry: PersistedEntry,
    from: EntrySource,
    to: EntrySource
  ): PersistedEntry => {
    let pt: Buffer;
    try {
      pt = enc.decrypt(from.key, entry, versions.entryAadFor(from.header, entry.key));
    } catch (e) {
      if (e instanceof AuthenticationError || e instanceof ValidationError) {
        throw new CorruptDataError(`Entry "${entry.key}" failed to decrypt`, { cause: e });
      }
      throw e;
    }
    try {
      return { key: entry.key, ...enc.encrypt(to.key, pt, versions.entryAadFor(to.header, entry.key)) };
    } finally {
      pt.fill(0);
    }
  },

  buildExportBundle: (
    enc: EncryptionManager,
    versions: VersionManager,
    source: EntrySource,
    entries: readonly PersistedEntry[],
    target: BundleKeySpec
  ): string => {
    const header: VaultHeaderV1 = {
      ...source.header,
      salt: target.salt,
      kdf: target.kdf,
      canary: null,
      ctx: "export"
    };
    header.canary = enc.encrypt(
      target.key,
      Buffer.from(VAULT_CONSTANTS.CANARY, "utf8"),
      versions.canaryAadFor(header)
    );

    const sealed = entries.map((e) =>
      Portability.reseal(enc, versions, e, source, { key: target.key, header })
    );
    return encodeVault(versions.build(header, sealed), versions).toString("utf8");
  },

  /**
   * @throws {ValidationError} when the payload is not a string or too large.
   * @throws {CorruptDataError} when it is not an export bundle.
   */
  parseBundle: (serialized: string, versions: VersionManager): PersistedVault => {
    if (typeof serialized !== "string" || serialized.length === 0) {
      throw new ValidationError("Export bundle must be a non-empty string");
    }
    if (serialized.length > MAX_BUNDLE_CHARS) {
      throw new ValidationError("Export bundle too large");
    }
    const bundle = decodeVault(Buffer.from(serialized, "utf8"), "export", versions);
    if (!bundle.header.canary) {
      throw new CorruptDataError("Export bundle carries no password canary");
    }
    return bundle;
  }
};
