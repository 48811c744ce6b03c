import type { PersistedVault, VaultContext } from "../../types";
import { CorruptDataError } from "../../errors";
import { VersionManager } from "./VersionManager";

const defaultVersions = new VersionManager();

/** Serializes a vault to its durable byte layout (UTF-8 JSON, base64 binary fields). */
export function encodeVault(vault: PersistedVault, versions: VersionManager = defaultVersions): Buffer {
  const canonical = versions.build(vault.header, vault.entries);
  return Buffer.from(JSON.stringify(canonical, null, 2) + "\n", "utf8");
}

/**
 * Parses and validates persisted bytes.
 *
 * @throws {CorruptDataError} if the bytes are not a recognizable vault.
 */
export function decodeVault(
  bytes: Uint8Array,
  expectedCtx?: VaultContext,
  versions: VersionManager = defaultVersions
): PersistedVault {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("utf8"));
  } catch (e) {
    throw new CorruptDataError("Persisted data is not valid JSON", { cause: e });
  }
  return versions.validate(parsed, expectedCtx);
}
