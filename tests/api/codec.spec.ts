import "../setup";
import { decodeVault, encodeVault } from "../../src/api/vault/VaultCodec";
import { VersionManager } from "../../src/api/vault/VersionManager";
import { CorruptDataError } from "../../src/errors";
import type { PersistedVault, VaultHeaderV1 } from "../../src/types";
import { bytesToBase64 } from "../../src/utils/base64";

const blob = {
  iv: bytesToBase64(Buffer.alloc(12, 1)),
  ciphertext: bytesToBase64(Buffer.alloc(20, 2))
};

const header: VaultHeaderV1 = {
  format: "memvault",
  v: 1,
  name: "t",
  createdAt: "2024-01-01T00:00:00.000Z",
  salt: bytesToBase64(Buffer.alloc(16, 7)),
  kdf: { algorithm: "pbkdf2-sha256", rounds: 1000 },
  canary: blob,
  ctx: "store"
};

const vault: PersistedVault = { header, entries: [{ key: "a", ...blob }] };

type Doc = {
  header: Record<string, unknown> & { kdf: Record<string, unknown> };
  entries: Array<Record<string, unknown>>;
};

function raw(mutate: (doc: Doc) => void): Buffer {
  const doc: Doc = JSON.parse(encodeVault(vault).toString("utf8"));
  mutate(doc);
  return Buffer.from(JSON.stringify(doc), "utf8");
}

describe("VaultCodec", () => {
  it("decodes what it encodes", () => {
    expect(decodeVault(encodeVault(vault))).toEqual(vault);
  });

  it("writes pretty JSON with a fixed key order and a trailing newline", () => {
    const text = encodeVault(vault).toString("utf8");
    const doc = JSON.parse(text);

    expect(text.endsWith("}\n")).toBe(true);
    expect(Object.keys(doc)).toEqual(["header", "entries"]);
    expect(Object.keys(doc.header)).toEqual(["format", "v", "name", "createdAt", "salt", "kdf", "canary", "ctx"]);
    expect(Object.keys(doc.entries[0])).toEqual(["key", "iv", "ciphertext"]);
  });

  it("encodes equal vaults to equal bytes regardless of property order", () => {
    const reordered: PersistedVault = {
      entries: [{ ciphertext: blob.ciphertext, iv: blob.iv, key: "a" }],
      header: { ...header, ctx: "store", name: "t" }
    };
    expect(encodeVault(reordered).equals(encodeVault(vault))).toBe(true);
  });

  it("accepts a vault with no password and no entries", () => {
    const empty: PersistedVault = { header: { ...header, canary: null }, entries: [] };
    expect(decodeVault(encodeVault(empty))).toEqual(empty);
  });

  it.each<[string, (doc: Doc) => void]>([
    ["a foreign format tag", (d) => (d.header.format = "other")],
    ["an unknown version", (d) => (d.header.v = 2)],
    ["a missing name", (d) => delete d.header.name],
    ["an unparseable createdAt", (d) => (d.header.createdAt = "yesterday")],
    ["a short salt", (d) => (d.header.salt = bytesToBase64(Buffer.alloc(8)))],
    ["a salt that is not base64", (d) => (d.header.salt = "***")],
    ["an unknown KDF", (d) => (d.header.kdf = { algorithm: "md5", rounds: 1 })],
    ["KDF rounds out of range", (d) => (d.header.kdf.rounds = 10)],
    ["an unknown context", (d) => (d.header.ctx = "other")],
    ["a nonce of the wrong size", (d) => (d.entries[0].iv = bytesToBase64(Buffer.alloc(8)))],
    ["a ciphertext shorter than the tag", (d) => (d.entries[0].ciphertext = bytesToBase64(Buffer.alloc(4)))],
    ["an empty entry key", (d) => (d.entries[0].key = "")],
    ["duplicate entry keys", (d) => d.entries.push({ ...d.entries[0] })],
    ["entries without a canary", (d) => (d.header.canary = null)],
    ["entries that are not an array", (d) => Object.assign(d, { entries: {} })]
  ])("rejects %s", (_label, mutate) => {
    expect(() => decodeVault(raw(mutate))).toThrow(CorruptDataError);
  });

  it("rejects bytes that are not JSON", () => {
    const decode = () => decodeVault(Buffer.from("not json"));
    expect(decode).toThrow(CorruptDataError);
    expect(decode).toThrow("Persisted data is not valid JSON");
  });

  it("rejects a vault from the wrong context", () => {
    const decode = () => decodeVault(encodeVault(vault), "export");
    expect(decode).toThrow(CorruptDataError);
    expect(decode).toThrow('Expected a "export" vault but found "store"');
  });
});

describe("VersionManager AAD", () => {
  const versions = new VersionManager();

  it("binds entries to context, version, salt and key", () => {
    expect(Buffer.from(versions.entryAadFor(header, "user")).toString("utf8")).toBe(
      `mv|entry|v1|store|${header.salt}|user`
    );
    expect(Buffer.from(versions.canaryAadFor({ ...header, ctx: "export" })).toString("utf8")).toBe(
      `mv|canary|v1|export|${header.salt}`
    );
  });
});
