export type KdfAlgorithm = "argon2id" | "pbkdf2-sha256";

export interface KdfParams {
  algorithm: KdfAlgorithm;
  rounds: number;        // argon2 time cost, or pbkdf2 iterations
  memoryKib?: number;    // argon2id only
  parallelism?: number;  // argon2id only
}

export interface EncryptedBlob {
  iv: string;          // base64
  ciphertext: string;  // base64, GCM tag appended
}

export interface PersistedEntry extends EncryptedBlob {
  key: string;
}

export type VaultContext = "store" | "export";

export interface VaultHeaderV1 {
  format: "memvault";
  v: 1;
  name: string;
  createdAt: string;           // ISO-8601
  salt: string;                // base64, immutable
  kdf: KdfParams;
  canary: EncryptedBlob | null; // null => no password set
  /**
   * AAD context:
   * - "store"  => persisted by a storage (default file or snapshot)
   * - "export" => portable bundle produced by exportBundle()
   */
  ctx: VaultContext;
}

export interface PersistedVaultV1 {
  header: VaultHeaderV1;
  entries: PersistedEntry[];
}

export type PersistedVault = PersistedVaultV1;
