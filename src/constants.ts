export const VAULT_CONSTANTS = {
  FORMAT_TAG: "memvault" as const,
  CURRENT_FORMAT_VERSION: 1 as const,
  SUPPORTED_VERSIONS: [1] as const,

  // AES-256-GCM
  AES: {
    ALGORITHM: "aes-256-gcm" as const,
    KEY_LENGTH: 32 as const,
    IV_LENGTH: 12 as const, // 96-bit nonce
    TAG_LENGTH: 16 as const
  },

  // Argon2id (memory in KiB)
  ARGON2: {
    ITERATIONS: 3,
    MEMORY_KIB: 64 * 1024,
    PARALLELISM: 4,
    MAX_ITERATIONS: 64,
    MIN_MEMORY_KIB: 8 * 1024,
    MAX_MEMORY_KIB: 1024 * 1024,
    MAX_PARALLELISM: 16
  },

  PBKDF2: {
    DIGEST: "sha256" as const,
    ITERATIONS: 480_000,
    MIN_ITERATIONS: 1_000,
    MAX_ITERATIONS: 10_000_000
  },

  SALT_LEN: 16,

  // Known plaintext used to verify a password without touching entries
  CANARY: "memvault:canary:v1",

  FILES: {
    DEFAULT: "memvault.json",
    SNAPSHOT_DIR: "snapshots",
    SNAPSHOT_EXT: ".json",
    LOCK: ".memvault.lock"
  },

  NAME_PATTERN: /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/,
  MAX_FILE_BYTES: 64 * 1024 * 1024
};
