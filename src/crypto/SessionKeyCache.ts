import type { KdfParams } from "../types";

function fingerprint(salt: string, kdf: KdfParams): string {
  return `${salt}|${kdf.algorithm}|${kdf.rounds}|${kdf.memoryKib ?? ""}|${kdf.parallelism ?? ""}`;
}

/**
 * Holds the derived storage key while the storage is unlocked.
 * The key lives only in RAM and is zeroed, not just dropped, on clear().
 */
export class SessionKeyCache {
  private key: Buffer | null = null;
  private id: string | null = null;

  set(key: Buffer, salt: string, kdf: KdfParams): void {
    if (this.key && this.key !== key) this.key.fill(0);
    this.key = key;
    this.id = fingerprint(salt, kdf);
  }

  /** Returns the cached key only if it was derived for this salt and these params. */
  match(salt: string, kdf: KdfParams): Buffer | null {
    if (!this.key) return null;
    if (this.id === fingerprint(salt, kdf)) return this.key;
    return null;
  }

  hasKey(): boolean {
    return this.key !== null;
  }

  clear(): void {
    this.key?.fill(0);
    this.key = null;
    this.id = null;
  }
}
