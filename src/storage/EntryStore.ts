import type { EncryptedBlob, PersistedEntry } from "../types";

/**
 * In-memory map of key name to encrypted entry. Holds ciphertext only;
 * lock checks and crypto happen in the storage states.
 */
export class EntryStore {
  private entries = new Map<string, EncryptedBlob>();

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): EncryptedBlob | undefined {
    return this.entries.get(key);
  }

  put(key: string, blob: EncryptedBlob): void {
    this.entries.set(key, { iv: blob.iv, ciphertext: blob.ciphertext });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  toPersisted(): PersistedEntry[] {
    return [...this.entries].map(([key, b]) => ({ key, iv: b.iv, ciphertext: b.ciphertext }));
  }

  /** Swaps in a complete new set of entries in one step. */
  replaceAll(entries: Iterable<PersistedEntry>): void {
    const next = new Map<string, EncryptedBlob>();
    for (const e of entries) next.set(e.key, { iv: e.iv, ciphertext: e.ciphertext });
    this.entries = next;
  }
}
