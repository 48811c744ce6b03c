import { State } from "./BaseState";
import { LockedState } from "./LockedState";
import { assertKeyName, assertPassword } from "../guards";
import { Portability } from "../vault/Portability";
import { deriveKeyFromPassword } from "../../crypto/KeyDerivation";
import { InvalidPasswordError, KeyNotFoundError } from "../../errors";
import type { PersistedEntry, PersistedVault, VaultHeaderV1 } from "../../types";
import { base64ToBytes, bytesToBase64 } from "../../utils/base64";

export class UnlockedState extends State {
  readonly name = "unlocked";

  /**
   * Already unlocked. With a password set and one supplied, it is checked
   * again; a wrong one raises without changing the state.
   */
  async unlock(password?: string): Promise<void> {
    if (password === undefined || !this.context.hasPassword()) return;
    try {
      const key = await this.context.verifyPassword(password);
      key.fill(0);
    } catch (e) {
      if (e instanceof InvalidPasswordError) {
        this.context.logger.warn("unlock rejected", { storage: this.context.header.name, reason: e.name });
      }
      throw e;
    }
  }

  lock(): void {
    this.context.session.clear();
    this.transitionTo(new LockedState(this.context));
  }

  /**
   * Derives a key from `password` over the existing salt and re-seals every
   * entry under it. Nothing changes unless every entry re-seals.
   */
  async setPassword(password: string): Promise<void> {
    assertPassword(password);
    const ctx = this.context;
    const current = ctx.header;
    const oldKey = ctx.currentKey();

    const kdf = ctx.passwordKdf;
    const newKey = await deriveKeyFromPassword(password, base64ToBytes(current.salt), kdf);
    try {
      const next: VaultHeaderV1 = { ...current, kdf, canary: null };
      next.canary = ctx.makeCanary(newKey, next);

      let entries: PersistedEntry[] = [];
      if (ctx.entries.size > 0) {
        // entries exist only once a password is set, so a key is held here
        const from = { key: ctx.requireKey(), header: current };
        entries = ctx.entries
          .toPersisted()
          .map((e) => Portability.reseal(ctx.enc, ctx.versions, e, from, { key: newKey, header: next }));
      }

      ctx.header = next;
      ctx.entries.replaceAll(entries);
      ctx.session.set(newKey, next.salt, next.kdf);
    } catch (e) {
      newKey.fill(0);
      throw e;
    }
    ctx.logger.info(oldKey ? "password changed" : "password set", { storage: current.name, kdf: kdf.algorithm });
  }

  set(key: string, value: unknown): void {
    assertKeyName(key);
    const k = this.context.requireKey();
    this.context.entries.put(key, this.context.encryptEntry(k, key, value));
  }

  get<T>(key: string): T {
    assertKeyName(key);
    const k = this.context.requireKey();
    const blob = this.context.entries.get(key);
    if (!blob) throw new KeyNotFoundError(key);
    return this.context.decryptEntry<T>(k, key, blob);
  }

  has(key: string): boolean {
    assertKeyName(key);
    return this.context.entries.has(key);
  }

  keys(): string[] {
    return this.context.entries.keys();
  }

  delete(key: string): void {
    assertKeyName(key);
    if (!this.context.entries.delete(key)) throw new KeyNotFoundError(key);
  }

  clear(): void {
    this.context.entries.clear();
  }

  snapshot(): PersistedVault {
    return this.context.toVault();
  }

  /**
   * Without `exportPassword` the bundle reuses this storage's salt and KDF
   * params, so the storage password opens it. With one, a fresh salt is drawn.
   */
  async exportBundle(exportPassword?: string): Promise<string> {
    const ctx = this.context;
    const source = { key: ctx.requireKey(), header: ctx.header };
    const entries = ctx.entries.toPersisted();

    if (exportPassword === undefined) {
      return Portability.buildExportBundle(ctx.enc, ctx.versions, source, entries, {
        key: source.key,
        salt: ctx.header.salt,
        kdf: ctx.header.kdf
      });
    }

    assertPassword(exportPassword);
    const salt = bytesToBase64(ctx.enc.generateSalt());
    const kdf = ctx.passwordKdf;
    const key = await deriveKeyFromPassword(exportPassword, base64ToBytes(salt), kdf);
    try {
      return Portability.buildExportBundle(ctx.enc, ctx.versions, source, entries, { key, salt, kdf });
    } finally {
      key.fill(0);
    }
  }

  /**
   * Replaces all entries with the bundle's. A password that fails the
   * bundle's canary raises InvalidPasswordError; an entry that then fails
   * raises CorruptDataError. Either way nothing is replaced.
   */
  async importBundle(serialized: string, password: string): Promise<number> {
    const ctx = this.context;
    assertPassword(password);
    ctx.requireKey();

    const bundle = Portability.parseBundle(serialized, ctx.versions);
    const bundleKey = await ctx.verifyPassword(password, bundle.header);
    try {
      const from = { key: bundleKey, header: bundle.header };
      const to = { key: ctx.requireKey(), header: ctx.header };
      const entries = bundle.entries.map((e) => Portability.reseal(ctx.enc, ctx.versions, e, from, to));
      ctx.entries.replaceAll(entries);
      ctx.logger.info("imported bundle", { storage: ctx.header.name, entries: entries.length });
      return entries.length;
    } finally {
      bundleKey.fill(0);
    }
  }
}
