/**
 * Password-protected, file-backed key-value storage.
 *
 * @packageDocumentation
 *
 * @remarks
 * - A storage lives in `<path>/<name>/`. The default state is
 *   `memvault.json`; named snapshots sit under `snapshots/`.
 * - Every value is JSON-encoded and sealed on its own with AES-256-GCM under
 *   a key derived from the password (Argon2id by default, PBKDF2-SHA256 on
 *   request). The entry's key name is bound in as AAD, so blobs cannot be
 *   swapped between keys or storages.
 * - A storage with a password starts **locked** after {@link Storage.open}
 *   or {@link Storage.load}. Call {@link Storage.unlock} first.
 *
 * - Error taxonomy:
 *   - {@link ValidationError}: bad arguments or API misuse.
 *   - {@link LockedError}: the operation needs an unlocked storage.
 *   - {@link InvalidPasswordError}: the password failed verification.
 *   - {@link NoKeyError}: values cannot be sealed before a password is set.
 *   - {@link KeyNotFoundError}: no entry under that key.
 *   - {@link CorruptDataError}: persisted or imported data failed validation or authentication.
 *   - {@link PersistenceError}: the filesystem refused a read or write.
 *
 * - Concurrency: calls on one instance run one at a time, in call order.
 *   Writes from separate processes are serialized by a lock file.
 */

import { resolve, join } from "node:path";
import { VAULT_CONSTANTS } from "../constants";
import { EncryptionManager } from "../crypto/EncryptionManager";
import { checkKdfParams, resolveKdfParams } from "../crypto/KeyDerivation";
import { ValidationError } from "../errors";
import { FileStore } from "../storage/FileStore";
import type { KdfParams, VaultHeaderV1 } from "../types";
import { bytesToBase64 } from "../utils/base64";
import { createConsoleLogger, type Logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";
import { StorageContext } from "./StorageContext";
import { decodeVault, encodeVault } from "./vault/VaultCodec";

/**
 * Configuration for {@link Storage}.
 */
export interface StorageOptions {
  /**
   * Storage name; also the directory name under {@link StorageOptions.path}.
   * Letters, digits, `.`, `_` and `-`, starting with a letter or digit.
   */
  name: string;

  /**
   * Parent directory.
   *
   * @defaultValue the current working directory
   */
  path?: string;

  /**
   * Key derivation used when a password is set.
   *
   * @remarks
   * At init this is written into the header. When opening an existing
   * storage it only applies to later {@link Storage.setPassword} and
   * {@link Storage.exportBundle} calls; unlock always uses the params
   * stored in the header.
   *
   * @defaultValue Argon2id, 3 passes, 64 MiB, 4 lanes
   */
  kdf?: Partial<KdfParams>;

  /** @defaultValue console logger at level `warn` */
  logger?: Logger;
}

type Resolved = { name: string; dir: string; kdf: KdfParams | null; logger: Logger };

function resolveOptions(opts: StorageOptions): Resolved {
  if (!opts || typeof opts !== "object") throw new ValidationError("Storage options are required");
  const { name } = opts;
  if (typeof name !== "string" || !VAULT_CONSTANTS.NAME_PATTERN.test(name)) {
    throw new ValidationError(
      "Storage name must start with a letter or digit and contain only letters, digits, '.', '_' or '-' (max 64)"
    );
  }
  if (opts.path !== undefined && (typeof opts.path !== "string" || opts.path.length === 0)) {
    throw new ValidationError("path must be a non-empty string");
  }

  let kdf: KdfParams | null = null;
  if (opts.kdf !== undefined) {
    kdf = resolveKdfParams(opts.kdf);
    const problem = checkKdfParams(kdf);
    if (problem) throw new ValidationError(problem);
  }

  return {
    name,
    dir: join(resolve(opts.path ?? "."), name),
    kdf,
    logger: opts.logger ?? createConsoleLogger()
  };
}

/**
 * Main entry point: a named storage of JSON values, encrypted one entry at a time.
 *
 * @remarks
 * ### Lifecycle
 * - {@link Storage.init} creates a storage with no password. It is unlocked,
 *   but {@link Storage.set} and {@link Storage.get} raise
 *   {@link NoKeyError} until {@link Storage.setPassword} is called.
 * - Nothing is written to disk until {@link Storage.save}.
 * - {@link Storage.close} zeroes the in-memory key.
 *
 * @example
 * const storage = await Storage.init({ name: "notes", path: "/var/lib/app" });
 * await storage.setPassword("correct horse battery staple");
 * await storage.set("greeting", { text: "hi" });
 * await storage.save();
 * await storage.close();
 *
 * @example
 * // Later, in another process
 * const storage = await Storage.open({ name: "notes", path: "/var/lib/app" });
 * await storage.unlock("correct horse battery staple");
 * const greeting = await storage.get<{ text: string }>("greeting");
 *
 * @example
 * // Snapshots
 * await storage.save("before-migration");
 * await storage.clear();
 * await storage.load("before-migration"); // locked again if a password is set
 */
export class Storage {
  private readonly mutex = new Mutex();

  private constructor(
    private readonly context: StorageContext,
    private readonly files: FileStore,
    public readonly name: string
  ) {}

  /**
   * Creates a new storage on disk with an empty entry set and no password.
   *
   * @throws {ValidationError} if the options are invalid or the storage already exists.
   * @throws {PersistenceError} if the directory or file cannot be written.
   */
  static async init(opts: StorageOptions): Promise<Storage> {
    const { name, dir, kdf, logger } = resolveOptions(opts);
    const files = new FileStore(dir);
    if (await files.exists()) {
      throw new ValidationError(`Storage "${name}" already exists at ${dir}`);
    }

    const params = kdf ?? resolveKdfParams();
    const header: VaultHeaderV1 = {
      format: VAULT_CONSTANTS.FORMAT_TAG,
      v: VAULT_CONSTANTS.CURRENT_FORMAT_VERSION,
      name,
      createdAt: new Date().toISOString(),
      salt: bytesToBase64(new EncryptionManager().generateSalt()),
      kdf: params,
      canary: null,
      ctx: "store"
    };

    const context = new StorageContext({ header, entries: [] }, params, logger);
    await files.write(encodeVault(context.toVault()));
    logger.info("storage created", { name, dir, kdf: params.algorithm });
    return new Storage(context, files, name);
  }

  /**
   * Opens an existing storage from its default file.
   *
   * @throws {PersistenceError} if there is nothing saved at the location.
   * @throws {CorruptDataError} if the file is not a valid storage.
   */
  static async open(opts: StorageOptions): Promise<Storage> {
    const { name, dir, kdf, logger } = resolveOptions(opts);
    const files = new FileStore(dir);
    const vault = decodeVault(await files.read(), "store");
    const context = new StorageContext(vault, kdf ?? vault.header.kdf, logger);
    logger.debug("storage opened", { name, dir, locked: context.current.name === "locked" });
    return new Storage(context, files, name);
  }

  /** Opens the storage if it exists, creates it otherwise. */
  static async openOrInit(opts: StorageOptions): Promise<Storage> {
    const { dir } = resolveOptions(opts);
    return (await new FileStore(dir).exists()) ? Storage.open(opts) : Storage.init(opts);
  }

  // --------------------------- public API ---------------------------

  /** Directory holding this storage's files. */
  get directory(): string {
    return this.files.dir;
  }

  isLocked(): boolean {
    return this.context.current.name === "locked";
  }

  hasPassword(): boolean {
    return this.context.hasPassword();
  }

  /**
   * Sets or replaces the password, re-sealing all entries under the new key.
   * The salt stays the same. Takes effect on disk at the next {@link save}.
   *
   * @throws {LockedError} if locked.
   * @throws {ValidationError} if the password is empty.
   */
  setPassword(password: string): Promise<void> {
    return this.exclusive(() => this.context.current.setPassword(password));
  }

  /**
   * Seals `value` under `key`, replacing any previous value.
   *
   * @param value - anything JSON can represent
   * @throws {NoKeyError} if no password has been set.
   */
  set(key: string, value: unknown): Promise<void> {
    return this.exclusive(() => this.context.current.set(key, value));
  }

  /**
   * @throws {NoKeyError} if no password has been set (checked before the key lookup).
   * @throws {KeyNotFoundError} if there is no entry under `key`.
   * @throws {CorruptDataError} if the stored blob fails authentication.
   */
  get<T = unknown>(key: string): Promise<T> {
    return this.exclusive(() => this.context.current.get<T>(key));
  }

  has(key: string): Promise<boolean> {
    return this.exclusive(() => this.context.current.has(key));
  }

  /** Entry keys in insertion order. */
  keys(): Promise<string[]> {
    return this.exclusive(() => this.context.current.keys());
  }

  /** @throws {KeyNotFoundError} if there is no entry under `key`. */
  delete(key: string): Promise<void> {
    return this.exclusive(() => this.context.current.delete(key));
  }

  clear(): Promise<void> {
    return this.exclusive(() => this.context.current.clear());
  }

  /**
   * Writes the current header and entries to the default file, or to the
   * named snapshot. Saving the same state twice yields the same bytes.
   *
   * @throws {LockedError} if locked.
   * @throws {PersistenceError} if the write fails.
   */
  save(snapshot?: string): Promise<void> {
    return this.exclusive(async () => {
      const vault = this.context.current.snapshot();
      await this.files.write(encodeVault(vault, this.context.versions), snapshot);
      this.context.logger.debug("saved", { storage: this.name, snapshot: snapshot ?? null, entries: vault.entries.length });
    });
  }

  /**
   * Replaces the in-memory state with the default file or a named snapshot.
   * Any held key is zeroed; the storage ends up locked when the loaded
   * state has a password.
   *
   * @throws {PersistenceError} if nothing is saved under that name.
   * @throws {CorruptDataError} if the file is not a valid storage.
   */
  load(snapshot?: string): Promise<void> {
    return this.exclusive(async () => {
      const vault = decodeVault(await this.files.read(snapshot), "store", this.context.versions);
      this.context.adopt(vault);
      this.context.logger.debug("loaded", { storage: this.name, snapshot: snapshot ?? null });
    });
  }

  listSnapshots(): Promise<string[]> {
    return this.exclusive(() => this.files.listSnapshots());
  }

  deleteSnapshot(snapshot: string): Promise<void> {
    return this.exclusive(() => this.files.removeSnapshot(snapshot));
  }

  /** Zeroes the held key. A no-op when already locked. */
  lock(): Promise<void> {
    return this.exclusive(() => this.context.current.lock());
  }

  /**
   * Verifies `password` against the stored canary and unlocks.
   *
   * @remarks
   * - Without a password set, unlocks with no argument needed.
   * - When already unlocked, a supplied password is verified again; a wrong
   *   one raises and the storage stays unlocked.
   *
   * @throws {InvalidPasswordError} if verification fails.
   * @throws {ValidationError} if a password is required and missing or empty.
   */
  unlock(password?: string): Promise<void> {
    return this.exclusive(() => this.context.current.unlock(password));
  }

  /**
   * Serializes all entries into a portable bundle.
   *
   * @param exportPassword - seal the bundle under this password instead of the storage's own
   */
  exportBundle(exportPassword?: string): Promise<string> {
    return this.exclusive(() => this.context.current.exportBundle(exportPassword));
  }

  /**
   * Replaces all entries with those of a bundle from {@link exportBundle}.
   *
   * @returns the number of entries imported
   */
  importBundle(serialized: string, password: string): Promise<number> {
    return this.exclusive(() => this.context.current.importBundle(serialized, password));
  }

  /** Locks and drops the key. The instance stays usable after a fresh unlock. */
  close(): Promise<void> {
    return this.lock();
  }

  private exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(fn);
  }
}
