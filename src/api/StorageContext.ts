import { EncryptionManager } from "../crypto/EncryptionManager";
import { deriveKeyFromPassword } from "../crypto/KeyDerivation";
import { SessionKeyCache } from "../crypto/SessionKeyCache";
import { VAULT_CONSTANTS } from "../constants";
import { EntryStore } from "../storage/EntryStore";
import type { EncryptedBlob, KdfParams, PersistedVault, VaultHeaderV1 } from "../types";
import { base64ToBytes } from "../utils/base64";
import type { Logger } from "../utils/logger";
import {
  AuthenticationError,
  CorruptDataError,
  InvalidPasswordError,
  NoKeyError,
  ValidationError
} from "../errors";
import { VersionManager } from "./vault/VersionManager";
import { assertPassword } from "./guards";
import type { State } from "./states/BaseState";
import { LockedState } from "./states/LockedState";
import { UnlockedState } from "./states/UnlockedState";

/**
 * Everything the lock states operate on: the loaded header, the encrypted
 * entries, and the session key while one is held.
 *
 * @internal
 */
export class StorageContext {
  /** @internal Current state (Unlocked or Locked). */
  private state: State;

  public readonly enc = new EncryptionManager();
  public readonly session = new SessionKeyCache();
  public readonly versions = new VersionManager();
  public readonly entries = new EntryStore();

  /** Header of the loaded vault; the salt never changes after init. */
  public header: VaultHeaderV1;

  /**
   * @param vault - initial contents; decides the starting state
   * @param passwordKdf - params used when a new password is derived
   */
  constructor(
    vault: PersistedVault,
    public readonly passwordKdf: KdfParams,
    public readonly logger: Logger
  ) {
    this.header = vault.header;
    this.entries.replaceAll(vault.entries);
    this.state = this.initialState();
  }

  get current(): State {
    return this.state;
  }

  transitionTo(state: State): void {
    this.logger.debug("state change", { from: this.state.name, to: state.name, storage: this.header.name });
    this.state = state;
  }

  hasPassword(): boolean {
    return this.header.canary !== null;
  }

  /**
   * Replaces header and entries wholesale. Any held key is zeroed; the new
   * state is Locked when the vault has a password, Unlocked otherwise.
   */
  adopt(vault: PersistedVault): void {
    this.session.clear();
    this.header = vault.header;
    this.entries.replaceAll(vault.entries);
    this.transitionTo(this.initialState());
  }

  toVault(): PersistedVault {
    return this.versions.build(this.header, this.entries.toPersisted());
  }

  currentKey(): Buffer | null {
    return this.session.match(this.header.salt, this.header.kdf);
  }

  requireKey(): Buffer {
    const key = this.currentKey();
    if (!key) throw new NoKeyError();
    return key;
  }

  /**
   * Derives a key for `header` and proves it against the header's canary.
   * The caller owns the returned key.
   *
   * @throws {InvalidPasswordError} if the canary does not authenticate.
   */
  async verifyPassword(password: string, header: VaultHeaderV1 = this.header): Promise<Buffer> {
    assertPassword(password);
    if (!header.canary) throw new NoKeyError();

    const key = await deriveKeyFromPassword(password, base64ToBytes(header.salt), header.kdf);
    try {
      const pt = this.enc.decrypt(key, header.canary, this.versions.canaryAadFor(header));
      const ok = pt.toString("utf8") === VAULT_CONSTANTS.CANARY;
      pt.fill(0);
      if (!ok) throw new InvalidPasswordError();
      return key;
    } catch (e) {
      key.fill(0);
      if (e instanceof AuthenticationError) throw new InvalidPasswordError();
      throw e;
    }
  }

  makeCanary(key: Buffer, header: VaultHeaderV1): EncryptedBlob {
    return this.enc.encrypt(key, Buffer.from(VAULT_CONSTANTS.CANARY, "utf8"), this.versions.canaryAadFor(header));
  }

  encryptEntry(key: Buffer, name: string, value: unknown): EncryptedBlob {
    return this.enc.encryptJson(key, value, this.versions.entryAadFor(this.header, name));
  }

  /** @throws {CorruptDataError} when a blob fails under a key the canary already accepted. */
  decryptEntry<T>(key: Buffer, name: string, blob: EncryptedBlob): T {
    try {
      return this.enc.decryptJson<T>(key, blob, this.versions.entryAadFor(this.header, name));
    } catch (e) {
      if (e instanceof AuthenticationError || e instanceof ValidationError) {
        throw new CorruptDataError(`Entry "${name}" failed to decrypt`, { cause: e });
      }
      throw e;
    }
  }

  private initialState(): State {
    return this.hasPassword() ? new LockedState(this) : new UnlockedState(this);
  }
}
