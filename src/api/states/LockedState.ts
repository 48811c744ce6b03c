import { State } from "./BaseState";
import { UnlockedState } from "./UnlockedState";
import { LockedError, ValidationError } from "../../errors";
import type { PersistedVault } from "../../types";

export class LockedState extends State {
  readonly name = "locked";

  async unlock(password?: string): Promise<void> {
    if (!this.context.hasPassword()) {
      this.transitionTo(new UnlockedState(this.context));
      return;
    }
    if (password === undefined) {
      throw new ValidationError("A password is required to unlock this storage");
    }

    const { salt, kdf, name } = this.context.header;
    let key: Buffer;
    try {
      key = await this.context.verifyPassword(password);
    } catch (e) {
      this.context.logger.warn("unlock rejected", { storage: name, reason: e instanceof Error ? e.name : "unknown" });
      throw e;
    }
    this.context.session.set(key, salt, kdf);
    this.transitionTo(new UnlockedState(this.context));
  }

  lock(): void {
    // No-op
  }

  async setPassword(_password: string): Promise<void> {
    throw new LockedError();
  }

  set(_key: string, _value: unknown): void {
    throw new LockedError();
  }

  get<T>(_key: string): T {
    throw new LockedError();
  }

  has(_key: string): boolean {
    throw new LockedError();
  }

  keys(): string[] {
    throw new LockedError();
  }

  delete(_key: string): void {
    throw new LockedError();
  }

  clear(): void {
    throw new LockedError();
  }

  snapshot(): PersistedVault {
    throw new LockedError();
  }

  async exportBundle(_exportPassword?: string): Promise<string> {
    throw new LockedError();
  }

  async importBundle(_serialized: string, _password: string): Promise<number> {
    throw new LockedError();
  }
}
