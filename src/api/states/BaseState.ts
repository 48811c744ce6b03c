import type { StorageContext } from "../StorageContext";
import type { PersistedVault } from "../../types";

export type LockStateName = "unlocked" | "locked";

export abstract class State {
  constructor(protected context: StorageContext) {}

  abstract readonly name: LockStateName;
  abstract unlock(password?: string): Promise<void>;
  abstract lock(): void;
  abstract setPassword(password: string): Promise<void>;
  abstract set(key: string, value: unknown): void;
  abstract get<T>(key: string): T;
  abstract has(key: string): boolean;
  abstract keys(): string[];
  abstract delete(key: string): void;
  abstract clear(): void;
  /** The vault as it should be written by save(). */
  abstract snapshot(): PersistedVault;
  abstract exportBundle(exportPassword?: string): Promise<string>;
  abstract importBundle(serialized: string, password: string): Promise<number>;

  protected transitionTo(state: State): void {
    this.context.transitionTo(state);
  }
}
