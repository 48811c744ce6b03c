import { Storage, type StorageOptions } from "./api/Storage";

export type { StorageOptions } from "./api/Storage";
export { Storage } from "./api/Storage";
export type { LockStateName } from "./api/states/BaseState";
export type { KdfAlgorithm, KdfParams, PersistedVault, VaultHeaderV1 } from "./types";
export type { Logger, LogLevel } from "./utils/logger";
export { createConsoleLogger, silentLogger } from "./utils/logger";
export { resolveKdfParams } from "./crypto/KeyDerivation";
export * from "./errors";

/**
 * Opens the named storage, creating it first if nothing is saved there yet.
 *
 * @example
 * ```typescript
 * import openStorage from 'memvault';
 *
 * async function main() {
 *   const storage = await openStorage({ name: 'session', path: './data' });
 *   if (!storage.hasPassword()) await storage.setPassword('correct horse battery staple');
 *   else await storage.unlock('correct horse battery staple');
 *
 *   await storage.set('user', { id: 7, role: 'admin' });
 *   await storage.save();
 *   console.log(await storage.get('user')); // { id: 7, role: 'admin' }
 *   await storage.close(); // zeroes the key
 * }
 *
 * main();
 * ```
 */
export default function openStorage(opts: StorageOptions): Promise<Storage> {
  return Storage.openOrInit(opts);
}
