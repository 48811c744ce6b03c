import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { join } from "node:path";
import { lock } from "proper-lockfile";
import { VAULT_CONSTANTS } from "../constants";
import { PersistenceError, ValidationError, errnoCode, errorMessage } from "../errors";

const { FILES } = VAULT_CONSTANTS;

export function assertSnapshotName(name: string): void {
  if (typeof name !== "string" || !VAULT_CONSTANTS.NAME_PATTERN.test(name)) {
    throw new ValidationError(
      "Snapshot name must start with a letter or digit and contain only letters, digits, '.', '_' or '-' (max 64)"
    );
  }
}

/**
 * Reads and writes the persisted bytes of one storage directory: the default
 * file plus any number of named snapshots.
 *
 * Writes go to a temp file that is renamed into place, under a
 * proper-lockfile lock on the directory, and are read back before returning.
 */
export class FileStore {
  constructor(public readonly dir: string) {}

  pathFor(snapshot?: string): string {
    if (snapshot === undefined) return join(this.dir, FILES.DEFAULT);
    assertSnapshotName(snapshot);
    return join(this.dir, FILES.SNAPSHOT_DIR, snapshot + FILES.SNAPSHOT_EXT);
  }

  async exists(snapshot?: string): Promise<boolean> {
    const file = this.pathFor(snapshot);
    try {
      return (await stat(file)).isFile();
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return false;
      throw new PersistenceError(`Failed to stat ${file}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async read(snapshot?: string): Promise<Buffer> {
    const file = this.pathFor(snapshot);
    let bytes: Buffer;
    try {
      bytes = await readFile(file);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        const what = snapshot === undefined ? "No saved state" : `No saved snapshot named "${snapshot}"`;
        throw new PersistenceError(`${what} at ${file}`, { cause: e });
      }
      throw new PersistenceError(`Failed to read ${file}: ${errorMessage(e)}`, { cause: e });
    }
    if (bytes.byteLength > VAULT_CONSTANTS.MAX_FILE_BYTES) {
      throw new PersistenceError(`${file} is larger than ${VAULT_CONSTANTS.MAX_FILE_BYTES} bytes`);
    }
    return bytes;
  }

  async write(bytes: Uint8Array, snapshot?: string): Promise<void> {
    const file = this.pathFor(snapshot);
    const tmp = `${file}.${randomBytes(6).toString("hex")}.tmp`;

    try {
      await mkdir(join(this.dir, FILES.SNAPSHOT_DIR), { recursive: true });
    } catch (e) {
      throw new PersistenceError(`Failed to create ${this.dir}: ${errorMessage(e)}`, { cause: e });
    }

    let release: () => Promise<void>;
    try {
      release = await lock(this.dir, {
        lockfilePath: join(this.dir, FILES.LOCK),
        retries: { retries: 10, minTimeout: 20, maxTimeout: 250 }
      });
    } catch (e) {
      throw new PersistenceError(`Failed to lock ${this.dir}: ${errorMessage(e)}`, { cause: e });
    }

    try {
      await writeFile(tmp, bytes, { mode: 0o600 });
      await rename(tmp, file);

      const check = await readFile(file);
      if (!check.equals(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength))) {
        throw new PersistenceError("Failed to persist data (integrity check)");
      }
    } catch (e) {
      // cleanup failures must not mask the write failure
      await rm(tmp, { force: true }).catch(() => undefined);
      await release().catch(() => undefined);
      if (e instanceof PersistenceError) throw e;
      throw new PersistenceError(`Failed to persist data: ${errorMessage(e)}`, { cause: e });
    }

    try {
      await release();
    } catch (e) {
      throw new PersistenceError(`Failed to unlock ${this.dir}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async listSnapshots(): Promise<string[]> {
    const dir = join(this.dir, FILES.SNAPSHOT_DIR);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw new PersistenceError(`Failed to list ${dir}: ${errorMessage(e)}`, { cause: e });
    }
    return names
      .filter((n) => n.endsWith(FILES.SNAPSHOT_EXT))
      .map((n) => n.slice(0, -FILES.SNAPSHOT_EXT.length))
      .filter((n) => VAULT_CONSTANTS.NAME_PATTERN.test(n))
      .sort();
  }

  async removeSnapshot(snapshot: string): Promise<void> {
    const file = this.pathFor(snapshot);
    try {
      await rm(file);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        throw new PersistenceError(`No saved snapshot named "${snapshot}" at ${file}`, { cause: e });
      }
      throw new PersistenceError(`Failed to delete ${file}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
