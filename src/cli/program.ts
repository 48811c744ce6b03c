import { Command, CommanderError } from "commander";
import { Storage, type StorageOptions } from "../api/Storage";
import { errorMessage } from "../errors";
import { createConsoleLogger } from "../utils/logger";
import { EXIT_CODE_SUCCESS, EXIT_CODE_USAGE, toExitCode } from "./errors";

const VERSION = "1.0.0";

export type PasswordKind = "current" | "new";

/** Everything the CLI touches outside the storage itself. */
export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  readPassword(kind: PasswordKind): Promise<string>;
  confirm(question: string): Promise<boolean>;
}

type GlobalOptions = {
  path: string;
  verbose?: boolean;
};

/** Command-line values are JSON when they parse as JSON, plain strings otherwise. */
export function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function buildProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name("memvault")
    .description("Encrypted, password-protected key-value storage")
    .version(VERSION)
    .option("-p, --path <dir>", "parent directory of storages", ".")
    .option("-v, --verbose", "log progress to stderr")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s),
      writeErr: (s) => io.err(s)
    });

  const storageOptions = (name: string): StorageOptions => {
    const g = program.opts<GlobalOptions>();
    return {
      name,
      path: g.path,
      logger: createConsoleLogger(g.verbose ? "debug" : "warn", "[memvault]", (line) => io.err(`${line}\n`))
    };
  };

  async function withStorage<T>(name: string, fn: (storage: Storage) => Promise<T>, unlock = true): Promise<T> {
    const storage = await Storage.open(storageOptions(name));
    try {
      if (unlock && storage.hasPassword()) await storage.unlock(await io.readPassword("current"));
      return await fn(storage);
    } finally {
      await storage.close();
    }
  }

  program
    .command("init")
    .description("create a new storage and set its password")
    .argument("<name>")
    .option("--no-password", "create the storage without a password")
    .action(async (name: string, opts: { password: boolean }) => {
      // read first so a failed prompt leaves nothing on disk
      const password = opts.password ? await io.readPassword("new") : undefined;
      const storage = await Storage.init(storageOptions(name));
      try {
        if (password !== undefined) {
          await storage.setPassword(password);
          await storage.save();
        }
        io.out(`Initialized storage "${storage.name}" at ${storage.directory}\n`);
      } finally {
        await storage.close();
      }
    });

  program
    .command("set")
    .description("store a value (parsed as JSON when possible)")
    .argument("<name>")
    .argument("<key>")
    .argument("<value>")
    .action((name: string, key: string, value: string) =>
      withStorage(name, async (s) => {
        await s.set(key, parseValue(value));
        await s.save();
      })
    );

  program
    .command("get")
    .description("print a stored value")
    .argument("<name>")
    .argument("<key>")
    .action((name: string, key: string) =>
      withStorage(name, async (s) => {
        io.out(`${formatValue(await s.get(key))}\n`);
      })
    );

  program
    .command("delete")
    .description("remove a stored value")
    .argument("<name>")
    .argument("<key>")
    .action((name: string, key: string) =>
      withStorage(name, async (s) => {
        await s.delete(key);
        await s.save();
      })
    );

  program
    .command("keys")
    .description("list stored keys")
    .argument("<name>")
    .action((name: string) =>
      withStorage(name, async (s) => {
        for (const k of await s.keys()) io.out(`${k}\n`);
      })
    );

  program
    .command("clear")
    .description("remove every stored value")
    .argument("<name>")
    .option("-y, --yes", "skip the confirmation prompt")
    .action(async (name: string, opts: { yes?: boolean }) => {
      if (!opts.yes && !(await io.confirm(`Remove every value from "${name}"?`))) {
        io.err("Aborted\n");
        return;
      }
      await withStorage(name, async (s) => {
        await s.clear();
        await s.save();
      });
    });

  program
    .command("set-password")
    .description("set a new password and re-encrypt every value")
    .argument("<name>")
    .argument("[password]", "new password; prompted for when omitted")
    .action((name: string, password: string | undefined) =>
      withStorage(name, async (s) => {
        await s.setPassword(password ?? (await io.readPassword("new")));
        await s.save();
      })
    );

  program
    .command("backup")
    .description("save the current state as a named snapshot")
    .argument("<name>")
    .argument("<snapshot>")
    .action((name: string, snapshot: string) => withStorage(name, (s) => s.save(snapshot)));

  program
    .command("restore")
    .description("replace the current state with a named snapshot")
    .argument("<name>")
    .argument("<snapshot>")
    .action((name: string, snapshot: string) =>
      withStorage(
        name,
        async (s) => {
          await s.load(snapshot);
          if (s.hasPassword()) await s.unlock(await io.readPassword("current"));
          await s.save();
        },
        false
      )
    );

  program
    .command("snapshots")
    .description("list saved snapshots")
    .argument("<name>")
    .action((name: string) =>
      withStorage(
        name,
        async (s) => {
          for (const n of await s.listSnapshots()) io.out(`${n}\n`);
        },
        false
      )
    );

  program
    .command("delete-snapshot")
    .description("remove a saved snapshot")
    .argument("<name>")
    .argument("<snapshot>")
    .action((name: string, snapshot: string) => withStorage(name, (s) => s.deleteSnapshot(snapshot), false));

  return program;
}

/**
 * Runs one CLI invocation and returns its exit code.
 *
 * @param args - arguments after the executable and script path
 */
export async function run(args: string[], io: CliIo): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync(args, { from: "user" });
    return EXIT_CODE_SUCCESS;
  } catch (error: unknown) {
    // commander has already written its own message
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODE_SUCCESS : EXIT_CODE_USAGE;
    }
    io.err(`Error: ${errorMessage(error)}\n`);
    return toExitCode(error);
  }
}
