/**
 * Interactive input for the CLI.
 * Passwords come from MEMVAULT_PASSWORD (or MEMVAULT_NEW_PASSWORD for a new
 * one) before falling back to a prompt on stderr with echo muted.
 */

import { createInterface } from "node:readline";
import { Writable } from "node:stream";
import { ValidationError } from "../errors";
import type { PasswordKind } from "./program";

export function promptHidden(label: string): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, _encoding, callback) {
      if (!muted) process.stderr.write(chunk);
      callback();
    }
  });
  const rl = createInterface({ input: process.stdin, output, terminal: Boolean(process.stdin.isTTY) });

  return new Promise((resolve, reject) => {
    rl.on("close", () => reject(new ValidationError("No password entered")));
    rl.question(label, (answer) => {
      muted = false;
      process.stderr.write("\n");
      rl.removeAllListeners("close");
      rl.close();
      resolve(answer);
    });
    muted = true;
  });
}

export async function readPassword(kind: PasswordKind): Promise<string> {
  const env = kind === "new" ? process.env.MEMVAULT_NEW_PASSWORD ?? process.env.MEMVAULT_PASSWORD : process.env.MEMVAULT_PASSWORD;
  if (env) return env;

  if (kind === "current") return promptHidden("Password: ");

  const first = await promptHidden("New password: ");
  const second = await promptHidden("Repeat new password: ");
  if (first !== second) throw new ValidationError("Passwords do not match");
  return first;
}

/** Asks a yes/no question on stderr. Anything but "y" or "yes" is a no. */
export function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr, terminal: Boolean(process.stdin.isTTY) });

  return new Promise((resolve) => {
    rl.on("close", () => resolve(false));
    rl.question(`${question} [y/N] `, (answer) => {
      rl.removeAllListeners("close");
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}
