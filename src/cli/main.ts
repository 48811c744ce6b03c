#!/usr/bin/env node

import { confirm, readPassword } from "./password";
import { run } from "./program";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
    readPassword,
    confirm
  });
}

void main();
