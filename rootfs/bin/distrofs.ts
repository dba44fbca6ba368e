#!/usr/bin/env -S node --import tsx
import { runCli } from "../src/cli.ts";

function getArgv(): string[] {
  const argv = process.argv.slice(2);
  // Some package managers forward an extra "--".
  if (argv[0] === "--") return argv.slice(1);
  return argv;
}

runCli(getArgv(), { stdout: process.stdout, stderr: process.stderr }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  },
);
