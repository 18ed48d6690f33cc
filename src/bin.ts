#!/usr/bin/env node
import { run } from "./cli";
import { ExitCode } from "./errors";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = ExitCode.EXECUTION_FAILED;
  }
);
