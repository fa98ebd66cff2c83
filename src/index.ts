#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./core/errors";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`fatal: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
