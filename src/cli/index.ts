#!/usr/bin/env node

import { EXIT_EXECUTION } from "./errors";
import { runCli } from "./run";

runCli(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("Unexpected error:", error);
    process.exitCode = EXIT_EXECUTION;
  });
