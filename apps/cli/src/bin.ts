#!/usr/bin/env tsx
import { EXIT_FAILURE } from "./errors.js";
import { main } from "./index.js";
import { logFailure } from "./logger.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logFailure("system", "fatal", error);
    process.exitCode = EXIT_FAILURE;
  }
);
