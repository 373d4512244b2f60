#!/usr/bin/env node
import { run } from "./cli.js";
import { logger } from "./logger.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal(
      { error: error instanceof Error ? error.message : String(error) },
      "Unexpected failure",
    );
    process.exitCode = 1;
  });
