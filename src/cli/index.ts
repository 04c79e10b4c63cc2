#!/usr/bin/env node
import pino from "pino";

import { createLogger, normalizeError } from "../observability/logger.js";
import { printErrorLine } from "./output.js";
import { run } from "./run.js";

const logger = createLogger({ bindings: { subsystem: "cli" } }, pino.destination(2));

run(process.argv.slice(2), { logger })
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({ err: normalizeError(err) }, "persona command failed");
    printErrorLine("Error:", err.message);
    process.exitCode = 1;
  });
