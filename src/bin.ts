#!/usr/bin/env node
import { main } from "./cli";
import { logger } from "./logger";

main().then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    logger.error("Fatal error", err);
    process.exitCode = 1;
  }
);
