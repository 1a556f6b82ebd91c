#!/usr/bin/env node
import "reflect-metadata";
import "dotenv/config";
import { CommanderError } from "commander";
import { main } from "./bootstrap";
import { StartupError } from "./errors/startup-error";
import { createDefaultLogger } from "./logger";

/**
 * Composition root. SIGINT and SIGTERM become the abort signal the
 * lifecycle waits on; once it has cleaned up, the process exits.
 */
function bootstrap(): void {
  // one turn of the event loop lets the pretty transport flush the last line
  const exitAfterLog = (code: number) => setImmediate(() => process.exit(code));

  const logger = createDefaultLogger();
  const interruption = new AbortController();

  process.once("SIGINT", () => interruption.abort());
  process.once("SIGTERM", () => interruption.abort());

  // ── Last-resort error handlers ──────────────────────────────────────
  process.on("uncaughtException", (err) => {
    logger.error(`Uncaught exception: ${err.stack || err.message}`);
    exitAfterLog(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.error(`Unhandled rejection: ${reason}`);
  });

  main(process.argv, { signal: interruption.signal })
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      // commander has already printed usage or the parse error
      if (err instanceof CommanderError) {
        process.exit(err.exitCode);
      }
      if (err instanceof StartupError) {
        logger.error(`${err.name}: ${err.message}`);
      } else {
        logger.error(
          `Startup failed: ${err instanceof Error ? err.stack || err.message : err}`,
        );
      }
      exitAfterLog(1);
    });
}

bootstrap();
