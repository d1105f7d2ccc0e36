/**
 * @passbook/cli — Logging.
 *
 * pino writes synchronously to LOG_FILE so nothing interleaves with
 * the menu on stdout. The core packages only emit trace events; the
 * CLI turns those into debug lines here.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { BankTraceFn } from "@passbook/bank";
import type { AppConfig } from "./config.js";

export function createLogger(config: Pick<AppConfig, "LOG_FILE" | "LOG_LEVEL">): Logger {
  return pino(
    {
      level: config.LOG_LEVEL,
      base: { service: "passbook" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: config.LOG_FILE, sync: true, mkdir: true }),
  );
}

/**
 * Forward bank and ledger trace events to `logger.debug`.
 */
export function traceToLogger(logger: Logger): BankTraceFn {
  return (event) => {
    logger.debug({ event }, event.type);
  };
}
