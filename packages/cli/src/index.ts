/**
 * @passbook/cli — Interactive menu for a Passbook bank.
 */

export { MenuSession, MENU_OPTIONS, MESSAGES } from "./session.js";
export type { SessionIO, SessionOutcome, MenuSessionOptions } from "./session.js";

export { ConfigSchema, loadConfig, toPolicyConfig } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger, traceToLogger } from "./logger.js";
