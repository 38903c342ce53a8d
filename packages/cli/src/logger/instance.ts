// pattern: Imperative Shell

import { createLogger } from "./config.js";

import type { LogFormat, LogLevel } from "./types.js";
import type { Logger } from "pino";

// Process-wide CLI logger, configured by the root command before any action
let LOGGER: Logger | undefined;

// Initialize logger with format and interactive preferences
export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean,
  level?: LogLevel
): Logger {
  LOGGER = createLogger({
    format,
    nonInteractive,
    ...(level !== undefined && { level }),
  });
  return LOGGER;
}

export function getCliLogger(): Logger {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return LOGGER;
}
