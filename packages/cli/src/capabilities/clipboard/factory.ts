// pattern: Imperative Shell
// Chooses the clipboard backend once, when the execution context is built.

import { ClipboardImplementation } from "./base.js";
import { HeadlessClipboard } from "./headless.js";
import { SystemClipboard } from "./system.js";

import type { ClipboardBackend } from "../types.js";
import type { Logger } from "pino";

export function createClipboard(
  backend: ClipboardBackend,
  headless: boolean,
  logger: Logger
): ClipboardImplementation {
  switch (backend) {
    case "headless":
      logger.debug("Headless clipboard forced by configuration");
      return new HeadlessClipboard(logger);

    case "system":
      logger.debug("System clipboard forced by configuration");
      return new SystemClipboard(logger);

    case "auto":
      if (headless) {
        logger.debug("No display detected, using headless clipboard");
        return new HeadlessClipboard(logger);
      }
      logger.debug({ platform: process.platform }, "Using system clipboard");
      return new SystemClipboard(logger);
  }
}
