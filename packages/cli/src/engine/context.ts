// pattern: Imperative Shell
// The execution context is built once per process and is read-only afterwards.

import { createClipboard } from "../capabilities/clipboard/index.js";
import { StandardFilesystem } from "../capabilities/filesystem.js";
import { FetchNetwork } from "../capabilities/network.js";

import { detectHeadless } from "./environment.js";

import type {
  ClipboardProvider,
  FilesystemProvider,
  NetworkProvider,
} from "../capabilities/types.js";
import type { HarnessConfig } from "../config/schema.js";
import type { Logger } from "pino";

export interface ExecutionContext {
  readonly fs: FilesystemProvider;
  readonly network: NetworkProvider;
  readonly clipboard: ClipboardProvider;
  /** Display detection result, fixed at construction */
  readonly headless: boolean;
  readonly config: HarnessConfig;
  readonly logger: Logger;
}

/**
 * Context for the running machine. The clipboard backend follows the configured
 * choice, or headless detection when the choice is "auto".
 */
export function createPlatformContext(
  config: HarnessConfig,
  logger: Logger
): ExecutionContext {
  const { backend } = config.clipboard;
  // An explicit backend overrides display detection
  const headless = backend === "auto" ? detectHeadless() : backend === "headless";
  const clipboard = createClipboard(
    backend,
    headless,
    logger.child({ component: "clipboard" })
  );

  logger.debug(
    { headless, clipboard: clipboard.name },
    "Execution context ready"
  );

  return Object.freeze({
    fs: new StandardFilesystem(),
    network: new FetchNetwork(),
    clipboard,
    headless,
    config,
    logger,
  });
}

/**
 * Context that never touches a display, whatever the environment says
 */
export function createHeadlessContext(
  config: HarnessConfig,
  logger: Logger
): ExecutionContext {
  return Object.freeze({
    fs: new StandardFilesystem(),
    network: new FetchNetwork(),
    clipboard: createClipboard(
      "headless",
      true,
      logger.child({ component: "clipboard" })
    ),
    headless: true,
    config,
    logger,
  });
}
