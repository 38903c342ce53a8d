// pattern: Imperative Shell
// Builds what every command needs: config, execution context, registry.

import { CommandRegistry } from "../../commands/registry.js";
import { type HarnessConfig, loadHarnessConfig } from "../../config/index.js";
import { createPlatformContext, type ExecutionContext } from "../../engine/context.js";
import { getCliLogger } from "../../logger/index.js";
import { getConfigPath } from "../_globals.js";

import type { Logger } from "pino";

export interface CliRuntime {
  config: HarnessConfig;
  context: ExecutionContext;
  registry: CommandRegistry;
  logger: Logger;
}

export async function createRuntime(): Promise<CliRuntime> {
  const logger = getCliLogger();
  const config = await loadHarnessConfig({ configPath: getConfigPath() });
  logger.debug({ config }, "Configuration loaded");

  return {
    config,
    context: createPlatformContext(config, logger),
    registry: CommandRegistry.withBuiltins(),
    logger,
  };
}
