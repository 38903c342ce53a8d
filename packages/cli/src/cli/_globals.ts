// pattern: Imperative Shell

import { resolve } from "node:path";

// Global config file override from --config
let CONFIG_PATH: string | undefined;

/**
 * Set the config file override. Relative paths resolve against the cwd.
 */
export function setConfigPath(path: string | undefined): void {
  CONFIG_PATH = path ? resolve(path) : undefined;
}

/**
 * Get the config file override, if any
 */
export function getConfigPath(): string | undefined {
  return CONFIG_PATH;
}
