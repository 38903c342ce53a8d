// pattern: Mixed (unavoidable)
// Reads the optional config file, then layers environment overrides on top.
import { readFile } from "node:fs/promises";

import { compileValidator } from "../utils/ajv.js";
import { ConfigurationError, ValidationError } from "../utils/errors.js";
import { formatForPath, parseStructuredText } from "../utils/structured-file.js";

import {
  CLIPBOARD_BACKENDS,
  DEFAULT_CONFIG,
  type HarnessConfig,
  HarnessConfigFile,
} from "./schema.js";

import type { EnvVars } from "../engine/environment.js";

const validateConfigFile = compileValidator(HarnessConfigFile, "Configuration");

export const CONFIG_ENV = {
  path: "APPCTL_CONFIG",
  probeUrl: "APPCTL_NETWORK_PROBE_URL",
  timeoutMs: "APPCTL_NETWORK_TIMEOUT_MS",
  clipboardBackend: "APPCTL_CLIPBOARD_BACKEND",
} as const;

export interface LoadConfigOptions {
  /** Explicit file; falls back to APPCTL_CONFIG */
  configPath?: string | undefined;
  env?: EnvVars;
}

/**
 * Merge a validated file document over the defaults
 */
export function mergeConfig(
  base: HarnessConfig,
  file: HarnessConfigFile
): HarnessConfig {
  return {
    network: {
      probeUrl: file.network?.probeUrl ?? base.network.probeUrl,
      timeoutMs: file.network?.timeoutMs ?? base.network.timeoutMs,
    },
    clipboard: {
      backend: file.clipboard?.backend ?? base.clipboard.backend,
    },
  };
}

function parseTimeout(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `${CONFIG_ENV.timeoutMs} must be a positive integer, got '${raw}'`
    );
  }
  return value;
}

function parseBackend(raw: string): HarnessConfig["clipboard"]["backend"] {
  const backend = CLIPBOARD_BACKENDS.find(candidate => candidate === raw);
  if (!backend) {
    throw new ConfigurationError(
      `${CONFIG_ENV.clipboardBackend} must be one of ${CLIPBOARD_BACKENDS.join(", ")}, got '${raw}'`
    );
  }
  return backend;
}

/**
 * Apply APPCTL_* environment overrides. Empty values are ignored.
 */
export function applyEnvOverrides(
  config: HarnessConfig,
  env: EnvVars
): HarnessConfig {
  const probeUrl = env[CONFIG_ENV.probeUrl];
  const timeout = env[CONFIG_ENV.timeoutMs];
  const backend = env[CONFIG_ENV.clipboardBackend];

  return {
    network: {
      probeUrl: probeUrl ? probeUrl : config.network.probeUrl,
      timeoutMs: timeout ? parseTimeout(timeout) : config.network.timeoutMs,
    },
    clipboard: {
      backend: backend ? parseBackend(backend) : config.clipboard.backend,
    },
  };
}

async function loadConfigFile(configPath: string): Promise<HarnessConfigFile> {
  let content: string;
  try {
    content = await readFile(configPath, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`cannot read config file: ${detail}`, configPath);
  }

  try {
    // An empty YAML file parses to null; treat it as "no settings"
    const data = parseStructuredText(content, formatForPath(configPath)) ?? {};
    return validateConfigFile(data);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(error.message, configPath);
    }
    throw error;
  }
}

/**
 * Build the harness configuration: defaults, then file, then environment
 */
export async function loadHarnessConfig(
  options: LoadConfigOptions = {}
): Promise<HarnessConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[CONFIG_ENV.path];

  let config = DEFAULT_CONFIG;
  if (configPath) {
    config = mergeConfig(config, await loadConfigFile(configPath));
  }

  return applyEnvOverrides(config, env);
}
