export {
  applyEnvOverrides,
  CONFIG_ENV,
  loadHarnessConfig,
  type LoadConfigOptions,
  mergeConfig,
} from "./loader.js";
export {
  CLIPBOARD_BACKENDS,
  DEFAULT_CONFIG,
  type HarnessConfig,
  HarnessConfigFile,
} from "./schema.js";
