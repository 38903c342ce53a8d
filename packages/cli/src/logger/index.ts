// pattern: Functional Core

export { createLogger, type CreateLoggerOptions } from "./config.js";
export { getCliLogger, initializeLogger } from "./instance.js";
export { createRenderer, formatLogObject } from "./renderer.js";
export { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from "./types.js";
