// pattern: Functional Core
// Library entry point; the `appctl` binary lives in cli/index.ts.

export * from "./capabilities/index.js";
export * from "./commands/index.js";
export * from "./config/index.js";
export * from "./daemon/index.js";
export {
  buildDoctorReport,
  DOCTOR_COMMAND,
  type DoctorResult,
  formatDoctorReport,
  runDoctor,
} from "./doctor/index.js";
export {
  createHeadlessContext,
  createPlatformContext,
  type ExecutionContext,
} from "./engine/context.js";
export { emitEvent } from "./engine/emit.js";
export { detectHeadless, envSummary } from "./engine/environment.js";
export { newRunId, resultErr, resultOk, resultSkip } from "./engine/result.js";
export * from "./engine/types.js";
export { createLogger, type LogFormat, type LogLevel } from "./logger/index.js";
export * from "./output/index.js";
export * from "./probes/index.js";
export * from "./scenario/index.js";
export * from "./utils/errors.js";
