// pattern: Imperative Shell

import { newRunId, resultOk, startTimer } from "../engine/result.js";

import { buildDoctorReport, gatherDoctorSources } from "./system-info.js";

import type { DoctorReport, ExecutionResult } from "../engine/types.js";
import type { Logger } from "pino";

export const DOCTOR_COMMAND = "doctor";
export const DOCTOR_TARGET = "env";

export type DoctorResult = ExecutionResult & { data: DoctorReport };

/**
 * A fresh environment report wrapped as a passing result
 */
export async function runDoctor(logger: Logger): Promise<DoctorResult> {
  const runId = newRunId();
  const elapsed = startTimer();
  const report = buildDoctorReport(await gatherDoctorSources(logger.child({ component: "doctor" })));

  return {
    ...resultOk({ command: DOCTOR_COMMAND, target: DOCTOR_TARGET, runId, totalMs: elapsed() }),
    data: report,
  };
}

export { formatDoctorReport } from "./formatter.js";
export {
  buildDoctorReport,
  displayServer,
  type DoctorSources,
  gatherDoctorSources,
  prettyNameFromOsRelease,
} from "./system-info.js";
