// pattern: Mixed (unavoidable)
import { readFile } from "node:fs/promises";

import { resultErr, newRunId } from "../engine/result.js";
import { ErrorCode, type ExecutionResult } from "../engine/types.js";
import { compileValidator } from "../utils/ajv.js";
import { ScenarioLoadError, ValidationError } from "../utils/errors.js";
import { formatForPath, parseStructuredText } from "../utils/structured-file.js";

import {
  CallStepDocument,
  DEFAULT_EXPECT_STATUS,
  DEFAULT_STEP_TIMEOUT_MS,
  ProbeStepDocument,
  type Scenario,
  ScenarioDocument,
  type ScenarioStep,
} from "./types.js";

export const RUN_SCENARIO_COMMAND = "run-scenario";

const validateDocument = compileValidator(ScenarioDocument, "Scenario");
const validateCallStep = compileValidator(CallStepDocument, "Call step");
const validateProbeStep = compileValidator(ProbeStepDocument, "Probe step");

function invalid(message: string): ScenarioLoadError {
  return new ScenarioLoadError("invalid", message);
}

function validated<T>(validate: () => T): T {
  try {
    return validate();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw invalid(error.message);
    }
    throw error;
  }
}

/**
 * The step kind is decided by which of `call` and `probe` is present
 */
export function parseStep(raw: unknown, index: number): ScenarioStep {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw invalid(`steps[${index}]: step must be a mapping`);
  }

  const hasCall = "call" in raw;
  const hasProbe = "probe" in raw;
  if (hasCall && hasProbe) {
    throw invalid(`steps[${index}]: step has both 'call' and 'probe'; use exactly one`);
  }
  if (!hasCall && !hasProbe) {
    throw invalid(`steps[${index}]: step has neither 'call' nor 'probe'`);
  }

  if (hasProbe) {
    const step = validated(() => validateProbeStep(raw));
    return { kind: "probe", probe: step.probe };
  }

  const step = validated(() => validateCallStep(raw));
  return {
    kind: "call",
    call: step.call,
    args: step.args ?? {},
    expect_status: step.expect_status ?? DEFAULT_EXPECT_STATUS,
    timeout_ms: step.timeout_ms ?? DEFAULT_STEP_TIMEOUT_MS,
  };
}

export function parseScenario(data: unknown): Scenario {
  const document = validated(() => validateDocument(data));
  return {
    ...(document.name !== undefined && { name: document.name }),
    steps: document.steps.map((raw, index) => parseStep(raw, index)),
  };
}

/**
 * Read a YAML, JSON or TOML scenario file, chosen by extension
 */
export async function loadScenario(filePath: string): Promise<Scenario> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ScenarioLoadError("io", `cannot read scenario file: ${detail}`);
  }

  const data = validated(() => parseStructuredText(content, formatForPath(filePath)));
  return parseScenario(data);
}

/**
 * Result reported when a scenario file cannot be used at all
 */
export function scenarioLoadFailure(
  filePath: string,
  error: ScenarioLoadError
): ExecutionResult {
  return resultErr(
    { command: RUN_SCENARIO_COMMAND, target: filePath, runId: newRunId(), totalMs: 0 },
    error.reason === "io" ? ErrorCode.IoError : ErrorCode.InvalidInput,
    error.message
  );
}
