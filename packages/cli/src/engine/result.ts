// pattern: Functional Core

import { randomUUID } from "node:crypto";

import { envSummary } from "./environment.js";
import { ErrorCode, type ExecutionResult, Status } from "./types.js";

export function newRunId(): string {
  return randomUUID();
}

/**
 * Monotonic stopwatch in whole milliseconds
 */
export function startTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number((process.hrtime.bigint() - start) / 1_000_000n);
}

interface ResultShell {
  command: string;
  target: string;
  runId: string;
  totalMs: number;
  steps?: Record<string, number>;
}

export function resultOk(shell: ResultShell, data?: unknown): ExecutionResult {
  return {
    run_id: shell.runId,
    command: shell.command,
    target: shell.target,
    status: Status.Pass,
    timing: { total_ms: shell.totalMs, steps: shell.steps ?? {} },
    artifacts: [],
    env_summary: envSummary(),
    ...(data !== undefined && { data }),
  };
}

export function resultErr(
  shell: ResultShell,
  code: ErrorCode,
  message: string,
  details?: unknown
): ExecutionResult {
  return {
    run_id: shell.runId,
    command: shell.command,
    target: shell.target,
    status: Status.Error,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
    timing: { total_ms: shell.totalMs, steps: shell.steps ?? {} },
    artifacts: [],
    env_summary: envSummary(),
  };
}

/**
 * An expected, non-fatal environment limitation
 */
export function resultSkip(
  shell: ResultShell,
  message: string,
  code: ErrorCode = ErrorCode.Unsupported
): ExecutionResult {
  return {
    ...resultErr(shell, code, message),
    status: Status.Skip,
  };
}
