// pattern: Imperative Shell
// create_dir -> write_file -> read_verify -> cleanup. Cleanup always runs.

import { join } from "node:path";

import { newRunId, resultErr, resultOk, startTimer } from "../engine/result.js";
import { ErrorCode, type ExecutionResult } from "../engine/types.js";

import { errorCodeFor, ProbeSteps, StepFailure } from "./steps.js";
import { PROBE_COMMAND } from "./types.js";

import type { ExecutionContext } from "../engine/context.js";

export const FILESYSTEM_PAYLOAD = "appctl filesystem probe";
export const FILESYSTEM_PROBE_FILE = "probe_test.txt";

export function probeDirName(runId: string): string {
  return `appctl_probe_${runId.slice(0, 8)}`;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.byteLength === b.byteLength && a.every((byte, i) => byte === b[i]);
}

export async function runFilesystemProbe(
  context: ExecutionContext
): Promise<ExecutionResult> {
  const runId = newRunId();
  const elapsed = startTimer();
  const logger = context.logger.child({ component: "probe", probe: "filesystem", runId });
  const steps = new ProbeSteps(logger);
  const { fs } = context;

  const dir = join(fs.tempDir(), probeDirName(runId));
  const file = join(dir, FILESYSTEM_PROBE_FILE);
  const payload = new TextEncoder().encode(FILESYSTEM_PAYLOAD);

  let failure: StepFailure | undefined;
  let matched = true;
  try {
    await steps.run("create_dir", () => fs.createDirAll(dir));
    await steps.run("write_file", () => fs.write(file, payload));
    const readBack = await steps.run("read_verify", () => fs.read(file));
    matched = sameBytes(readBack, payload);
  } catch (error) {
    if (!(error instanceof StepFailure)) throw error;
    failure = error;
  }

  try {
    await steps.run("cleanup", () => fs.removeDirAll(dir));
  } catch (error) {
    logger.warn({ err: error, dir }, "Filesystem probe cleanup failed");
  }

  const shell = {
    command: PROBE_COMMAND,
    target: "filesystem",
    runId,
    totalMs: elapsed(),
    steps: steps.timings,
  };

  if (failure) {
    const kind = failure.kind;
    // Only permission and I/O failures keep their own code here
    const code =
      kind === "permission_denied" || kind === "io"
        ? errorCodeFor(kind)
        : ErrorCode.InternalError;
    return resultErr(
      shell,
      code,
      `filesystem probe failed at ${failure.step}: ${failure.detail}`
    );
  }

  if (!matched) {
    return resultErr(
      shell,
      ErrorCode.ExternalInterference,
      "read-back data does not match written data"
    );
  }

  return resultOk(shell, { temp_dir_used: dir });
}
