// pattern: Imperative Shell
// write -> read. Missing clipboard support is a skip, not an error.

import { newRunId, resultErr, resultOk, resultSkip, startTimer } from "../engine/result.js";
import { ErrorCode, type ExecutionResult } from "../engine/types.js";

import { ProbeSteps, StepFailure } from "./steps.js";
import { PROBE_COMMAND } from "./types.js";

import type { ExecutionContext } from "../engine/context.js";

export function clipboardMarker(runId: string): string {
  return `appctl_clipboard_probe_${runId.slice(0, 8)}`;
}

export async function runClipboardProbe(
  context: ExecutionContext
): Promise<ExecutionResult> {
  const runId = newRunId();
  const elapsed = startTimer();
  const logger = context.logger.child({ component: "probe", probe: "clipboard", runId });
  const steps = new ProbeSteps(logger);

  const shell = () => ({
    command: PROBE_COMMAND,
    target: "clipboard",
    runId,
    totalMs: elapsed(),
    steps: steps.timings,
  });

  if (context.headless) {
    logger.debug("Headless environment, clipboard probe skipped");
    return resultSkip(shell(), "headless environment: no clipboard access");
  }

  const marker = clipboardMarker(runId);
  let readBack: string;
  try {
    await steps.run("write", () => context.clipboard.writeText(marker));
    readBack = await steps.run("read", () => context.clipboard.readText());
  } catch (error) {
    if (!(error instanceof StepFailure)) throw error;
    const message = `clipboard probe failed at ${error.step}: ${error.detail}`;
    switch (error.kind) {
      case "unsupported":
        return resultSkip(shell(), message, ErrorCode.Unsupported);
      case "dependency_missing":
        return resultSkip(shell(), message, ErrorCode.DependencyMissing);
      case "permission_denied":
        return resultErr(shell(), ErrorCode.PermissionDenied, message);
      default:
        return resultErr(shell(), ErrorCode.InternalError, message);
    }
  }

  if (readBack.trim() !== marker) {
    return resultErr(
      shell(),
      ErrorCode.ExternalInterference,
      "clipboard read-back does not match written text"
    );
  }

  return resultOk(shell());
}
