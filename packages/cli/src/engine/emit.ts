// pattern: Functional Core
// Desktop events cannot be delivered by this harness yet; emit only reports why.

import { newRunId, resultSkip } from "./result.js";
import { ErrorCode, type ExecutionResult } from "./types.js";

export const EMIT_COMMAND = "emit";

/**
 * Always a skip. The event payload is accepted by the CLI but not interpreted.
 */
export function emitEvent(event: string, headless: boolean): ExecutionResult {
  const shell = { command: EMIT_COMMAND, target: event, runId: newRunId(), totalMs: 0 };

  if (headless) {
    return resultSkip(
      shell,
      `event '${event}' unsupported in headless environment`,
      ErrorCode.Unsupported
    );
  }
  return resultSkip(
    shell,
    `event '${event}' is not yet implemented`,
    ErrorCode.Unimplemented
  );
}
