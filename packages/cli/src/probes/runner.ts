// pattern: Imperative Shell

import { newRunId, resultErr } from "../engine/result.js";
import { ErrorCode, type ExecutionResult } from "../engine/types.js";

import { runClipboardProbe } from "./clipboard.js";
import { runFilesystemProbe } from "./filesystem.js";
import { runNetworkProbe } from "./network.js";
import { isProbeName, type Probe, PROBE_COMMAND, PROBE_NAMES, type ProbeName } from "./types.js";

import type { ExecutionContext } from "../engine/context.js";

const PROBES: Record<ProbeName, Probe> = {
  filesystem: runFilesystemProbe,
  network: runNetworkProbe,
  clipboard: runClipboardProbe,
};

/**
 * Run a probe by name. Unknown names fail immediately with zero timing.
 */
export async function runProbe(
  name: string,
  context: ExecutionContext
): Promise<ExecutionResult> {
  if (!isProbeName(name)) {
    const runId = newRunId();
    context.logger.warn({ component: "probe", probe: name, runId }, "Unknown probe");
    return resultErr(
      { command: PROBE_COMMAND, target: name, runId, totalMs: 0 },
      ErrorCode.InvalidInput,
      `unknown probe: ${name} (available: ${PROBE_NAMES.join(", ")})`
    );
  }

  context.logger.debug({ component: "probe", probe: name }, "Running probe");
  return PROBES[name](context);
}
