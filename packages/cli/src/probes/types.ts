// pattern: Functional Core

import type { ExecutionContext } from "../engine/context.js";
import type { ExecutionResult } from "../engine/types.js";

export const PROBE_COMMAND = "probe";

export const PROBE_NAMES = ["filesystem", "network", "clipboard"] as const;
export type ProbeName = (typeof PROBE_NAMES)[number];

export type Probe = (context: ExecutionContext) => Promise<ExecutionResult>;

export function isProbeName(name: string): name is ProbeName {
  return PROBE_NAMES.some(probe => probe === name);
}
