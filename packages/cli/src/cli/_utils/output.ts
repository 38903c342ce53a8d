// pattern: Imperative Shell
// stdout carries results only; logs go to stderr.

import { exitCodeFor, renderHuman, renderJson } from "../../output/index.js";

import type { ExecutionResult } from "../../engine/types.js";

export function printLine(text: string): void {
  process.stdout.write(`${text}\n`);
}

/**
 * Print a result and set the process exit code from its status
 */
export function reportResult(result: ExecutionResult, json: boolean): void {
  printLine(json ? renderJson(result) : renderHuman(result));
  process.exitCode = exitCodeFor(result.status);
}
