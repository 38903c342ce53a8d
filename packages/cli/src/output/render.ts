// pattern: Functional Core
// Text rendering for results. Everything here returns strings; callers print.

import Table from "cli-table3";

import { Status, type ExecutionResult, type ScenarioResult } from "../engine/types.js";

export function statusLabel(status: Status): string {
  return status.toUpperCase();
}

export function renderJson(value: ExecutionResult | ScenarioResult): string {
  return JSON.stringify(value, null, 2);
}

export function renderHuman(result: ExecutionResult): string {
  const lines: string[] = [];

  lines.push(`[${statusLabel(result.status)}] ${result.command} ${result.target}`);
  lines.push(`  run_id: ${result.run_id}`);
  lines.push(`  timing: ${result.timing.total_ms}ms`);
  for (const [step, ms] of Object.entries(result.timing.steps)) {
    lines.push(`    ${step}: ${ms}ms`);
  }

  if (result.error) {
    lines.push(`  error:  ${result.error.code} - ${result.error.message}`);
  }

  if (result.data !== undefined) {
    for (const line of JSON.stringify(result.data, null, 2).split("\n")) {
      lines.push(`  ${line}`);
    }
  }

  const env = result.env_summary;
  lines.push(`  env: os=${env.os} arch=${env.arch} headless=${env.headless}`);

  return lines.join("\n");
}

export function renderScenarioHuman(result: ScenarioResult): string {
  const table = new Table({
    head: ["Step", "Command", "Target", "Status", "Time"],
    // Plain output; colour codes would end up in redirected files
    style: { head: [], border: [] },
  });

  for (const [index, step] of result.step_results.entries()) {
    table.push([
      String(index),
      step.command,
      step.target,
      statusLabel(step.status),
      `${step.timing.total_ms}ms`,
    ]);
  }

  return [
    `Scenario: ${result.name ?? "<unnamed>"}`,
    `Overall: ${statusLabel(result.overall_status)}`,
    table.toString(),
  ].join("\n");
}

/**
 * 0 for pass and skip, 1 for fail, 2 for error
 */
export function exitCodeFor(status: Status): number {
  switch (status) {
    case Status.Pass:
    case Status.Skip:
      return 0;
    case Status.Fail:
      return 1;
    case Status.Error:
      return 2;
  }
}
