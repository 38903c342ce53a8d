// pattern: Imperative Shell
// Steps run strictly in order and every step runs, whatever came before.

import { Status, type ExecutionResult, type ScenarioResult } from "../engine/types.js";
import { runProbe } from "../probes/runner.js";

import type { Scenario } from "./types.js";
import type { CommandRegistry } from "../commands/registry.js";
import type { ExecutionContext } from "../engine/context.js";

export async function runScenario(
  scenario: Scenario,
  registry: CommandRegistry,
  context: ExecutionContext
): Promise<ScenarioResult> {
  const logger = context.logger.child({ component: "scenario" });
  const stepResults: ExecutionResult[] = [];
  let overall: ScenarioResult["overall_status"] = Status.Pass;

  logger.debug({ name: scenario.name, steps: scenario.steps.length }, "Running scenario");

  for (const [index, step] of scenario.steps.entries()) {
    if (step.kind === "call") {
      const result = await registry.execute(step.call, step.args, context);
      if (result.status !== step.expect_status) {
        logger.warn(
          { step: index, command: step.call, expected: step.expect_status, actual: result.status },
          "Scenario step status mismatch"
        );
        overall = Status.Fail;
      }
      stepResults.push(result);
    } else {
      const result = await runProbe(step.probe, context);
      if (result.status !== Status.Pass && result.status !== Status.Skip) {
        logger.warn(
          { step: index, probe: step.probe, actual: result.status },
          "Scenario probe did not pass"
        );
        overall = Status.Fail;
      }
      stepResults.push(result);
    }
  }

  return {
    ...(scenario.name !== undefined && { name: scenario.name }),
    overall_status: overall,
    step_results: stepResults,
  };
}
