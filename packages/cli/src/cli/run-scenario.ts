// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import {
  exitCodeFor,
  renderJson,
  renderScenarioHuman,
  writeScenarioArtifacts,
} from "../output/index.js";
import {
  loadScenario,
  runScenario,
  type Scenario,
  scenarioLoadFailure,
} from "../scenario/index.js";
import { ScenarioLoadError } from "../utils/errors.js";

import { printLine, reportResult } from "./_utils/output.js";
import { createRuntime } from "./_utils/runtime.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeRunScenarioCommand() {
  return new Command("run-scenario")
    .description("Run a scripted scenario (YAML, JSON or TOML)")
    .argument("<file>", "Scenario file")
    .option("--artifacts <dir>", "Write result.json and events.jsonl under DIR/<run_id>")
    .option("--json", "Print the scenario result as JSON")
    .action(
      withErrorHandling(async (file, options) => {
        const json = options.json ?? false;
        const { context, registry, logger } = await createRuntime();

        let scenario: Scenario;
        try {
          scenario = await loadScenario(file);
        } catch (error) {
          if (error instanceof ScenarioLoadError) {
            reportResult(scenarioLoadFailure(file, error), json);
            return;
          }
          throw error;
        }

        let result = await runScenario(scenario, registry, context);
        if (options.artifacts) {
          result = await writeScenarioArtifacts(options.artifacts, result, logger);
        }

        printLine(json ? renderJson(result) : renderScenarioHuman(result));
        process.exitCode = exitCodeFor(result.overall_status);
      })
    );
}
