// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { writeResultArtifacts } from "../output/index.js";
import { PROBE_NAMES, runProbe } from "../probes/index.js";

import { reportResult } from "./_utils/output.js";
import { createRuntime } from "./_utils/runtime.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeProbeCommand() {
  return new Command("probe")
    .description("Run a targeted capability check")
    .argument("<target>", `Probe to run: ${PROBE_NAMES.join(" | ")}`)
    .option("--json", "Print the result as JSON")
    .option("--artifacts <dir>", "Write result.json and events.jsonl under DIR/<run_id>")
    .action(
      withErrorHandling(async (target, options) => {
        const { context, logger } = await createRuntime();
        let result = await runProbe(target, context);

        if (options.artifacts) {
          result = await writeResultArtifacts(options.artifacts, result, logger);
        }
        reportResult(result, options.json ?? false);
      })
    );
}
