// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { CALL_COMMAND } from "../commands/index.js";
import { newRunId, resultErr } from "../engine/result.js";
import { ErrorCode } from "../engine/types.js";
import { writeResultArtifacts } from "../output/index.js";

import { parseJsonArgument } from "./_utils/json-args.js";
import { reportResult } from "./_utils/output.js";
import { createRuntime } from "./_utils/runtime.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeCallCommand() {
  return new Command("call")
    .description("Invoke a registered command (see `appctl commands`)")
    .argument("<cmd>", "Command name, e.g. ping, read_file, write_file")
    .option("--args <json>", "JSON arguments for the command", "{}")
    .option("--json", "Print the result as JSON")
    .option("--artifacts <dir>", "Write result.json and events.jsonl under DIR/<run_id>")
    .action(
      withErrorHandling(async (cmd, options) => {
        const parsed = parseJsonArgument(options.args, "args");
        if (!parsed.ok) {
          // The registry is never consulted for unparseable arguments
          reportResult(
            resultErr(
              { command: CALL_COMMAND, target: cmd, runId: newRunId(), totalMs: 0 },
              ErrorCode.InvalidInput,
              parsed.message
            ),
            options.json ?? false
          );
          return;
        }

        const { context, registry, logger } = await createRuntime();
        let result = await registry.execute(cmd, parsed.value, context);

        if (options.artifacts) {
          result = await writeResultArtifacts(options.artifacts, result, logger);
        }
        reportResult(result, options.json ?? false);
      })
    );
}
