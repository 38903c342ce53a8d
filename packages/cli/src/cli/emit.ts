// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { emitEvent } from "../engine/emit.js";

import { reportResult } from "./_utils/output.js";
import { createRuntime } from "./_utils/runtime.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeEmitCommand() {
  return new Command("emit")
    .description("Emit a desktop event (tray-click, deep-link, file-drop, app-focus)")
    .argument("<event>", "Event name")
    .option("--payload <json>", "Event payload (accepted, not yet delivered)", "{}")
    .option("--json", "Print the result as JSON")
    .action(
      withErrorHandling(async (event, options) => {
        const { context } = await createRuntime();
        context.logger.debug({ event, payload: options.payload }, "Emit requested");
        reportResult(emitEvent(event, context.headless), options.json ?? false);
      })
    );
}
