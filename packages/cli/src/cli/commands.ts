// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { CommandRegistry } from "../commands/index.js";

import { printLine } from "./_utils/output.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeCommandsCommand() {
  return new Command("commands")
    .description("List the commands `appctl call` accepts")
    .option("--json", "Print the list as a JSON array")
    .action(options => {
      const names = CommandRegistry.withBuiltins().list();
      printLine(options.json ? JSON.stringify(names) : names.join("\n"));
    });
}
