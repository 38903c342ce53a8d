// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { formatDoctorReport, runDoctor } from "../doctor/index.js";
import { getCliLogger } from "../logger/index.js";
import { writeResultFile } from "../output/index.js";

import { printLine, reportResult } from "./_utils/output.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDoctorCommand() {
  return new Command("doctor")
    .description("Collect environment facts: OS, user, display, proxies")
    .option("--json", "Print the result as JSON")
    .option("--out <path>", "Also write the result JSON to this file")
    .action(
      withErrorHandling(async options => {
        const logger = getCliLogger();
        const result = await runDoctor(logger);

        if (options.out) {
          await writeResultFile(options.out, result, logger);
        }

        if (options.json) {
          reportResult(result, true);
          return;
        }

        printLine(formatDoctorReport(result.data));
        printLine("");
        printLine(`run_id: ${result.run_id}`);
      })
    );
}
