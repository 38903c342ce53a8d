// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { DaemonServer } from "../daemon/index.js";

import { createRuntime } from "./_utils/runtime.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    process.once("SIGINT", resolve);
    process.once("SIGTERM", resolve);
  });
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeServeCommand() {
  return new Command("serve")
    .description("Serve call, probe and doctor requests over a Unix socket")
    .requiredOption("--socket <path>", "Socket path; a stale file there is replaced")
    .action(
      withErrorHandling(async options => {
        const { context, registry, logger } = await createRuntime();
        const server = new DaemonServer(options.socket, { registry, context });

        await server.start();
        const signal = await waitForShutdownSignal();
        logger.info({ signal }, "Shutting down daemon");
        await server.stop();
      })
    );
}
