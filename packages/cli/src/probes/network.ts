// pattern: Imperative Shell
// dns_resolve -> https_get against the configured probe URL.

import { collectProxyEnv } from "../engine/environment.js";
import { newRunId, resultErr, resultOk, startTimer } from "../engine/result.js";
import { ErrorCode, type ExecutionResult } from "../engine/types.js";

import { ProbeSteps, StepFailure } from "./steps.js";
import { PROBE_COMMAND } from "./types.js";

import type { ExecutionContext } from "../engine/context.js";

/**
 * Host part of a URL: scheme and everything from the first slash removed
 */
export function hostFromUrl(url: string): string {
  const withoutScheme = url.replace(/^https?:\/\//, "");
  return withoutScheme.split("/")[0] ?? withoutScheme;
}

export async function runNetworkProbe(
  context: ExecutionContext
): Promise<ExecutionResult> {
  const runId = newRunId();
  const elapsed = startTimer();
  const logger = context.logger.child({ component: "probe", probe: "network", runId });
  const steps = new ProbeSteps(logger);
  const { probeUrl, timeoutMs } = context.config.network;

  const shell = () => ({
    command: PROBE_COMMAND,
    target: "network",
    runId,
    totalMs: elapsed(),
    steps: steps.timings,
  });

  let addresses: string[];
  try {
    addresses = await steps.run("dns_resolve", () =>
      context.network.dnsResolve(hostFromUrl(probeUrl))
    );
  } catch (error) {
    if (!(error instanceof StepFailure)) throw error;
    return resultErr(shell(), ErrorCode.NetworkError, `DNS resolution failed: ${error.detail}`);
  }

  try {
    const response = await steps.run("https_get", () =>
      context.network.httpsGet(probeUrl, timeoutMs)
    );
    return resultOk(shell(), {
      dns_addresses: addresses,
      http_status: response.status,
      target_url: probeUrl,
      proxy_env: collectProxyEnv(),
    });
  } catch (error) {
    if (!(error instanceof StepFailure)) throw error;
    const code = error.kind === "timeout" ? ErrorCode.Timeout : ErrorCode.NetworkError;
    return resultErr(shell(), code, `HTTPS GET failed: ${error.detail}`);
  }
}
