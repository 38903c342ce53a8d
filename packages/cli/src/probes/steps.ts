// pattern: Mixed (unavoidable)

import { startTimer } from "../engine/result.js";
import { ErrorCode } from "../engine/types.js";
import { CapabilityError, type CapabilityErrorKind } from "../utils/errors.js";

import type { Logger } from "pino";

/**
 * A probe step rejected. Carries the step name and the original error.
 */
export class StepFailure extends Error {
  readonly step: string;
  readonly error: unknown;

  constructor(step: string, error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    super(`${step}: ${detail}`);
    this.name = "StepFailure";
    this.step = step;
    this.error = error;
  }

  get kind(): CapabilityErrorKind | undefined {
    return this.error instanceof CapabilityError ? this.error.kind : undefined;
  }

  get detail(): string {
    return this.error instanceof Error ? this.error.message : String(this.error);
  }
}

/**
 * Times each named step of a probe into a TimingInfo.steps map
 */
export class ProbeSteps {
  readonly timings: Record<string, number> = {};
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async run<T>(step: string, operation: () => Promise<T>): Promise<T> {
    const elapsed = startTimer();
    try {
      return await operation();
    } catch (error) {
      throw new StepFailure(step, error);
    } finally {
      const ms = elapsed();
      this.timings[step] = ms;
      this.logger.debug({ step, ms }, "Probe step finished");
    }
  }
}

/**
 * Default mapping from a capability failure to a wire error code
 */
export function errorCodeFor(kind: CapabilityErrorKind | undefined): ErrorCode {
  switch (kind) {
    case "permission_denied":
      return ErrorCode.PermissionDenied;
    case "io":
      return ErrorCode.IoError;
    case "network":
      return ErrorCode.NetworkError;
    case "timeout":
      return ErrorCode.Timeout;
    case "unsupported":
      return ErrorCode.Unsupported;
    case "dependency_missing":
      return ErrorCode.DependencyMissing;
    default:
      return ErrorCode.InternalError;
  }
}
