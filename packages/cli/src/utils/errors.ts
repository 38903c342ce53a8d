// pattern: Functional Core

/**
 * Base class for appctl errors
 * Subclasses carry a category so the CLI can pick a user-facing message
 */
export abstract class HarnessError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The closed vocabulary every capability operation fails with.
 * Narrower than the wire-level ErrorCode; probes and commands map it onward.
 */
export type CapabilityErrorKind =
  | "unsupported"
  | "dependency_missing"
  | "permission_denied"
  | "io"
  | "network"
  | "timeout"
  | "other";

const CAPABILITY_PREFIXES: Record<CapabilityErrorKind, string> = {
  unsupported: "unsupported",
  dependency_missing: "dependency missing",
  permission_denied: "permission denied",
  io: "io error",
  network: "network error",
  timeout: "timeout",
  other: "",
};

/**
 * Failure raised by a capability provider (filesystem, network, clipboard)
 */
export class CapabilityError extends HarnessError {
  public readonly kind: CapabilityErrorKind;
  public readonly detail: string;

  constructor(kind: CapabilityErrorKind, detail = "") {
    const prefix = CAPABILITY_PREFIXES[kind];
    let message = detail;
    if (kind === "timeout") {
      message = detail ? `timeout: ${detail}` : "timeout";
    } else if (prefix) {
      message = `${prefix}: ${detail}`;
    }
    super("capability", message);
    this.kind = kind;
    this.detail = detail;
  }
}

export type CommandErrorKind =
  | "invalid_input"
  | "io"
  | "permission_denied"
  | "other";

/**
 * Failure raised by a command handler
 */
export class CommandError extends HarnessError {
  public readonly kind: CommandErrorKind;

  constructor(kind: CommandErrorKind, message: string) {
    super("command", message);
    this.kind = kind;
  }

  static invalidInput(detail: string): CommandError {
    return new CommandError("invalid_input", `invalid input: ${detail}`);
  }

  /**
   * Translate a capability failure into the command-level vocabulary
   */
  static fromCapability(error: CapabilityError): CommandError {
    switch (error.kind) {
      case "permission_denied":
        return new CommandError("permission_denied", error.message);
      case "io":
        return new CommandError("io", error.message);
      default:
        return new CommandError("other", error.message);
    }
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends HarnessError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * A scenario document could not be read or does not describe a scenario
 */
export class ScenarioLoadError extends HarnessError {
  public readonly reason: "io" | "invalid";

  constructor(reason: "io" | "invalid", message: string) {
    super("scenario", message);
    this.reason = reason;
  }
}

/**
 * Errors related to the harness configuration file or environment overrides
 */
export class ConfigurationError extends HarnessError {
  public readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super("configuration", message);
    if (configPath) {
      this.configPath = configPath;
    }
  }
}

/**
 * Errors raised while serving the daemon socket
 */
export class DaemonError extends HarnessError {
  public readonly socketPath?: string;

  constructor(message: string, socketPath?: string) {
    super("daemon", message);
    if (socketPath) {
      this.socketPath = socketPath;
    }
  }
}
