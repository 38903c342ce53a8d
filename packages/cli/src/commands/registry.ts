// pattern: Mixed (unavoidable)
// Dispatch wraps every handler with identity, timing and error translation.

import { resultErr, resultOk, newRunId, startTimer } from "../engine/result.js";
import { ErrorCode, type ExecutionResult } from "../engine/types.js";
import { CapabilityError, CommandError, type CommandErrorKind } from "../utils/errors.js";

import { BUILTIN_COMMANDS } from "./builtins.js";

import type { CommandHandler } from "./types.js";
import type { ExecutionContext } from "../engine/context.js";

export const CALL_COMMAND = "call";

const ERROR_CODES: Record<CommandErrorKind, ErrorCode> = {
  invalid_input: ErrorCode.InvalidInput,
  io: ErrorCode.IoError,
  permission_denied: ErrorCode.PermissionDenied,
  other: ErrorCode.InternalError,
};

function toCommandError(error: unknown): CommandError {
  if (error instanceof CommandError) {
    return error;
  }
  if (error instanceof CapabilityError) {
    return CommandError.fromCapability(error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CommandError("other", message);
}

export class CommandRegistry {
  private readonly handlers = new Map<string, CommandHandler>();

  /**
   * A registry preloaded with ping, read_file and write_file
   */
  static withBuiltins(): CommandRegistry {
    const registry = new CommandRegistry();
    for (const [name, handler] of Object.entries(BUILTIN_COMMANDS)) {
      registry.register(name, handler);
    }
    return registry;
  }

  register(name: string, handler: CommandHandler): void {
    this.handlers.set(name, handler);
  }

  list(): string[] {
    return [...this.handlers.keys()].sort();
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  async execute(
    name: string,
    args: unknown,
    context: ExecutionContext
  ): Promise<ExecutionResult> {
    const runId = newRunId();
    const elapsed = startTimer();
    const logger = context.logger.child({ component: "registry", runId });

    const handler = this.handlers.get(name);
    if (!handler) {
      logger.warn({ command: name }, "Unknown command");
      return resultErr(
        { command: CALL_COMMAND, target: name, runId, totalMs: 0 },
        ErrorCode.InvalidInput,
        `unknown command: ${name}`
      );
    }

    logger.debug({ command: name }, "Dispatching command");

    try {
      const data = await handler(args, context);
      const totalMs = elapsed();
      logger.debug({ command: name, totalMs }, "Command completed");
      return resultOk({ command: CALL_COMMAND, target: name, runId, totalMs }, data);
    } catch (error) {
      const totalMs = elapsed();
      const failure = toCommandError(error);
      logger.debug({ command: name, kind: failure.kind, totalMs }, "Command failed");
      return resultErr(
        { command: CALL_COMMAND, target: name, runId, totalMs },
        ERROR_CODES[failure.kind],
        failure.message
      );
    }
  }
}
