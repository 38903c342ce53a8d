// pattern: Mixed (unavoidable)
// Running external utilities couples argument building with process I/O
import { execa, ExecaError, type Options } from "execa";

import type { Logger } from "pino";

/**
 * Why an external utility did not produce output
 */
export type CommandFailure =
  | { type: "not_found"; command: string }
  | { type: "failed"; command: string; exitCode?: number; message: string };

/**
 * Classify an error thrown by CommandBuilder.output()
 */
export function classifyCommandFailure(
  command: string,
  error: unknown
): CommandFailure {
  if (error instanceof ExecaError) {
    if (error.code === "ENOENT") {
      return { type: "not_found", command };
    }
    return {
      type: "failed",
      command,
      ...(error.exitCode !== undefined && { exitCode: error.exitCode }),
      message: error.shortMessage,
    };
  }
  return {
    type: "failed",
    command,
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Fluent builder for external utilities with logging integration.
 * stderr from the child is logged at DEBUG level.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private childLogger: Logger;
  private stdinText?: string;
  private timeoutMs?: number;
  private discardOutput = false;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];

    // Process name is the last path segment without its extension
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add a command argument
   */
  arg(arg: string): this {
    this.args.push(arg);
    return this;
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: readonly string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Text written to the child's stdin
   */
  input(text: string): this {
    this.stdinText = text;
    return this;
  }

  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  /**
   * Do not capture stdout or stderr. Completion then depends only on the
   * process exiting, not on every inheritor of its pipes closing them.
   */
  ignoreOutput(): this {
    this.discardOutput = true;
    return this;
  }

  /**
   * Execute the command and return stdout (final newline stripped, empty
   * under ignoreOutput).
   * Rejects with an ExecaError when the binary is missing or exits non-zero.
   */
  async output(): Promise<string> {
    this.childLogger.debug(
      {
        command: this.command,
        argCount: this.args.length,
        hasInput: this.stdinText !== undefined,
        discardOutput: this.discardOutput,
      },
      "Executing command"
    );

    try {
      const options: Options = {
        stderr: this.discardOutput ? "ignore" : "pipe",
        stdout: this.discardOutput ? "ignore" : "pipe",
        ...(this.stdinText !== undefined && { input: this.stdinText }),
        ...(this.timeoutMs !== undefined && { timeout: this.timeoutMs }),
      };

      const result = await execa(this.command, this.args, options);

      if (typeof result.stderr === "string" && result.stderr.trim()) {
        this.childLogger.debug(
          { stderr: result.stderr },
          "Command stderr output"
        );
      }

      this.childLogger.debug(
        {
          exitCode: result.exitCode,
          duration: result.durationMs,
        },
        "Command completed successfully"
      );

      return typeof result.stdout === "string" ? result.stdout : "";
    } catch (error) {
      const failure = classifyCommandFailure(this.command, error);
      this.childLogger.debug(
        {
          failure,
          stderr: error instanceof ExecaError ? error.stderr : undefined,
        },
        "Command execution failed"
      );

      throw error;
    }
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
