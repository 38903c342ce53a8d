// pattern: Imperative Shell
// Clipboard backed by the platform's command-line utilities.

import { CapabilityError } from "../../utils/errors.js";
import {
  classifyCommandFailure,
  type CommandFailure,
  createCommand,
} from "../../utils/command/index.js";

import { ClipboardImplementation } from "./base.js";
import { type ClipboardTool, type ClipboardToolset, describeTools, getClipboardTools } from "./tools.js";

import type { Logger } from "pino";

export class SystemClipboard extends ClipboardImplementation {
  readonly name = "system";
  private readonly tools: ClipboardToolset | null;

  constructor(logger: Logger, tools: ClipboardToolset | null = getClipboardTools()) {
    super(logger);
    this.tools = tools;
  }

  async readText(): Promise<string> {
    return this.firstWorking(this.toolsFor("read"), tool =>
      createCommand(tool.command, this.logger).addArgs(tool.args).output()
    );
  }

  // xclip forks a child that keeps serving the selection on the inherited
  // stdio, so a write waits on the tool's exit status only
  async writeText(text: string): Promise<void> {
    await this.firstWorking(this.toolsFor("write"), tool =>
      createCommand(tool.command, this.logger)
        .addArgs(tool.args)
        .input(text)
        .ignoreOutput()
        .output()
    );
  }

  private toolsFor(operation: keyof ClipboardToolset): readonly ClipboardTool[] {
    if (!this.tools) {
      throw new CapabilityError("unsupported", `clipboard not implemented for ${process.platform}`);
    }
    return this.tools[operation];
  }

  /**
   * Try each utility in order and return the first success.
   * All missing: dependency_missing. Any present but failing: other.
   */
  private async firstWorking<T>(
    tools: readonly ClipboardTool[],
    run: (tool: ClipboardTool) => Promise<T>
  ): Promise<T> {
    const failures: CommandFailure[] = [];

    for (const tool of tools) {
      try {
        const result = await run(tool);
        this.logger.debug({ tool: tool.command }, "Clipboard utility succeeded");
        return result;
      } catch (error) {
        const failure = classifyCommandFailure(tool.command, error);
        this.logger.debug({ failure }, "Clipboard utility unavailable, trying next");
        failures.push(failure);
      }
    }

    const failed = failures.find(failure => failure.type === "failed");
    if (failed && failed.type === "failed") {
      const exit = failed.exitCode !== undefined ? ` with code ${failed.exitCode}` : "";
      throw new CapabilityError("other", `${failed.command} exited${exit}: ${failed.message}`);
    }

    throw new CapabilityError("dependency_missing", `none of ${describeTools(tools)} found`);
  }
}
