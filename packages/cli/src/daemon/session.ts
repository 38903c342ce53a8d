// pattern: Mixed (unavoidable)
// Line buffering is interleaved with stream I/O

import { type DaemonDeps, handleRequestLine } from "./protocol.js";

import type { Readable, Writable } from "node:stream";
import type { Logger } from "pino";

export type SessionEnd = "input_closed" | "write_failed";

/**
 * Serves one connection: requests are answered strictly in order and the next
 * line is not read until the previous response has been written.
 */
export class LineSession {
  private inputBuffer = "";
  private readonly logger: Logger;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    private readonly deps: DaemonDeps
  ) {
    this.logger = deps.context.logger.child({ component: "daemon" });
  }

  /**
   * Resolves once the client closes its side or a response cannot be written
   */
  async run(): Promise<SessionEnd> {
    this.input.setEncoding("utf8");

    for await (const chunk of this.input) {
      this.inputBuffer += typeof chunk === "string" ? chunk : String(chunk);

      let newlineIndex: number;
      while ((newlineIndex = this.inputBuffer.indexOf("\n")) !== -1) {
        const line = this.inputBuffer.slice(0, newlineIndex);
        this.inputBuffer = this.inputBuffer.slice(newlineIndex + 1);
        if (!(await this.handleLine(line))) {
          return "write_failed";
        }
      }
    }

    // A final request without a trailing newline still gets an answer
    const rest = this.inputBuffer;
    this.inputBuffer = "";
    if (!(await this.handleLine(rest))) {
      return "write_failed";
    }
    return "input_closed";
  }

  private async handleLine(raw: string): Promise<boolean> {
    const line = raw.replace(/\r$/, "");
    if (!line.trim()) {
      return true;
    }

    this.logger.trace({ line }, "Request received");
    const response = await handleRequestLine(line, this.deps);
    return this.write(`${JSON.stringify(response)}\n`);
  }

  private write(text: string): Promise<boolean> {
    return new Promise(resolve => {
      if (this.output.destroyed || !this.output.writable) {
        this.logger.warn("Client went away before the response was written");
        resolve(false);
        return;
      }
      this.output.write(text, error => {
        if (error) {
          this.logger.warn({ err: error }, "Failed to write response");
          resolve(false);
        } else {
          resolve(true);
        }
      });
    });
  }
}
