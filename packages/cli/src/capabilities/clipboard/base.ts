// pattern: Mixed (unavoidable)
// Abstract base for clipboard backends. Concrete backends may shell out.

import type { ClipboardProvider } from "../types.js";
import type { Logger } from "pino";

export abstract class ClipboardImplementation implements ClipboardProvider {
  protected logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  abstract readText(): Promise<string>;

  abstract writeText(text: string): Promise<void>;

  /**
   * Human-readable backend name
   */
  abstract get name(): string;
}
