// pattern: Functional Core

import type { ExecutionContext } from "../engine/context.js";

/**
 * A registered command. Resolves with the result payload or rejects with a
 * CommandError; anything else thrown is reported as an internal error.
 */
export type CommandHandler = (
  args: unknown,
  context: ExecutionContext
) => Promise<unknown>;
