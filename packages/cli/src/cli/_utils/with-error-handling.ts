// pattern: Imperative Shell

import { getCliLogger } from "../../logger/index.js";

import { analyzeError } from "./error-analysis.js";

/** Exit code for failures that never produced a result */
export const ERROR_EXIT_CODE = 2;

/**
 * Wraps a Commander action: errors are analysed, logged with suggestions,
 * and turned into exit code 2.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const logger = getCliLogger();
      const analyzed = analyzeError(error);

      logger.error(analyzed.userMessage);
      for (const suggestion of analyzed.suggestions) {
        logger.error(`  • ${suggestion}`);
      }

      if (logger.isLevelEnabled("debug")) {
        logger.debug(analyzed.technicalMessage);
        if (error instanceof Error && error.stack) {
          logger.debug(error.stack);
        }
      }

      logger.flush();
      process.exitCode = ERROR_EXIT_CODE;
    }
  };
}
