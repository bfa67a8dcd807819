import type { Logger } from "./logger.js";

/**
 * Sink for failures that an operator should see even though the pipeline
 * carries on (partial publish failures, dead-lettered messages).
 */
export interface ErrorReporter {
  captureException(err: unknown, context?: Record<string, unknown>): void;
}

export function createLogErrorReporter(logger: Logger): ErrorReporter {
  return {
    captureException(err, context) {
      logger.error({ err, ...context, reported: true }, "captured exception");
    },
  };
}
