import { DelayedError } from "bullmq";
import { consumeSignedResult, type ConsumeDependencies } from "@credforge/fulfillment";
import { errorMessage } from "@credforge/errors";
import type { ConsumeOutcome } from "@credforge/types";

export interface SignedResultJob {
  id?: string;
  data: unknown;
  moveToDelayed(timestamp: number, token?: string): Promise<void>;
}

export interface SignedResultProcessorDependencies extends ConsumeDependencies {
  redeliveryDelayMs: number;
  clock?: () => number;
}

/**
 * Signed-result processor.
 *
 * Workflow:
 * 1. Decode and validate the signer's result
 * 2. Persist credentials and complete the outbox row in one transaction
 * 3. Fatal failures are dead-lettered and the job completes
 * 4. Transient failures park the job in the delayed set for redelivery
 */
export function createSignedResultProcessor(deps: SignedResultProcessorDependencies) {
  const clock = deps.clock ?? Date.now;

  return async (job: SignedResultJob, token?: string): Promise<ConsumeOutcome> => {
    const logger = deps.logger.child({ jobId: job.id });

    try {
      return await consumeSignedResult(job.data, { ...deps, logger });
    } catch (err: unknown) {
      if (token === undefined) {
        throw err;
      }

      logger.warn(
        { err, redeliveryDelayMs: deps.redeliveryDelayMs, reason: errorMessage(err) },
        "redelivering signed result",
      );
      await job.moveToDelayed(clock() + deps.redeliveryDelayMs, token);
      throw new DelayedError();
    }
  };
}
