import type { Job } from "bullmq";
import { dispatchSigningRequests, type DispatchDependencies } from "@credforge/fulfillment";
import type { DispatchResult, OutboxDispatchJobData } from "@credforge/types";

/**
 * Outbox dispatch processor, run on every tick of the dispatch scheduler.
 * Rows stay unsubmitted when it throws and are picked up on the next tick.
 */
export function createOutboxDispatchProcessor(deps: DispatchDependencies) {
  return async (job: Pick<Job<OutboxDispatchJobData>, "data">): Promise<DispatchResult> => {
    return dispatchSigningRequests(job.data.batchSize, deps);
  };
}
