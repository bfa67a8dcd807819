import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type {
  DeadLetterJobData,
  OutboxDispatchJobData,
  QueueNamesConfig,
  SigningOrderRequest,
} from "@credforge/types";

export const JOB_NAMES = {
  SIGNING_REQUEST: "signing-request",
  OUTBOX_DISPATCH: "outbox-dispatch",
  DEAD_LETTER: "dead-letter",
} as const;

export const OUTBOX_DISPATCH_SCHEDULER_ID = "outbox-dispatch";

export interface QueueConfig {
  connection: ConnectionOptions;
  names: QueueNamesConfig;
}

export function createQueues(config: QueueConfig) {
  const { connection, names } = config;

  // The signer consumes and removes these; keep a short tail for inspection.
  const signingRequestQueue = new Queue<SigningOrderRequest>(names.signingRequests, {
    connection,
    defaultJobOptions: {
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });

  const outboxDispatchQueue = new Queue<OutboxDispatchJobData>(names.outboxDispatch, {
    connection,
    defaultJobOptions: {
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 1000 },
    },
  });

  const deadLetterQueue = new Queue<DeadLetterJobData>(names.deadLetter, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });

  return { signingRequestQueue, outboxDispatchQueue, deadLetterQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export interface OutboxDispatchSchedule {
  intervalMs: number;
  batchSize: number;
}

/**
 * Registers (or updates) the repeating job that triggers an outbox dispatch.
 * Safe to call from every worker process; the scheduler id is shared.
 */
export async function scheduleOutboxDispatch(
  queue: Pick<Queue<OutboxDispatchJobData>, "upsertJobScheduler">,
  schedule: OutboxDispatchSchedule,
): Promise<void> {
  await queue.upsertJobScheduler(
    OUTBOX_DISPATCH_SCHEDULER_ID,
    { every: schedule.intervalMs },
    {
      name: JOB_NAMES.OUTBOX_DISPATCH,
      data: { type: "outbox-dispatch", batchSize: schedule.batchSize },
    },
  );
}

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([
    queues.signingRequestQueue.close(),
    queues.outboxDispatchQueue.close(),
    queues.deadLetterQueue.close(),
  ]);
}
