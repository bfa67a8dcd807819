export {
  createQueues,
  closeQueues,
  scheduleOutboxDispatch,
  JOB_NAMES,
  OUTBOX_DISPATCH_SCHEDULER_ID,
} from "./queues.js";
export type { Queues, QueueConfig, OutboxDispatchSchedule } from "./queues.js";
export { parseRedisConnection } from "./connection.js";
export { createSigningRequestWriter, createDeadLetterWriter } from "./writers.js";
export type {
  SigningRequestWriter,
  DeadLetterWriter,
  DeadLetterEntry,
  DeadLetterWriterOptions,
  PublishReport,
  PublishFailure,
} from "./writers.js";
