export type JobType = "outbox-dispatch" | "signing-request" | "dead-letter";

export interface OutboxDispatchJobData {
  type: "outbox-dispatch";
  batchSize: number;
}

export interface DeadLetterJobData {
  type: "dead-letter";
  originalQueue: string;
  /** Key of the original message, when it had one. */
  key: string | null;
  failureReason: string;
  payload: unknown;
}

export interface DispatchResult {
  selected: number;
  failed: number;
}

export type ConsumeOutcome =
  | { status: "persisted"; requestId: string; inserted: number; skipped: number }
  | { status: "dead-lettered"; reason: string };
