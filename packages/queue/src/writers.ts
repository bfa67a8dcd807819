import type { Queue } from "bullmq";
import { TransientError, errorMessage, withRetry } from "@credforge/errors";
import type { DeadLetterJobData, SigningOrderRequest } from "@credforge/types";
import { JOB_NAMES } from "./queues.js";

export interface PublishFailure {
  requestId: string;
  error: unknown;
}

export interface PublishReport {
  published: number;
  failed: PublishFailure[];
}

/** Publishes signing requests to the signer, keyed by request id. */
export interface SigningRequestWriter {
  writeMessages(requests: SigningOrderRequest[]): Promise<PublishReport>;
}

export type DeadLetterEntry = Omit<DeadLetterJobData, "type">;

export interface DeadLetterWriter {
  write(entry: DeadLetterEntry): Promise<void>;
}

export function createSigningRequestWriter(
  queue: Pick<Queue<SigningOrderRequest>, "add">,
): SigningRequestWriter {
  return {
    async writeMessages(requests) {
      const results = await Promise.allSettled(
        requests.map((request) =>
          queue.add(JOB_NAMES.SIGNING_REQUEST, request, { jobId: request.request_id }),
        ),
      );

      const failed: PublishFailure[] = [];
      results.forEach((result, index) => {
        const request = requests[index];
        if (result.status === "rejected" && request) {
          failed.push({ requestId: request.request_id, error: result.reason });
        }
      });

      return { published: requests.length - failed.length, failed };
    },
  };
}

export interface DeadLetterWriterOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Dead-letter writes are retried a few times; if they still fail the error
 * surfaces as a TransientError so the original message is redelivered
 * rather than acknowledged and lost.
 */
export function createDeadLetterWriter(
  queue: Pick<Queue<DeadLetterJobData>, "add">,
  options?: DeadLetterWriterOptions,
): DeadLetterWriter {
  return {
    async write(entry) {
      try {
        await withRetry(
          () => queue.add(JOB_NAMES.DEAD_LETTER, { type: "dead-letter", ...entry }),
          {
            maxRetries: options?.maxRetries ?? 2,
            baseDelayMs: options?.baseDelayMs ?? 200,
            onRetry: options?.onRetry,
          },
        );
      } catch (err: unknown) {
        throw new TransientError(`dead-letter write failed: ${errorMessage(err)}`, {
          details: { originalQueue: entry.originalQueue, key: entry.key },
          cause: err,
        });
      }
    },
  };
}
