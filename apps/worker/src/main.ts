import { Worker } from "bullmq";
import { parseEnv } from "@credforge/config";
import { PostgresCredentialStore } from "@credforge/credential-store";
import { closeDbClient, createDbClient } from "@credforge/db";
import { createLogErrorReporter, createLogger } from "@credforge/logger";
import {
  closeQueues,
  createDeadLetterWriter,
  createQueues,
  createSigningRequestWriter,
  parseRedisConnection,
  scheduleOutboxDispatch,
} from "@credforge/queue";
import type { ConsumeOutcome, DispatchResult, OutboxDispatchJobData } from "@credforge/types";
import { createOutboxDispatchProcessor } from "./processors/dispatch-signing-requests.js";
import { createSignedResultProcessor } from "./processors/store-signed-credentials.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "credforge-worker" });
  const errorReporter = createLogErrorReporter(logger);

  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  const store = new PostgresCredentialStore(db);

  const connection = parseRedisConnection(config.redis.url);
  const queues = createQueues({ connection, names: config.queues });

  const dispatchWorker = new Worker<OutboxDispatchJobData, DispatchResult>(
    config.queues.outboxDispatch,
    createOutboxDispatchProcessor({
      store,
      writer: createSigningRequestWriter(queues.signingRequestQueue),
      logger: logger.child({ component: "outbox-dispatcher" }),
      errorReporter,
    }),
    { connection, concurrency: 1 },
  );

  const signedResultWorker = new Worker<unknown, ConsumeOutcome>(
    config.queues.signedResults,
    createSignedResultProcessor({
      store,
      deadLetter: createDeadLetterWriter(queues.deadLetterQueue, {
        onRetry: (err, attempt, delayMs) =>
          logger.warn({ err, attempt, delayMs }, "retrying dead-letter write"),
      }),
      logger: logger.child({ component: "signed-result-consumer" }),
      errorReporter,
      sourceQueue: config.queues.signedResults,
      redeliveryDelayMs: config.consumer.redeliveryDelayMs,
    }),
    { connection, concurrency: config.consumer.concurrency },
  );

  const workers = [dispatchWorker, signedResultWorker];
  for (const worker of workers) {
    worker.on("failed", (job, err) => {
      logger.error({ err, jobId: job?.id, queue: worker.name }, "job failed");
    });
    worker.on("error", (err) => {
      logger.error({ err, queue: worker.name }, "worker error");
    });
  }

  await scheduleOutboxDispatch(queues.outboxDispatchQueue, {
    intervalMs: config.outbox.intervalMs,
    batchSize: config.outbox.batchSize,
  });

  logger.info(
    {
      queues: [config.queues.outboxDispatch, config.queues.signedResults],
      dispatchIntervalMs: config.outbox.intervalMs,
      batchSize: config.outbox.batchSize,
    },
    "worker started",
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutting down; waiting for in-flight jobs");

    // Worker.close() lets the active job's transaction finish first.
    await Promise.all(workers.map((worker) => worker.close()));
    await closeQueues(queues);
    await closeDbClient(db);

    logger.info("worker stopped");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  const logger = createLogger({ service: "credforge-worker" });
  logger.fatal({ err }, "worker failed to start");
  process.exit(1);
});
