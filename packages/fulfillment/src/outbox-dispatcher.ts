import type { CredentialStore, CredentialStoreTx } from "@credforge/credential-store";
import { DataIntegrityError } from "@credforge/errors";
import type { ErrorReporter, Logger } from "@credforge/logger";
import type { PublishReport, SigningRequestWriter } from "@credforge/queue";
import type { DispatchResult, SigningOrderRequestOutbox } from "@credforge/types";

export interface DispatchDependencies {
  store: CredentialStore;
  writer: SigningRequestWriter;
  logger: Logger;
  errorReporter: ErrorReporter;
  now?: () => Date;
}

async function publish(
  rows: SigningOrderRequestOutbox[],
  deps: DispatchDependencies,
): Promise<PublishReport> {
  const report = await deps.writer.writeMessages(rows.map((row) => row.message));

  if (report.failed.length > 0) {
    const requestIds = report.failed.map((failure) => failure.requestId);
    const [firstFailure] = report.failed;

    deps.logger.error(
      { requestIds, failed: report.failed.length, batch: rows.length, err: firstFailure?.error },
      "failed to publish signing requests; batch is still marked submitted",
    );
    deps.errorReporter.captureException(firstFailure?.error, {
      operation: "outbox-dispatch",
      requestIds,
    });
  }

  return report;
}

async function markSubmitted(
  tx: CredentialStoreTx,
  rows: SigningOrderRequestOutbox[],
  submittedAt: Date,
): Promise<void> {
  const updated = await tx.markSigningRequestsSubmitted(
    rows.map((row) => row.requestId),
    submittedAt,
  );

  if (updated !== rows.length) {
    throw new DataIntegrityError(
      `Marked ${String(updated)} of ${String(rows.length)} signing requests as submitted`,
      { details: { updated, selected: rows.length } },
    );
  }
}

/**
 * Outbox dispatch: Lock -> Publish || Mark -> Commit
 *
 * Selects up to `batchSize` unsubmitted signing requests under
 * FOR UPDATE SKIP LOCKED, publishes them and marks them submitted in the
 * same transaction. Publishing and marking run concurrently; the commit
 * waits for both. A crash before commit republishes the batch, which the
 * signer and the result consumer tolerate.
 */
export async function dispatchSigningRequests(
  batchSize: number,
  deps: DispatchDependencies,
): Promise<DispatchResult> {
  const now = deps.now ?? (() => new Date());

  return deps.store.withTransaction(async (tx) => {
    const rows = await tx.lockPendingSigningRequests(batchSize);
    if (rows.length === 0) {
      return { selected: 0, failed: 0 };
    }

    const [report] = await Promise.all([publish(rows, deps), markSubmitted(tx, rows, now())]);

    deps.logger.debug(
      { selected: rows.length, published: report.published, failed: report.failed.length },
      "dispatched signing requests",
    );

    return { selected: rows.length, failed: report.failed.length };
  });
}
