import type { CredentialStore, CredentialStoreTx } from "@credforge/credential-store";
import {
  DataIntegrityError,
  NotFoundError,
  UpstreamStatusError,
  errorMessage,
  isFatalForMessage,
} from "@credforge/errors";
import type { ErrorReporter, Logger } from "@credforge/logger";
import type { DeadLetterWriter } from "@credforge/queue";
import type {
  ConsumeOutcome,
  SignedOrder,
  SigningMetadata,
  SigningOrderResult,
} from "@credforge/types";
import { decodeSigningMetadata, decodeSigningOrderResult, peekRequestId } from "./codec.js";

export interface ConsumeDependencies {
  store: CredentialStore;
  deadLetter: DeadLetterWriter;
  logger: Logger;
  errorReporter: ErrorReporter;
  /** Name of the queue the payload came from, recorded on dead letters. */
  sourceQueue: string;
  now?: () => Date;
}

interface ValidatedItem {
  metadata: SigningMetadata;
  signed: SignedOrder;
}

interface PersistCounts {
  inserted: number;
  skipped: number;
}

function validateItem(signed: SignedOrder, logger: Logger): ValidatedItem {
  const metadata = decodeSigningMetadata(signed.associated_data);

  if (signed.status !== "ok") {
    logger.error(
      {
        orderId: metadata.orderId,
        itemId: metadata.itemId,
        issuerId: metadata.issuerId,
        status: signed.status,
      },
      "signer returned a non-ok status",
    );
    throw new UpstreamStatusError(
      `Signing failed for item ${metadata.itemId} with status ${signed.status}`,
      signed.status,
      { details: { orderId: metadata.orderId, itemId: metadata.itemId } },
    );
  }

  if (signed.blinded_tokens.length === 0 || signed.signed_tokens.length === 0) {
    throw new DataIntegrityError(`Empty token list for item ${metadata.itemId}`, {
      details: { orderId: metadata.orderId, itemId: metadata.itemId },
    });
  }

  return { metadata, signed };
}

function parseWindowBound(value: string | null, field: string, itemId: string): Date {
  if (value === null) {
    throw new DataIntegrityError(`Missing ${field} for item ${itemId}`);
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new DataIntegrityError(`Unparsable ${field} "${value}" for item ${itemId}`);
  }
  return date;
}

async function persistSingleUse(
  tx: CredentialStoreTx,
  { metadata, signed }: ValidatedItem,
  logger: Logger,
): Promise<boolean> {
  const inserted = await tx.insertOrderCreds({
    id: metadata.itemId,
    orderId: metadata.orderId,
    issuerId: metadata.issuerId,
    blindedCreds: signed.blinded_tokens,
    signedCreds: signed.signed_tokens,
    batchProof: signed.proof,
    publicKey: signed.public_key,
  });

  if (!inserted) {
    logger.warn(
      { orderId: metadata.orderId, itemId: metadata.itemId },
      "single-use credentials already stored for item; skipping",
    );
  }
  return inserted;
}

async function persistTimeLimitedV2(
  tx: CredentialStoreTx,
  requestId: string,
  { metadata, signed }: ValidatedItem,
): Promise<boolean> {
  const validFrom = parseWindowBound(signed.valid_from, "valid_from", metadata.itemId);
  const validTo = parseWindowBound(signed.valid_to, "valid_to", metadata.itemId);

  const order = await tx.getOrderExpiry(metadata.orderId);
  if (!order) {
    throw new NotFoundError(`Order ${metadata.orderId} not found`, {
      details: { orderId: metadata.orderId },
    });
  }

  // Credentials never start after the order has lapsed.
  if (order.expiresAt === null || validFrom.getTime() > order.expiresAt.getTime()) {
    return false;
  }

  return tx.insertTimeLimitedV2Creds({
    orderId: metadata.orderId,
    itemId: metadata.itemId,
    issuerId: metadata.issuerId,
    requestId,
    blindedCreds: signed.blinded_tokens,
    signedCreds: signed.signed_tokens,
    batchProof: signed.proof,
    publicKey: signed.public_key,
    validFrom,
    validTo,
  });
}

async function persistSignedResult(
  result: SigningOrderResult,
  deps: ConsumeDependencies,
  logger: Logger,
): Promise<PersistCounts> {
  if (result.data.length === 0) {
    throw new DataIntegrityError(`Signing result ${result.request_id} has no items`);
  }

  const items = result.data.map((signed) => validateItem(signed, logger));
  const now = deps.now ?? (() => new Date());

  return deps.store.withTransaction(async (tx) => {
    const counts: PersistCounts = { inserted: 0, skipped: 0 };

    for (const item of items) {
      let inserted: boolean;
      switch (item.metadata.credential_type) {
        case "single-use":
          inserted = await persistSingleUse(tx, item, logger);
          break;
        case "time-limited-v2":
          inserted = await persistTimeLimitedV2(tx, result.request_id, item);
          break;
        default:
          throw new DataIntegrityError(
            `Unsupported credential type ${item.metadata.credential_type} for item ${item.metadata.itemId}`,
          );
      }

      if (inserted) {
        counts.inserted++;
      } else {
        counts.skipped++;
      }
    }

    await tx.markSigningRequestCompleted(result.request_id, now());
    return counts;
  });
}

/**
 * Signed-result consumption: Decode -> Validate -> Persist -> Ack
 *
 * Resolves once the message may be acknowledged: its credentials are stored,
 * or it was dead-lettered because no redelivery can fix it. Rejects with the
 * original error when the failure is transient so the message is redelivered.
 */
export async function consumeSignedResult(
  payload: unknown,
  deps: ConsumeDependencies,
): Promise<ConsumeOutcome> {
  const requestId = peekRequestId(payload);
  const logger = deps.logger.child({ requestId });

  try {
    const result = decodeSigningOrderResult(payload);
    const counts = await persistSignedResult(result, deps, logger);

    logger.info(counts, "stored signed credentials");
    return { status: "persisted", requestId: result.request_id, ...counts };
  } catch (err: unknown) {
    if (!isFatalForMessage(err)) {
      logger.warn({ err }, "transient failure storing signed credentials; will redeliver");
      throw err;
    }

    const reason = errorMessage(err);
    await deps.deadLetter.write({
      originalQueue: deps.sourceQueue,
      key: requestId,
      failureReason: reason,
      payload,
    });

    logger.error({ err }, "signed result dead-lettered");
    deps.errorReporter.captureException(err, { operation: "consume-signed-result", requestId });
    return { status: "dead-lettered", reason };
  }
}
