import type { CredentialStore } from "@credforge/credential-store";
import {
  AppError,
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  OrderNotPaidError,
} from "@credforge/errors";
import type { Logger } from "@credforge/logger";
import type { SigningOrderRequest } from "@credforge/types";
import { encodeSigningMetadata } from "./codec.js";
import { encodeIssuerName } from "./issuer-name.js";
import { isOrderPaid } from "./order-status.js";

const ISSUER_COHORT = 1;

export interface IssuanceDependencies {
  store: CredentialStore;
  logger: Logger;
  now?: () => Date;
}

export interface CreateOrderItemCredentialsInput {
  orderId: string;
  itemId: string;
  requestId: string;
  blindedCreds: string[];
}

/**
 * `enqueued`: a new signing request was written.
 * `already-submitted`: these blinded credentials were signed before.
 * `already-enqueued`: a signing request with this id already exists.
 */
export type IssuanceOutcome = "enqueued" | "already-submitted" | "already-enqueued";

export interface OrderCredentialsPurge {
  timeLimitedV2: number;
  singleUse: number;
  signingRequests: number;
}

/**
 * Accepts blinded credentials for a paid order item and records the signing
 * request in the outbox. Dispatch to the signer happens asynchronously.
 */
export async function createOrderItemCredentials(
  input: CreateOrderItemCredentialsInput,
  deps: IssuanceDependencies,
): Promise<IssuanceOutcome> {
  const { orderId, itemId, requestId, blindedCreds } = input;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger.child({ orderId, itemId, requestId });

  if (blindedCreds.length === 0) {
    throw new InvalidArgumentError("At least one blinded credential is required");
  }

  const order = await deps.store.getOrder(orderId);
  if (!order) {
    throw new NotFoundError(`Order ${orderId} not found`, { details: { orderId } });
  }
  if (!isOrderPaid(order, now())) {
    throw new OrderNotPaidError(orderId);
  }

  const item = order.items.find((candidate) => candidate.id === itemId);
  if (!item) {
    throw new NotFoundError(`Item ${itemId} not found on order ${orderId}`, {
      details: { orderId, itemId },
    });
  }

  switch (item.credentialType) {
    case "single-use": {
      const existing = await deps.store.getOrderCreds(itemId);
      if (existing) {
        throw new ConflictError(`Credentials already exist for item ${itemId}`, {
          details: { orderId, itemId },
        });
      }
      break;
    }
    case "time-limited-v2": {
      const submitted = await deps.store.areTimeLimitedV2CredsSubmitted(requestId, blindedCreds);
      if (submitted.alreadySubmitted) {
        logger.info("blinded credentials already submitted");
        return "already-submitted";
      }
      if (submitted.mismatch) {
        throw new ConflictError(
          `Request ${requestId} was already used with different blinded credentials`,
          { details: { orderId, itemId, requestId } },
        );
      }
      break;
    }
    case "time-limited":
      throw new InvalidArgumentError(
        `Item ${itemId} issues time-limited credentials, which are not signed through the outbox`,
      );
  }

  const issuerName = encodeIssuerName(order.merchantId, item.sku);
  const issuer = await deps.store.getIssuerByName(issuerName);
  if (!issuer) {
    throw new NotFoundError(`Issuer ${issuerName} not found`, { details: { issuerName } });
  }

  const message: SigningOrderRequest = {
    request_id: requestId,
    data: [
      {
        associated_data: encodeSigningMetadata({
          orderId,
          itemId,
          issuerId: issuer.id,
          credential_type: item.credentialType,
        }),
        blinded_tokens: blindedCreds,
        issuer_type: issuer.name,
        issuer_cohort: ISSUER_COHORT,
      },
    ],
  };

  try {
    await deps.store.enqueueSigningRequest({ requestId, orderId, itemId, message });
  } catch (err: unknown) {
    if (AppError.isAppError(err) && err.code === "CONFLICT") {
      logger.info("signing request already enqueued");
      return "already-enqueued";
    }
    throw err;
  }

  logger.info({ issuerId: issuer.id }, "signing request enqueued");
  return "enqueued";
}

/** Removes every credential and signing request of an order in one transaction. */
export async function deleteOrderCredentials(
  orderId: string,
  deps: Pick<IssuanceDependencies, "store" | "logger">,
): Promise<OrderCredentialsPurge> {
  const purge = await deps.store.withTransaction(async (tx) => {
    const timeLimitedV2 = await tx.deleteTimeLimitedV2Creds(orderId);
    const singleUse = await tx.deleteOrderCreds(orderId);
    const signingRequests = await tx.deleteSigningRequestsForOrder(orderId);
    return { timeLimitedV2, singleUse, signingRequests };
  });

  deps.logger.info({ orderId, ...purge }, "order credentials deleted");
  return purge;
}
