import type { CredentialStore } from "@credforge/credential-store";
import { InvalidArgumentError, NotFoundError } from "@credforge/errors";
import type { OrderCreds, RetryAfterConfig, TimeLimitedV2Creds } from "@credforge/types";
import { encodeIssuerName } from "./issuer-name.js";
import { getRetryAfterSeconds } from "./retry-after.js";

export interface CredentialQueryDependencies {
  store: CredentialStore;
  retryAfter: RetryAfterConfig;
  now?: () => Date;
}

export interface GetItemCredentialsInput {
  orderId: string;
  itemId: string;
  requestId: string;
}

export type ItemCredentials =
  | { status: "pending"; retryAfterSeconds: number }
  | { status: "ready"; credentialType: "single-use"; creds: OrderCreds }
  | { status: "ready"; credentialType: "time-limited-v2"; creds: TimeLimitedV2Creds };

async function pending(deps: CredentialQueryDependencies): Promise<ItemCredentials> {
  return {
    status: "pending",
    retryAfterSeconds: await getRetryAfterSeconds(deps.store, deps.retryAfter),
  };
}

/**
 * Polls for the signed credentials of one order item. While the signer has
 * not answered the result is `pending` with a retry-after hint.
 */
export async function getItemCredentials(
  input: GetItemCredentialsInput,
  deps: CredentialQueryDependencies,
): Promise<ItemCredentials> {
  const { orderId, itemId, requestId } = input;
  const now = deps.now ?? (() => new Date());

  const order = await deps.store.getOrder(orderId);
  if (!order) {
    throw new NotFoundError(`Order ${orderId} not found`, { details: { orderId } });
  }
  const item = order.items.find((candidate) => candidate.id === itemId);
  if (!item) {
    throw new NotFoundError(`Item ${itemId} not found on order ${orderId}`, {
      details: { orderId, itemId },
    });
  }

  switch (item.credentialType) {
    case "single-use": {
      const creds = await deps.store.getOrderCreds(itemId);
      if (creds) {
        return { status: "ready", credentialType: "single-use", creds };
      }
      const outbox = await deps.store.getSigningRequest(requestId);
      if (!outbox) {
        throw new NotFoundError(`Signing request ${requestId} not found`, {
          details: { requestId },
        });
      }
      return pending(deps);
    }

    case "time-limited-v2": {
      const outbox = await deps.store.getSigningRequest(requestId);
      if (!outbox) {
        throw new NotFoundError(`Signing request ${requestId} not found`, {
          details: { requestId },
        });
      }
      if (outbox.orderId !== orderId) {
        throw new InvalidArgumentError(
          `Signing request ${requestId} does not belong to order ${orderId}`,
        );
      }
      if (outbox.completedAt === null) {
        return pending(deps);
      }

      const issuerName = encodeIssuerName(order.merchantId, item.sku);
      const issuer = await deps.store.getIssuerByName(issuerName);
      if (!issuer) {
        throw new NotFoundError(`Issuer ${issuerName} not found`, { details: { issuerName } });
      }

      const credentials = await deps.store.getActiveTimeLimitedV2Creds(
        orderId,
        itemId,
        requestId,
        now(),
      );
      return {
        status: "ready",
        credentialType: "time-limited-v2",
        creds: { orderId, issuerId: issuer.id, credentials },
      };
    }

    case "time-limited":
      throw new InvalidArgumentError(`Item ${itemId} does not issue signed credentials`);
  }
}
