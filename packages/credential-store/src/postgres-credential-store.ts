import { and, asc, desc, eq, gt, inArray, isNotNull, isNull, sql } from "drizzle-orm";
import {
  orderCredIssuers,
  orderCreds,
  orderItems,
  orders,
  signingOrderRequestOutbox,
  timeLimitedV2OrderCreds,
  type DbExecutor,
} from "@credforge/db";
import { ConflictError, InvalidArgumentError } from "@credforge/errors";
import type {
  AreTimeLimitedV2CredsSubmittedResult,
  Issuer,
  NewSigningOrderRequestOutbox,
  Order,
  OrderCreds,
  SigningOrderRequestOutbox,
  TimeAwareSubIssuedCreds,
} from "@credforge/types";
import type { CredentialStore, CredentialStoreTx } from "./credential-store.js";

type OutboxRow = typeof signingOrderRequestOutbox.$inferSelect;
type OrderCredsRow = typeof orderCreds.$inferSelect;
type TimeLimitedV2Row = typeof timeLimitedV2OrderCreds.$inferSelect;

type SubmissionRow = {
  already_submitted: boolean;
  mismatch: boolean;
};

function toOutbox(row: OutboxRow): SigningOrderRequestOutbox {
  return {
    requestId: row.requestId,
    orderId: row.orderId,
    itemId: row.itemId,
    message: row.messageData,
    createdAt: row.createdAt,
    submittedAt: row.submittedAt,
    completedAt: row.completedAt,
  };
}

function toOrderCreds(row: OrderCredsRow): OrderCreds {
  return {
    id: row.itemId,
    orderId: row.orderId,
    issuerId: row.issuerId,
    blindedCreds: row.blindedCreds,
    signedCreds: row.signedCreds,
    batchProof: row.batchProof,
    publicKey: row.publicKey,
  };
}

function toTimeAware(row: TimeLimitedV2Row): TimeAwareSubIssuedCreds {
  return {
    orderId: row.orderId,
    itemId: row.itemId,
    issuerId: row.issuerId,
    requestId: row.requestId,
    blindedCreds: row.blindedCreds,
    signedCreds: row.signedCreds,
    batchProof: row.batchProof,
    publicKey: row.publicKey,
    validFrom: row.validFrom,
    validTo: row.validTo,
  };
}

/**
 * Postgres-backed store. Constructed over the client, or over a transaction
 * by {@link withTransaction}; every query runs on whichever it was given.
 */
export class PostgresCredentialStore implements CredentialStore {
  constructor(private readonly db: DbExecutor) {}

  async withTransaction<T>(fn: (tx: CredentialStoreTx) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new PostgresCredentialStore(tx)));
  }

  // ---------- Orders ----------

  async getOrder(orderId: string): Promise<Order | null> {
    const [order] = await this.db.select().from(orders).where(eq(orders.id, orderId)).limit(1);
    if (!order) {
      return null;
    }

    const items = await this.db
      .select()
      .from(orderItems)
      .where(eq(orderItems.orderId, orderId))
      .orderBy(asc(orderItems.createdAt));

    return {
      ...order,
      items: items.map(({ createdAt: _createdAt, ...item }) => item),
    };
  }

  async getOrderExpiry(orderId: string): Promise<{ expiresAt: Date | null } | null> {
    const [row] = await this.db
      .select({ expiresAt: orders.expiresAt })
      .from(orders)
      .where(eq(orders.id, orderId))
      .limit(1);
    return row ?? null;
  }

  async getIssuerByName(name: string): Promise<Issuer | null> {
    const [issuer] = await this.db
      .select()
      .from(orderCredIssuers)
      .where(eq(orderCredIssuers.name, name))
      .limit(1);
    return issuer ?? null;
  }

  // ---------- Outbox ----------

  async enqueueSigningRequest(row: NewSigningOrderRequestOutbox): Promise<void> {
    const inserted = await this.db
      .insert(signingOrderRequestOutbox)
      .values({
        requestId: row.requestId,
        orderId: row.orderId,
        itemId: row.itemId,
        messageData: row.message,
      })
      .onConflictDoNothing()
      .returning({ requestId: signingOrderRequestOutbox.requestId });

    if (inserted.length === 0) {
      throw new ConflictError(`Signing request ${row.requestId} already exists`, {
        details: { requestId: row.requestId },
      });
    }
  }

  async lockPendingSigningRequests(limit: number): Promise<SigningOrderRequestOutbox[]> {
    const rows = await this.db
      .select()
      .from(signingOrderRequestOutbox)
      .where(isNull(signingOrderRequestOutbox.submittedAt))
      .orderBy(asc(signingOrderRequestOutbox.createdAt))
      .limit(limit)
      .for("update", { skipLocked: true });
    return rows.map(toOutbox);
  }

  async markSigningRequestsSubmitted(requestIds: string[], submittedAt: Date): Promise<number> {
    if (requestIds.length === 0) {
      return 0;
    }
    const updated = await this.db
      .update(signingOrderRequestOutbox)
      .set({ submittedAt })
      .where(inArray(signingOrderRequestOutbox.requestId, requestIds))
      .returning({ requestId: signingOrderRequestOutbox.requestId });
    return updated.length;
  }

  async markSigningRequestCompleted(requestId: string, completedAt: Date): Promise<boolean> {
    const updated = await this.db
      .update(signingOrderRequestOutbox)
      .set({ completedAt })
      .where(
        and(
          eq(signingOrderRequestOutbox.requestId, requestId),
          isNull(signingOrderRequestOutbox.completedAt),
        ),
      )
      .returning({ requestId: signingOrderRequestOutbox.requestId });
    return updated.length > 0;
  }

  async getSigningRequest(requestId: string): Promise<SigningOrderRequestOutbox | null> {
    const [row] = await this.db
      .select()
      .from(signingOrderRequestOutbox)
      .where(eq(signingOrderRequestOutbox.requestId, requestId))
      .limit(1);
    return row ? toOutbox(row) : null;
  }

  async getRecentCompletionDurations(limit: number): Promise<number[]> {
    const rows = await this.db
      .select({
        durationMs: sql<number>`extract(epoch from (${signingOrderRequestOutbox.completedAt} - ${signingOrderRequestOutbox.createdAt})) * 1000`.mapWith(
          Number,
        ),
      })
      .from(signingOrderRequestOutbox)
      .where(isNotNull(signingOrderRequestOutbox.completedAt))
      .orderBy(desc(signingOrderRequestOutbox.completedAt))
      .limit(limit);
    return rows.map((row) => row.durationMs);
  }

  async deleteSigningRequestsForOrder(orderId: string): Promise<number> {
    const deleted = await this.db
      .delete(signingOrderRequestOutbox)
      .where(eq(signingOrderRequestOutbox.orderId, orderId))
      .returning({ requestId: signingOrderRequestOutbox.requestId });
    return deleted.length;
  }

  // ---------- Credentials ----------

  async insertOrderCreds(creds: OrderCreds): Promise<boolean> {
    const inserted = await this.db
      .insert(orderCreds)
      .values({
        itemId: creds.id,
        orderId: creds.orderId,
        issuerId: creds.issuerId,
        blindedCreds: creds.blindedCreds,
        signedCreds: creds.signedCreds,
        batchProof: creds.batchProof,
        publicKey: creds.publicKey,
      })
      .onConflictDoNothing({ target: orderCreds.itemId })
      .returning({ itemId: orderCreds.itemId });
    return inserted.length > 0;
  }

  async getOrderCreds(itemId: string): Promise<OrderCreds | null> {
    const [row] = await this.db
      .select()
      .from(orderCreds)
      .where(eq(orderCreds.itemId, itemId))
      .limit(1);
    return row ? toOrderCreds(row) : null;
  }

  async insertTimeLimitedV2Creds(creds: TimeAwareSubIssuedCreds): Promise<boolean> {
    const inserted = await this.db
      .insert(timeLimitedV2OrderCreds)
      .values(creds)
      .onConflictDoNothing({
        target: [
          timeLimitedV2OrderCreds.itemId,
          timeLimitedV2OrderCreds.requestId,
          timeLimitedV2OrderCreds.validFrom,
          timeLimitedV2OrderCreds.validTo,
        ],
      })
      .returning({ id: timeLimitedV2OrderCreds.id });
    return inserted.length > 0;
  }

  async areTimeLimitedV2CredsSubmitted(
    requestId: string,
    blindedCreds: string[],
  ): Promise<AreTimeLimitedV2CredsSubmittedResult> {
    const [first] = blindedCreds;
    if (first === undefined) {
      throw new InvalidArgumentError("At least one blinded credential is required");
    }

    // Both predicates in one round trip.
    const result = await this.db.execute<SubmissionRow>(sql`
      select
        exists(
          select 1 from ${timeLimitedV2OrderCreds}
          where ${timeLimitedV2OrderCreds.blindedCreds}->>0 = ${first}
        ) as already_submitted,
        exists(
          select 1 from ${timeLimitedV2OrderCreds}
          where ${timeLimitedV2OrderCreds.requestId} = ${requestId}
            and ${timeLimitedV2OrderCreds.blindedCreds}->>0 <> ${first}
        ) as mismatch
    `);

    const [row] = result;
    return {
      alreadySubmitted: row?.already_submitted ?? false,
      mismatch: row?.mismatch ?? false,
    };
  }

  async getActiveTimeLimitedV2Creds(
    orderId: string,
    itemId: string,
    requestId: string,
    now: Date,
  ): Promise<TimeAwareSubIssuedCreds[]> {
    const rows = await this.db
      .select()
      .from(timeLimitedV2OrderCreds)
      .where(
        and(
          eq(timeLimitedV2OrderCreds.orderId, orderId),
          eq(timeLimitedV2OrderCreds.itemId, itemId),
          eq(timeLimitedV2OrderCreds.requestId, requestId),
          gt(timeLimitedV2OrderCreds.validTo, now),
        ),
      )
      .orderBy(asc(timeLimitedV2OrderCreds.validFrom));
    return rows.map(toTimeAware);
  }

  async deleteOrderCreds(orderId: string): Promise<number> {
    const deleted = await this.db
      .delete(orderCreds)
      .where(eq(orderCreds.orderId, orderId))
      .returning({ itemId: orderCreds.itemId });
    return deleted.length;
  }

  async deleteTimeLimitedV2Creds(orderId: string): Promise<number> {
    const deleted = await this.db
      .delete(timeLimitedV2OrderCreds)
      .where(eq(timeLimitedV2OrderCreds.orderId, orderId))
      .returning({ id: timeLimitedV2OrderCreds.id });
    return deleted.length;
  }
}
