import type {
  AreTimeLimitedV2CredsSubmittedResult,
  Issuer,
  NewSigningOrderRequestOutbox,
  Order,
  OrderCreds,
  SigningOrderRequestOutbox,
  TimeAwareSubIssuedCreds,
} from "@credforge/types";

export interface OrderRepository {
  /** The order with its items, or null. */
  getOrder(orderId: string): Promise<Order | null>;
  /** Only the expiry; null when the order does not exist. */
  getOrderExpiry(orderId: string): Promise<{ expiresAt: Date | null } | null>;
}

export interface IssuerRepository {
  getIssuerByName(name: string): Promise<Issuer | null>;
}

export interface OutboxRepository {
  /** Throws ConflictError when the request id already exists. */
  enqueueSigningRequest(row: NewSigningOrderRequestOutbox): Promise<void>;
  /**
   * Oldest unsubmitted rows, locked for the rest of the transaction. Rows
   * locked by other transactions are skipped.
   */
  lockPendingSigningRequests(limit: number): Promise<SigningOrderRequestOutbox[]>;
  /** Returns the number of rows updated. */
  markSigningRequestsSubmitted(requestIds: string[], submittedAt: Date): Promise<number>;
  /** Sets completed_at if still null; false when it was already set or the row is gone. */
  markSigningRequestCompleted(requestId: string, completedAt: Date): Promise<boolean>;
  getSigningRequest(requestId: string): Promise<SigningOrderRequestOutbox | null>;
  /** completed_at - created_at in ms, most recently completed first. */
  getRecentCompletionDurations(limit: number): Promise<number[]>;
  deleteSigningRequestsForOrder(orderId: string): Promise<number>;
}

export interface CredentialRepository {
  /** Insert keyed by item id; false when a row for the item already exists. */
  insertOrderCreds(creds: OrderCreds): Promise<boolean>;
  getOrderCreds(itemId: string): Promise<OrderCreds | null>;
  /** Insert-or-ignore on (item, request, valid_from, valid_to); false when ignored. */
  insertTimeLimitedV2Creds(creds: TimeAwareSubIssuedCreds): Promise<boolean>;
  /** Throws InvalidArgumentError when blindedCreds is empty. */
  areTimeLimitedV2CredsSubmitted(
    requestId: string,
    blindedCreds: string[],
  ): Promise<AreTimeLimitedV2CredsSubmittedResult>;
  /** Rows for the request whose window has not ended at `now`, earliest first. */
  getActiveTimeLimitedV2Creds(
    orderId: string,
    itemId: string,
    requestId: string,
    now: Date,
  ): Promise<TimeAwareSubIssuedCreds[]>;
  deleteOrderCreds(orderId: string): Promise<number>;
  deleteTimeLimitedV2Creds(orderId: string): Promise<number>;
}

export interface CredentialStoreTx
  extends OrderRepository,
    IssuerRepository,
    OutboxRepository,
    CredentialRepository {}

export interface CredentialStore extends CredentialStoreTx {
  /** Runs `fn` in one transaction; any thrown error rolls every write back. */
  withTransaction<T>(fn: (tx: CredentialStoreTx) => Promise<T>): Promise<T>;
}
