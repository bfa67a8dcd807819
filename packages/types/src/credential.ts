/** Single-use credentials, one row per order item. */
export interface OrderCreds {
  /** Same as the order item id. */
  id: string;
  orderId: string;
  issuerId: string;
  blindedCreds: string[];
  signedCreds: string[] | null;
  batchProof: string | null;
  publicKey: string | null;
}

/** One signed batch of time-limited-v2 credentials for a validity window. */
export interface TimeAwareSubIssuedCreds {
  orderId: string;
  itemId: string;
  issuerId: string;
  requestId: string;
  blindedCreds: string[];
  signedCreds: string[];
  batchProof: string;
  publicKey: string;
  validFrom: Date;
  validTo: Date;
}

export interface TimeLimitedV2Creds {
  orderId: string;
  issuerId: string;
  credentials: TimeAwareSubIssuedCreds[];
}

export interface AreTimeLimitedV2CredsSubmittedResult {
  /** A stored row already starts with the caller's first blinded credential. */
  alreadySubmitted: boolean;
  /** A stored row for the same request id starts with a different blinded credential. */
  mismatch: boolean;
}
