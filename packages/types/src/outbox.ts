import type { SigningOrderRequest } from "./signing.js";

/**
 * A durable signing request. Transitions null -> submittedAt -> completedAt
 * and is never un-submitted.
 */
export interface SigningOrderRequestOutbox {
  requestId: string;
  orderId: string;
  itemId: string;
  message: SigningOrderRequest;
  createdAt: Date;
  submittedAt: Date | null;
  completedAt: Date | null;
}

export interface NewSigningOrderRequestOutbox {
  requestId: string;
  orderId: string;
  itemId: string;
  message: SigningOrderRequest;
}
