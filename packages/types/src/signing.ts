import type { CredentialType } from "./order.js";

/**
 * Messages exchanged with the blind-signature signer. Field names follow the
 * signer's snake_case wire format.
 */
export interface SigningOrderRequest {
  request_id: string;
  data: SigningOrder[];
}

export interface SigningOrder {
  /** Serialized {@link SigningMetadata}. */
  associated_data: string;
  blinded_tokens: string[];
  issuer_type: string;
  issuer_cohort: number;
}

export type SignedOrderStatus = "ok" | "invalid_issuer" | "error";

export interface SigningOrderResult {
  request_id: string;
  data: SignedOrder[];
}

export interface SignedOrder {
  signed_tokens: string[];
  public_key: string;
  proof: string;
  status: SignedOrderStatus;
  associated_data: string;
  valid_to: string | null;
  valid_from: string | null;
  blinded_tokens: string[];
}

export interface SigningMetadata {
  orderId: string;
  itemId: string;
  issuerId: string;
  credential_type: CredentialType;
}
