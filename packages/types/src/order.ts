export type OrderStatus = "pending" | "paid" | "fulfilled" | "canceled";

export type CredentialType = "single-use" | "time-limited" | "time-limited-v2";

export interface Order {
  id: string;
  merchantId: string;
  status: OrderStatus;
  currency: string;
  /** Decimal amount, kept as a string to avoid float rounding. */
  totalPrice: string;
  expiresAt: Date | null;
  lastPaidAt: Date | null;
  trialDays: number;
  metadata: Record<string, unknown>;
  items: OrderItem[];
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderItem {
  id: string;
  orderId: string;
  sku: string;
  quantity: number;
  price: string;
  currency: string;
  credentialType: CredentialType;
  /** ISO 8601 duration, e.g. P1M. */
  validForIso: string | null;
  eachCredentialValidForIso: string | null;
  issuanceIntervalIso: string | null;
  metadata: Record<string, unknown>;
}

export interface Issuer {
  id: string;
  /** Issuer type as known by the signer: merchant id plus the sku query. */
  name: string;
  publicKey: string;
  createdAt: Date;
}
