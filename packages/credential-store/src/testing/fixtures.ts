import type { Issuer, Order, OrderItem } from "@credforge/types";

export function buildOrderItem(overrides: Partial<OrderItem> = {}): OrderItem {
  return {
    id: "item-1",
    orderId: "order-1",
    sku: "premium monthly",
    quantity: 1,
    price: "9.99",
    currency: "USD",
    credentialType: "time-limited-v2",
    validForIso: "P1M",
    eachCredentialValidForIso: "P1D",
    issuanceIntervalIso: "P1D",
    metadata: {},
    ...overrides,
  };
}

export function buildOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: "order-1",
    merchantId: "merchant-1",
    status: "paid",
    currency: "USD",
    totalPrice: "9.99",
    expiresAt: new Date("2026-02-01T00:00:00Z"),
    lastPaidAt: new Date("2026-01-01T00:00:00Z"),
    trialDays: 0,
    metadata: {},
    items: [buildOrderItem()],
    createdAt: new Date("2026-01-01T00:00:00Z"),
    updatedAt: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function buildIssuer(overrides: Partial<Issuer> = {}): Issuer {
  return {
    id: "issuer-1",
    name: "merchant-1?sku=premium+monthly",
    publicKey: "test-public-key",
    createdAt: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}
