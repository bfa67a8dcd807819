import type { Order } from "@credforge/types";

/** Paid, or canceled but still inside the period already paid for. */
export function isOrderPaid(order: Pick<Order, "status" | "expiresAt">, now: Date): boolean {
  switch (order.status) {
    case "paid":
      return true;
    case "canceled":
      return order.expiresAt !== null && order.expiresAt.getTime() > now.getTime();
    default:
      return false;
  }
}
