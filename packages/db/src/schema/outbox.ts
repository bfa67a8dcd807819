import { pgTable, text, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import type { SigningOrderRequest } from "@credforge/types";
import { orders } from "./orders.js";

export const signingOrderRequestOutbox = pgTable(
  "signing_order_request_outbox",
  {
    requestId: text("request_id").primaryKey(),
    orderId: text("order_id")
      .notNull()
      .references(() => orders.id, { onDelete: "cascade" }),
    itemId: text("item_id").notNull(),
    messageData: jsonb("message_data").notNull().$type<SigningOrderRequest>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    submittedAt: timestamp("submitted_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => ({
    pendingIdx: index("signing_order_request_outbox_pending_idx").on(
      table.submittedAt,
      table.createdAt,
    ),
    orderIdx: index("signing_order_request_outbox_order_idx").on(table.orderId),
  }),
);
