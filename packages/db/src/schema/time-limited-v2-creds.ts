import { pgTable, text, timestamp, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import { orders } from "./orders.js";
import { orderCredIssuers } from "./issuers.js";

export const timeLimitedV2OrderCreds = pgTable(
  "time_limited_v2_order_creds",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    orderId: text("order_id")
      .notNull()
      .references(() => orders.id, { onDelete: "cascade" }),
    itemId: text("item_id").notNull(),
    requestId: text("request_id").notNull(),
    issuerId: text("issuer_id")
      .notNull()
      .references(() => orderCredIssuers.id),
    blindedCreds: jsonb("blinded_creds").notNull().$type<string[]>(),
    signedCreds: jsonb("signed_creds").notNull().$type<string[]>(),
    batchProof: text("batch_proof").notNull(),
    publicKey: text("public_key").notNull(),
    validFrom: timestamp("valid_from", { withTimezone: true }).notNull(),
    validTo: timestamp("valid_to", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    windowUnique: uniqueIndex("time_limited_v2_order_creds_window_uniq").on(
      table.itemId,
      table.requestId,
      table.validFrom,
      table.validTo,
    ),
    orderItemIdx: index("time_limited_v2_order_creds_order_item_idx").on(
      table.orderId,
      table.itemId,
    ),
  }),
);
