import { pgTable, text, timestamp, jsonb } from "drizzle-orm/pg-core";
import { orders } from "./orders.js";
import { orderCredIssuers } from "./issuers.js";

/** Single-use credentials, one row per order item. */
export const orderCreds = pgTable("order_creds", {
  itemId: text("item_id").primaryKey(),
  orderId: text("order_id")
    .notNull()
    .references(() => orders.id, { onDelete: "cascade" }),
  issuerId: text("issuer_id")
    .notNull()
    .references(() => orderCredIssuers.id),
  blindedCreds: jsonb("blinded_creds").notNull().$type<string[]>(),
  signedCreds: jsonb("signed_creds").$type<string[]>(),
  batchProof: text("batch_proof"),
  publicKey: text("public_key"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
