import { pgTable, text, timestamp, jsonb, integer, numeric, pgEnum } from "drizzle-orm/pg-core";
import { orders } from "./orders.js";

export const credentialTypeEnum = pgEnum("credential_type", [
  "single-use",
  "time-limited",
  "time-limited-v2",
]);

export const orderItems = pgTable("order_items", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  orderId: text("order_id")
    .notNull()
    .references(() => orders.id, { onDelete: "cascade" }),
  sku: text("sku").notNull(),
  quantity: integer("quantity").notNull().default(1),
  price: numeric("price").notNull(),
  currency: text("currency").notNull(),
  credentialType: credentialTypeEnum("credential_type").notNull(),
  validForIso: text("valid_for_iso"),
  eachCredentialValidForIso: text("each_credential_valid_for_iso"),
  issuanceIntervalIso: text("issuance_interval_iso"),
  metadata: jsonb("metadata").notNull().default({}).$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
