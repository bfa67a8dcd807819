import { pgTable, text, timestamp, jsonb, integer, numeric, pgEnum } from "drizzle-orm/pg-core";

export const orderStatusEnum = pgEnum("order_status", [
  "pending",
  "paid",
  "fulfilled",
  "canceled",
]);

export const orders = pgTable("orders", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  merchantId: text("merchant_id").notNull(),
  status: orderStatusEnum("status").notNull().default("pending"),
  currency: text("currency").notNull(),
  totalPrice: numeric("total_price").notNull(),
  expiresAt: timestamp("expires_at", { withTimezone: true }),
  lastPaidAt: timestamp("last_paid_at", { withTimezone: true }),
  trialDays: integer("trial_days").notNull().default(0),
  metadata: jsonb("metadata").notNull().default({}).$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
