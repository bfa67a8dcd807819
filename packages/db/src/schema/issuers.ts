import { pgTable, text, timestamp } from "drizzle-orm/pg-core";

/** `name` is the issuer type the signer knows: `<merchantId>?sku=<sku>`. */
export const orderCredIssuers = pgTable("order_cred_issuers", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  name: text("name").notNull().unique(),
  publicKey: text("public_key").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
