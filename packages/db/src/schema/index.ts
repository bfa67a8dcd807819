export { orders, orderStatusEnum } from "./orders.js";
export { orderItems, credentialTypeEnum } from "./order-items.js";
export { orderCredIssuers } from "./issuers.js";
export { signingOrderRequestOutbox } from "./outbox.js";
export { orderCreds } from "./order-creds.js";
export { timeLimitedV2OrderCreds } from "./time-limited-v2-creds.js";
