export type {
  Order,
  OrderItem,
  OrderStatus,
  CredentialType,
  Issuer,
} from "./order.js";

export type {
  OrderCreds,
  TimeAwareSubIssuedCreds,
  TimeLimitedV2Creds,
  AreTimeLimitedV2CredsSubmittedResult,
} from "./credential.js";

export type {
  SigningOrderRequestOutbox,
  NewSigningOrderRequestOutbox,
} from "./outbox.js";

export type {
  SigningOrderRequest,
  SigningOrder,
  SigningOrderResult,
  SignedOrder,
  SignedOrderStatus,
  SigningMetadata,
} from "./signing.js";

export type {
  JobType,
  OutboxDispatchJobData,
  DeadLetterJobData,
  DispatchResult,
  ConsumeOutcome,
} from "./job.js";

export type {
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  QueueNamesConfig,
  OutboxConfig,
  ConsumerConfig,
  RetryAfterConfig,
} from "./config.js";
