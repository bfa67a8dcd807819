export {
  decodeSigningOrderResult,
  decodeSigningMetadata,
  encodeSigningMetadata,
  peekRequestId,
  signingOrderResultSchema,
  signingMetadataSchema,
} from "./codec.js";
export { encodeIssuerName } from "./issuer-name.js";
export { isOrderPaid } from "./order-status.js";
export { estimateRetryAfter, getRetryAfterSeconds } from "./retry-after.js";

export { dispatchSigningRequests } from "./outbox-dispatcher.js";
export type { DispatchDependencies } from "./outbox-dispatcher.js";

export { consumeSignedResult } from "./signed-result-consumer.js";
export type { ConsumeDependencies } from "./signed-result-consumer.js";

export { createOrderItemCredentials, deleteOrderCredentials } from "./credential-issuer.js";
export type {
  IssuanceDependencies,
  CreateOrderItemCredentialsInput,
  IssuanceOutcome,
  OrderCredentialsPurge,
} from "./credential-issuer.js";

export { getItemCredentials } from "./credential-query.js";
export type {
  CredentialQueryDependencies,
  GetItemCredentialsInput,
  ItemCredentials,
} from "./credential-query.js";
