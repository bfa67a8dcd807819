export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  InvalidArgumentError,
  OrderNotPaidError,
  DataIntegrityError,
  UpstreamStatusError,
  TransientError,
} from "./errors.js";
export type { AppErrorExtras } from "./errors.js";

export { isFatalForMessage, isDeterministicDatabaseError, errorMessage } from "./classify.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
