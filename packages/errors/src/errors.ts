import { AppError } from "./app-error.js";

export interface AppErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: AppErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

/** Duplicate request id or duplicate credential insert. */
export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: AppErrorExtras) {
    super({ message, statusCode: 409, code: "CONFLICT", ...options });
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message = "Invalid argument", options?: AppErrorExtras) {
    super({ message, statusCode: 400, code: "INVALID_ARGUMENT", ...options });
  }
}

export class OrderNotPaidError extends AppError {
  public readonly orderId: string;

  constructor(orderId: string, options?: AppErrorExtras) {
    super({
      message: `Order ${orderId} is not paid`,
      statusCode: 400,
      code: "ORDER_NOT_PAID",
      ...options,
    });
    this.orderId = orderId;
  }
}

/**
 * Malformed message, missing metadata, unparsable timestamps or an empty
 * result set. Redelivery cannot fix it.
 */
export class DataIntegrityError extends AppError {
  constructor(message = "Data integrity violation", options?: AppErrorExtras) {
    super({ message, statusCode: 422, code: "DATA_INTEGRITY", ...options });
  }
}

/** The signer reported a non-ok status for an item. */
export class UpstreamStatusError extends AppError {
  public readonly status: string;

  constructor(message: string, status: string, options?: AppErrorExtras) {
    super({ message, statusCode: 502, code: "UPSTREAM_STATUS", ...options });
    this.status = status;
  }
}

/** Connectivity loss, lock timeouts and similar; the work is retried later. */
export class TransientError extends AppError {
  constructor(message = "Transient failure", options?: AppErrorExtras) {
    super({ message, statusCode: 503, code: "TRANSIENT", ...options });
  }
}
