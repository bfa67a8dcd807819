import { AppError } from "./app-error.js";

const FATAL_CODES: ReadonlySet<string> = new Set([
  "NOT_FOUND",
  "INVALID_ARGUMENT",
  "DATA_INTEGRITY",
  "UPSTREAM_STATUS",
]);

/**
 * SQLSTATE classes that fail the same way on every attempt:
 * 22 data exception, 23 integrity constraint violation,
 * 42 syntax error or access rule violation.
 * Connection (08), serialization/deadlock (40), lock (55) and
 * shutdown (57) classes stay transient.
 */
const DETERMINISTIC_SQLSTATE = /^(22|23|42)[0-9A-Z]{3}$/;

function sqlState(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/** Whether `err` is a database error that no redelivery can fix. */
export function isDeterministicDatabaseError(err: unknown): boolean {
  const code = sqlState(err);
  return code !== undefined && DETERMINISTIC_SQLSTATE.test(code);
}

/**
 * Whether a message that failed with `err` must be dead-lettered rather than
 * redelivered. Anything unrecognised is treated as transient.
 */
export function isFatalForMessage(err: unknown): boolean {
  if (AppError.isAppError(err)) {
    return FATAL_CODES.has(err.code);
  }
  return isDeterministicDatabaseError(err);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
