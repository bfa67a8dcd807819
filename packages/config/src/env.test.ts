import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string | undefined> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "info",
    DATABASE_URL: "postgresql://localhost:5432/credforge_test",
    DATABASE_POOL_MAX: "5",
    REDIS_URL: "redis://localhost:6379",
    SIGNING_REQUEST_QUEUE: "signing-requests",
    SIGNED_RESULT_QUEUE: "signed-results",
    SIGNED_RESULT_DLQ: "signed-results-dlq",
    OUTBOX_DISPATCH_QUEUE: "outbox-dispatch",
    OUTBOX_DISPATCH_BATCH_SIZE: "25",
    OUTBOX_DISPATCH_INTERVAL_MS: "2000",
    SIGNED_RESULT_CONCURRENCY: "8",
    SIGNED_RESULT_REDELIVERY_DELAY_MS: "3000",
    RETRY_AFTER_WINDOW: "50",
    RETRY_AFTER_MAX_SECONDS: "3",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config).toEqual({
      nodeEnv: "test",
      logLevel: "info",
      database: { url: "postgresql://localhost:5432/credforge_test", poolMax: 5 },
      redis: { url: "redis://localhost:6379" },
      queues: {
        signingRequests: "signing-requests",
        signedResults: "signed-results",
        deadLetter: "signed-results-dlq",
        outboxDispatch: "outbox-dispatch",
      },
      outbox: { batchSize: 25, intervalMs: 2000 },
      consumer: { concurrency: 8, redeliveryDelayMs: 3000 },
      retryAfter: { window: 50, maxSeconds: 3 },
    });
  });

  it("uses defaults for optional fields", () => {
    const config = parseEnv({
      NODE_ENV: "production",
      DATABASE_URL: "postgresql://db:5432/credforge",
      REDIS_URL: "redis://redis:6379",
    });

    expect(config.logLevel).toBe("info");
    expect(config.database.poolMax).toBe(10);
    expect(config.queues.signedResults).toBe("signed-results");
    expect(config.queues.deadLetter).toBe("signed-results-dlq");
    expect(config.outbox).toEqual({ batchSize: 10, intervalMs: 1000 });
    expect(config.consumer).toEqual({ concurrency: 4, redeliveryDelayMs: 5000 });
    expect(config.retryAfter).toEqual({ window: 20, maxSeconds: 5 });
  });

  it("rejects invalid DATABASE_URL (not starting with postgresql://)", () => {
    expect(() => parseEnv(makeValidEnv({ DATABASE_URL: "mysql://localhost" }))).toThrow(ZodError);
  });

  it("rejects missing DATABASE_URL", () => {
    expect(() => parseEnv({ ...makeValidEnv(), DATABASE_URL: undefined })).toThrow(ZodError);
  });

  it("rejects missing REDIS_URL", () => {
    expect(() => parseEnv({ ...makeValidEnv(), REDIS_URL: undefined })).toThrow(ZodError);
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow(ZodError);
  });

  it("rejects a zero batch size", () => {
    expect(() => parseEnv(makeValidEnv({ OUTBOX_DISPATCH_BATCH_SIZE: "0" }))).toThrow(ZodError);
  });

  it("rejects non-numeric intervals", () => {
    expect(() => parseEnv(makeValidEnv({ OUTBOX_DISPATCH_INTERVAL_MS: "soon" }))).toThrow(
      ZodError,
    );
  });

  it("rejects queue names containing a colon", () => {
    expect(() => parseEnv(makeValidEnv({ SIGNED_RESULT_QUEUE: "signed:results" }))).toThrow(
      ZodError,
    );
  });

  it("rejects a retry-after cap above five seconds", () => {
    expect(() => parseEnv(makeValidEnv({ RETRY_AFTER_MAX_SECONDS: "30" }))).toThrow(ZodError);
    expect(parseEnv(makeValidEnv({ RETRY_AFTER_MAX_SECONDS: "5" })).retryAfter.maxSeconds).toBe(5);
  });
});
