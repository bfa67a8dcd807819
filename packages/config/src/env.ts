import { z } from "zod";
import type { AppConfig } from "@credforge/types";

const positiveInt = (fallback: string, max = Number.MAX_SAFE_INTEGER) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive().max(max));

const queueName = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine((name) => name.length > 0 && !name.includes(":"), {
      message: "queue names must be non-empty and must not contain ':'",
    });

/**
 * Zod schema for the worker's environment. Validates, transforms, and
 * supplies defaults so that the result maps onto {@link AppConfig}.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // ---------- Database ----------
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL is required")
    .refine((url) => url.startsWith("postgresql://"), {
      message: "DATABASE_URL must start with postgresql://",
    }),
  DATABASE_POOL_MAX: positiveInt("10"),

  // ---------- Redis ----------
  REDIS_URL: z.string().min(1, "REDIS_URL is required"),

  // ---------- Queues ----------
  SIGNING_REQUEST_QUEUE: queueName("signing-requests"),
  SIGNED_RESULT_QUEUE: queueName("signed-results"),
  SIGNED_RESULT_DLQ: queueName("signed-results-dlq"),
  OUTBOX_DISPATCH_QUEUE: queueName("outbox-dispatch"),

  // ---------- Outbox ----------
  OUTBOX_DISPATCH_BATCH_SIZE: positiveInt("10"),
  OUTBOX_DISPATCH_INTERVAL_MS: positiveInt("1000"),

  // ---------- Consumer ----------
  SIGNED_RESULT_CONCURRENCY: positiveInt("4"),
  SIGNED_RESULT_REDELIVERY_DELAY_MS: positiveInt("5000"),

  // ---------- Retry-After ----------
  RETRY_AFTER_WINDOW: positiveInt("20"),
  RETRY_AFTER_MAX_SECONDS: positiveInt("5", 5),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    queues: {
      signingRequests: parsed.SIGNING_REQUEST_QUEUE,
      signedResults: parsed.SIGNED_RESULT_QUEUE,
      deadLetter: parsed.SIGNED_RESULT_DLQ,
      outboxDispatch: parsed.OUTBOX_DISPATCH_QUEUE,
    },

    outbox: {
      batchSize: parsed.OUTBOX_DISPATCH_BATCH_SIZE,
      intervalMs: parsed.OUTBOX_DISPATCH_INTERVAL_MS,
    },

    consumer: {
      concurrency: parsed.SIGNED_RESULT_CONCURRENCY,
      redeliveryDelayMs: parsed.SIGNED_RESULT_REDELIVERY_DELAY_MS,
    },

    retryAfter: {
      window: parsed.RETRY_AFTER_WINDOW,
      maxSeconds: parsed.RETRY_AFTER_MAX_SECONDS,
    },
  };
}
