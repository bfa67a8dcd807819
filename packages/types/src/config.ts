export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  queues: QueueNamesConfig;
  outbox: OutboxConfig;
  consumer: ConsumerConfig;
  retryAfter: RetryAfterConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface QueueNamesConfig {
  signingRequests: string;
  signedResults: string;
  deadLetter: string;
  outboxDispatch: string;
}

export interface OutboxConfig {
  batchSize: number;
  intervalMs: number;
}

export interface ConsumerConfig {
  concurrency: number;
  redeliveryDelayMs: number;
}

export interface RetryAfterConfig {
  window: number;
  maxSeconds: number;
}
