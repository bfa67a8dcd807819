import type { ConnectionOptions } from "bullmq";

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.replace(/^\//, "");
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: db ? Number(db) : undefined,
    tls: parsed.protocol === "rediss:" ? {} : undefined,
    // Required by BullMQ workers, which block on Redis.
    maxRetriesPerRequest: null,
  };
}
