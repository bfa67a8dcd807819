import type { OutboxRepository } from "@credforge/credential-store";
import type { RetryAfterConfig } from "@credforge/types";

const MIN_RETRY_AFTER_SECONDS = 1;
const MAX_RETRY_AFTER_SECONDS = 5;

/**
 * Average completion latency rounded up to whole seconds and clamped to
 * [1, min(maxSeconds, 5)]. No samples yields the minimum.
 */
export function estimateRetryAfter(durationsMs: number[], maxSeconds: number): number {
  if (durationsMs.length === 0) {
    return MIN_RETRY_AFTER_SECONDS;
  }

  const averageMs = durationsMs.reduce((sum, ms) => sum + ms, 0) / durationsMs.length;
  const seconds = Math.ceil(averageMs / 1000);

  const cap = Math.max(MIN_RETRY_AFTER_SECONDS, Math.min(MAX_RETRY_AFTER_SECONDS, maxSeconds));
  return Math.min(cap, Math.max(MIN_RETRY_AFTER_SECONDS, seconds));
}

/** Retry-after hint, in seconds, from the most recently completed signing requests. */
export async function getRetryAfterSeconds(
  outbox: Pick<OutboxRepository, "getRecentCompletionDurations">,
  config: RetryAfterConfig,
): Promise<number> {
  const durations = await outbox.getRecentCompletionDurations(config.window);
  return estimateRetryAfter(durations, config.maxSeconds);
}
