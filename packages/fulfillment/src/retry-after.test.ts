import { describe, it, expect, vi } from "vitest";
import { estimateRetryAfter, getRetryAfterSeconds } from "./retry-after.js";

describe("estimateRetryAfter", () => {
  it("returns 1 when nothing has completed", () => {
    expect(estimateRetryAfter([], 5)).toBe(1);
  });

  it("rounds the average up to whole seconds", () => {
    expect(estimateRetryAfter([1000, 2000, 2500], 5)).toBe(2);
    expect(estimateRetryAfter([2001], 5)).toBe(3);
  });

  it("never goes below one second", () => {
    expect(estimateRetryAfter([10, 20], 5)).toBe(1);
    expect(estimateRetryAfter([0], 5)).toBe(1);
  });

  it("caps at the configured maximum", () => {
    expect(estimateRetryAfter([60_000, 120_000], 5)).toBe(5);
    expect(estimateRetryAfter([60_000], 3)).toBe(3);
  });

  it("never exceeds five seconds whatever the configured cap", () => {
    expect(estimateRetryAfter([60_000, 60_000], 30)).toBe(5);
    expect(estimateRetryAfter([4_200], 30)).toBe(5);
    expect(estimateRetryAfter([3_500], 30)).toBe(4);
  });
});

describe("getRetryAfterSeconds", () => {
  it("reads the configured window of recent completions", async () => {
    const getRecentCompletionDurations = vi.fn().mockResolvedValue([3000, 4000]);

    const seconds = await getRetryAfterSeconds(
      { getRecentCompletionDurations },
      { window: 20, maxSeconds: 5 },
    );

    expect(seconds).toBe(4);
    expect(getRecentCompletionDurations).toHaveBeenCalledWith(20);
  });

  it("clamps an oversized cap to five seconds", async () => {
    const getRecentCompletionDurations = vi.fn().mockResolvedValue([60_000, 60_000]);

    const seconds = await getRetryAfterSeconds(
      { getRecentCompletionDurations },
      { window: 20, maxSeconds: 30 },
    );

    expect(seconds).toBe(5);
  });
});
