import { describe, it, expect, vi } from "vitest";
import { TransientError } from "@credforge/errors";
import type { SigningOrderRequest } from "@credforge/types";
import { createDeadLetterWriter, createSigningRequestWriter } from "./writers.js";

function request(id: string): SigningOrderRequest {
  return {
    request_id: id,
    data: [
      {
        associated_data: "{}",
        blinded_tokens: ["b1"],
        issuer_type: "merchant-1?sku=basic",
        issuer_cohort: 1,
      },
    ],
  };
}

describe("createSigningRequestWriter", () => {
  it("adds one job per request keyed by request id", async () => {
    const add = vi.fn().mockResolvedValue({});
    const writer = createSigningRequestWriter({ add });

    const report = await writer.writeMessages([request("req-1"), request("req-2")]);

    expect(report).toEqual({ published: 2, failed: [] });
    expect(add).toHaveBeenCalledTimes(2);
    expect(add).toHaveBeenNthCalledWith(1, "signing-request", request("req-1"), {
      jobId: "req-1",
    });
    expect(add).toHaveBeenNthCalledWith(2, "signing-request", request("req-2"), {
      jobId: "req-2",
    });
  });

  it("reports the failing subset without rejecting", async () => {
    const boom = new Error("redis down");
    const add = vi
      .fn()
      .mockResolvedValueOnce({})
      .mockRejectedValueOnce(boom)
      .mockResolvedValueOnce({});
    const writer = createSigningRequestWriter({ add });

    const report = await writer.writeMessages([
      request("req-1"),
      request("req-2"),
      request("req-3"),
    ]);

    expect(report).toEqual({ published: 2, failed: [{ requestId: "req-2", error: boom }] });
  });

  it("handles an empty batch", async () => {
    const add = vi.fn();
    const writer = createSigningRequestWriter({ add });

    expect(await writer.writeMessages([])).toEqual({ published: 0, failed: [] });
    expect(add).not.toHaveBeenCalled();
  });
});

describe("createDeadLetterWriter", () => {
  const entry = {
    originalQueue: "signed-results",
    key: "req-1",
    failureReason: "empty result set",
    payload: { request_id: "req-1", data: [] },
  };

  it("adds a dead-letter job with the original payload", async () => {
    const add = vi.fn().mockResolvedValue({});
    const writer = createDeadLetterWriter({ add });

    await writer.write(entry);

    expect(add).toHaveBeenCalledWith("dead-letter", { type: "dead-letter", ...entry });
  });

  it("retries before giving up", async () => {
    const add = vi.fn().mockRejectedValueOnce(new Error("blip")).mockResolvedValue({});
    const onRetry = vi.fn();
    const writer = createDeadLetterWriter({ add }, { baseDelayMs: 1, onRetry });

    await writer.write(entry);

    expect(add).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledOnce();
  });

  it("surfaces a persistent failure as a TransientError", async () => {
    const add = vi.fn().mockRejectedValue(new Error("redis down"));
    const writer = createDeadLetterWriter({ add }, { maxRetries: 1, baseDelayMs: 1 });

    const error = await writer.write(entry).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({
      message: "dead-letter write failed: redis down",
      details: { originalQueue: "signed-results", key: "req-1" },
    });
    expect(add).toHaveBeenCalledTimes(2);
  });
});
