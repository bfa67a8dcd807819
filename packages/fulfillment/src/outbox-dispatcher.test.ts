import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryCredentialStore } from "@credforge/credential-store/testing";
import { DataIntegrityError } from "@credforge/errors";
import { createLogger } from "@credforge/logger";
import type { PublishReport, SigningRequestWriter } from "@credforge/queue";
import type { SigningOrderRequest } from "@credforge/types";
import { dispatchSigningRequests, type DispatchDependencies } from "./outbox-dispatcher.js";

const logger = createLogger({ level: "silent" });
const submittedAt = new Date("2026-01-01T01:00:00Z");

function okWriter(): SigningRequestWriter & { published: SigningOrderRequest[] } {
  const published: SigningOrderRequest[] = [];
  return {
    published,
    async writeMessages(requests): Promise<PublishReport> {
      published.push(...requests);
      return { published: requests.length, failed: [] };
    },
  };
}

describe("dispatchSigningRequests", () => {
  let clock: number;
  let store: InMemoryCredentialStore;
  let captureException: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    clock = Date.parse("2026-01-01T00:00:00Z");
    store = new InMemoryCredentialStore({ now: () => new Date(clock) });
    captureException = vi.fn();
  });

  function deps(writer: SigningRequestWriter): DispatchDependencies {
    return {
      store,
      writer,
      logger,
      errorReporter: { captureException },
      now: () => submittedAt,
    };
  }

  async function enqueue(...requestIds: string[]): Promise<void> {
    for (const requestId of requestIds) {
      await store.enqueueSigningRequest({
        requestId,
        orderId: "order-1",
        itemId: "item-1",
        message: { request_id: requestId, data: [] },
      });
      clock += 1000;
    }
  }

  it("does nothing when the outbox is empty", async () => {
    const writer = okWriter();

    expect(await dispatchSigningRequests(10, deps(writer))).toEqual({ selected: 0, failed: 0 });
    expect(writer.published).toEqual([]);
  });

  it("publishes the oldest pending rows and marks them submitted", async () => {
    await enqueue("req-1", "req-2", "req-3");
    const writer = okWriter();

    const result = await dispatchSigningRequests(2, deps(writer));

    expect(result).toEqual({ selected: 2, failed: 0 });
    expect(writer.published.map((message) => message.request_id)).toEqual(["req-1", "req-2"]);
    expect(store.signingRequests().map((row) => row.submittedAt)).toEqual([
      submittedAt,
      submittedAt,
      null,
    ]);
  });

  it("never republishes a submitted row", async () => {
    await enqueue("req-1");
    const writer = okWriter();

    await dispatchSigningRequests(10, deps(writer));
    const second = await dispatchSigningRequests(10, deps(writer));

    expect(second).toEqual({ selected: 0, failed: 0 });
    expect(writer.published).toHaveLength(1);
  });

  it("still marks the batch when some publishes fail, and reports them", async () => {
    await enqueue("req-1", "req-2");
    const boom = new Error("redis down");
    const writer: SigningRequestWriter = {
      writeMessages: vi.fn().mockResolvedValue({
        published: 1,
        failed: [{ requestId: "req-2", error: boom }],
      }),
    };

    const result = await dispatchSigningRequests(10, deps(writer));

    expect(result).toEqual({ selected: 2, failed: 1 });
    expect(store.signingRequests().every((row) => row.submittedAt !== null)).toBe(true);
    expect(captureException).toHaveBeenCalledWith(boom, {
      operation: "outbox-dispatch",
      requestIds: ["req-2"],
    });
  });

  it("rolls back when the update count does not match the batch", async () => {
    await enqueue("req-1", "req-2");
    vi.spyOn(InMemoryCredentialStore.prototype, "markSigningRequestsSubmitted").mockResolvedValueOnce(1);

    await expect(dispatchSigningRequests(10, deps(okWriter()))).rejects.toBeInstanceOf(
      DataIntegrityError,
    );
    expect(store.signingRequests().map((row) => row.submittedAt)).toEqual([null, null]);
  });

  it("rolls back when the writer rejects outright", async () => {
    await enqueue("req-1");
    const writer: SigningRequestWriter = {
      writeMessages: vi.fn().mockRejectedValue(new Error("connection closed")),
    };

    await expect(dispatchSigningRequests(10, deps(writer))).rejects.toThrow("connection closed");
    expect(store.signingRequests()[0]?.submittedAt).toBeNull();
  });

  it("lets overlapping dispatches split the outbox without overlap", async () => {
    await enqueue("req-1", "req-2", "req-3", "req-4");

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow: SigningRequestWriter & { seen: string[] } = {
      seen: [],
      async writeMessages(requests) {
        this.seen.push(...requests.map((request) => request.request_id));
        await gate;
        return { published: requests.length, failed: [] };
      },
    };
    const fast = okWriter();

    const first = dispatchSigningRequests(2, deps(slow));
    const second = await dispatchSigningRequests(10, deps(fast));
    release();

    expect(await first).toEqual({ selected: 2, failed: 0 });
    expect(second).toEqual({ selected: 2, failed: 0 });
    expect(slow.seen).toEqual(["req-1", "req-2"]);
    expect(fast.published.map((message) => message.request_id)).toEqual(["req-3", "req-4"]);
  });
});
