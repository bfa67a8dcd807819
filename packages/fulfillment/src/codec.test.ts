import { describe, it, expect } from "vitest";
import { DataIntegrityError } from "@credforge/errors";
import {
  decodeSigningMetadata,
  decodeSigningOrderResult,
  encodeSigningMetadata,
  peekRequestId,
} from "./codec.js";

const signedOrder = {
  signed_tokens: ["s1"],
  public_key: "pk",
  proof: "proof",
  status: "ok",
  associated_data: "{}",
  valid_to: "2026-01-02T00:00:00Z",
  valid_from: "2026-01-01T00:00:00Z",
  blinded_tokens: ["b1"],
};

describe("decodeSigningOrderResult", () => {
  it("decodes an object payload", () => {
    expect(decodeSigningOrderResult({ request_id: "req-1", data: [signedOrder] })).toEqual({
      request_id: "req-1",
      data: [signedOrder],
    });
  });

  it("decodes JSON text and defaults missing windows to null", () => {
    const { valid_to: _to, valid_from: _from, ...withoutWindow } = signedOrder;

    const result = decodeSigningOrderResult(
      JSON.stringify({ request_id: "req-1", data: [withoutWindow] }),
    );

    expect(result.data[0]?.valid_from).toBeNull();
    expect(result.data[0]?.valid_to).toBeNull();
  });

  it("rejects invalid JSON text", () => {
    expect(() => decodeSigningOrderResult("{not json")).toThrow(DataIntegrityError);
  });

  it("rejects an unknown status with the failing path", () => {
    expect(() =>
      decodeSigningOrderResult({ request_id: "req-1", data: [{ ...signedOrder, status: "odd" }] }),
    ).toThrow(/^Malformed signing result: data\.0\.status: /);
  });

  it("rejects a missing request id", () => {
    expect(() => decodeSigningOrderResult({ data: [] })).toThrow(DataIntegrityError);
  });
});

describe("signing metadata", () => {
  const metadata = {
    orderId: "order-1",
    itemId: "item-1",
    issuerId: "issuer-1",
    credential_type: "single-use" as const,
  };

  it("encodes to JSON that decodes back", () => {
    expect(encodeSigningMetadata(metadata)).toBe(
      '{"orderId":"order-1","itemId":"item-1","issuerId":"issuer-1","credential_type":"single-use"}',
    );
    expect(decodeSigningMetadata(encodeSigningMetadata(metadata))).toEqual(metadata);
  });

  it("rejects metadata without an item id", () => {
    expect(() =>
      decodeSigningMetadata('{"orderId":"order-1","issuerId":"issuer-1","credential_type":"single-use"}'),
    ).toThrow(DataIntegrityError);
  });

  it("rejects an unknown credential type", () => {
    expect(() =>
      decodeSigningMetadata(JSON.stringify({ ...metadata, credential_type: "forever" })),
    ).toThrow(DataIntegrityError);
  });

  it("rejects associated data that is not JSON", () => {
    expect(() => decodeSigningMetadata("order-1")).toThrow("associated data is not valid JSON");
  });
});

describe("peekRequestId", () => {
  it("reads the request id from objects and JSON text", () => {
    expect(peekRequestId({ request_id: "req-1" })).toBe("req-1");
    expect(peekRequestId('{"request_id":"req-2"}')).toBe("req-2");
  });

  it("returns null when there is none", () => {
    expect(peekRequestId("garbage")).toBeNull();
    expect(peekRequestId({ request_id: 7 })).toBeNull();
    expect(peekRequestId(null)).toBeNull();
  });
});
