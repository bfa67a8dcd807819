import { z } from "zod";
import { DataIntegrityError } from "@credforge/errors";
import type { SigningMetadata, SigningOrderResult } from "@credforge/types";

const signedOrderSchema = z.object({
  signed_tokens: z.array(z.string()),
  public_key: z.string(),
  proof: z.string(),
  status: z.enum(["ok", "invalid_issuer", "error"]),
  associated_data: z.string(),
  valid_to: z.string().nullable().default(null),
  valid_from: z.string().nullable().default(null),
  blinded_tokens: z.array(z.string()),
});

export const signingOrderResultSchema = z.object({
  request_id: z.string().min(1),
  data: z.array(signedOrderSchema),
});

export const signingMetadataSchema = z.object({
  orderId: z.string().min(1),
  itemId: z.string().min(1),
  issuerId: z.string().min(1),
  credential_type: z.enum(["single-use", "time-limited", "time-limited-v2"]),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new DataIntegrityError(`${what} is not valid JSON`, { cause: err });
  }
}

/**
 * Decodes a signed-result payload. Accepts the JSON text or the already
 * parsed object, since producers write either.
 */
export function decodeSigningOrderResult(payload: unknown): SigningOrderResult {
  const value = typeof payload === "string" ? parseJson(payload, "signing result") : payload;
  const parsed = signingOrderResultSchema.safeParse(value);
  if (!parsed.success) {
    throw new DataIntegrityError(`Malformed signing result: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function decodeSigningMetadata(associatedData: string): SigningMetadata {
  const parsed = signingMetadataSchema.safeParse(parseJson(associatedData, "associated data"));
  if (!parsed.success) {
    throw new DataIntegrityError(`Malformed signing metadata: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function encodeSigningMetadata(metadata: SigningMetadata): string {
  return JSON.stringify(metadata);
}

/** The request id of a payload that may not decode, for dead-letter keys. */
export function peekRequestId(payload: unknown): string | null {
  const value = typeof payload === "string" ? safeJson(payload) : payload;
  if (typeof value === "object" && value !== null && "request_id" in value) {
    const { request_id: requestId } = value;
    return typeof requestId === "string" ? requestId : null;
  }
  return null;
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
