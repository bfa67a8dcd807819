/** Issuer type known to the signer: `<merchantId>?sku=<url-encoded sku>`. */
export function encodeIssuerName(merchantId: string, sku: string): string {
  return `${merchantId}?${new URLSearchParams({ sku }).toString()}`;
}
