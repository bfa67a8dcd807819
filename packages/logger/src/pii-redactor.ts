/**
 * Redaction of secrets and credential material from log output.
 *
 * Blinded and signed tokens are bearer material once unblinded, so they are
 * treated like secrets and never reach a log line.
 */

const TOP_LEVEL_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "blindedCreds",
  "signedCreds",
  "batchProof",
  "blinded_tokens",
  "signed_tokens",
] as const;

/**
 * Paths for Pino's `redact` option: every sensitive key at the top level
 * and one level down (e.g. `creds.signedCreds`).
 */
export const REDACT_PATHS: string[] = [
  ...TOP_LEVEL_PATHS,
  ...TOP_LEVEL_PATHS.map((path) => `*.${path}`),
];
