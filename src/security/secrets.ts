import crypto from "node:crypto";

/**
 * Secret handling helpers for tokens and webhook codes.
 *
 * - Never print a raw credential: logs get `redactSecret`, JSON output goes
 *   through `maskSecrets`.
 * - Compare shared tokens in constant time.
 */

const SECRET_KEYS = "access_token|refresh_token|auth|webhook_code|client_secret";
const JSON_SECRET_RE = new RegExp(`"(${SECRET_KEYS})"\\s*:\\s*"[^"]*"`, "gi");
const QUERY_SECRET_RE = /(access_token|refresh_token|auth)=[^&\s"]+/gi;

/**
 * Return a display-safe token for logs.
 * Example: "abcde...wxyz"
 */
export function redactSecret(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) return "********";
  return `${trimmed.slice(0, 5)}...${trimmed.slice(-4)}`;
}

export function hasSecret(value: string | null | undefined): value is string {
  return Boolean(value && value.trim().length > 0);
}

/** Mask credential values in serialized JSON and query strings. */
export function maskSecrets(text: string): string {
  return text
    .replace(JSON_SECRET_RE, (_match, key: string) => `"${key}":"***"`)
    .replace(QUERY_SECRET_RE, (_match, key: string) => `${key}=***`);
}

/** Constant-time equality; a missing side never matches. */
export function secureCompare(
  a: string | null | undefined,
  b: string | null | undefined,
): boolean {
  if (a == null || b == null) return false;
  const left = crypto.createHash("sha256").update(a, "utf8").digest();
  const right = crypto.createHash("sha256").update(b, "utf8").digest();
  return crypto.timingSafeEqual(left, right);
}
