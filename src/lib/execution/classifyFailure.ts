/**
 * Maps an error thrown by an outbound call to a retry class.
 * Typed errors win; then HTTP status; then network error codes; then message text.
 * Anything unrecognised is treated as transient.
 */

import {
  NonRetryableError,
  PoolExhaustedError,
  RateLimitedError,
  TransientError,
} from "../errors.js";

export type FailureClass = "rate_limited" | "transient" | "non_retryable";

const RATE_LIMIT_PATTERNS = [/\b429\b/, /rate[\s_-]?limit/i, /quota/i, /resource[\s_-]?exhausted/i, /too many requests/i];
const TRANSIENT_CODES = new Set(["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EPIPE", "EAI_AGAIN", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_SOCKET"]);
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 405, 409, 413, 422]);

function readProp(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

export function httpStatusOf(err: unknown): number | undefined {
  const status = readProp(err, "status") ?? readProp(err, "statusCode");
  return typeof status === "number" ? status : undefined;
}

export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof RateLimitedError) return "rate_limited";
  if (err instanceof NonRetryableError) return "non_retryable";
  if (err instanceof TransientError || err instanceof PoolExhaustedError) return "transient";

  const status = httpStatusOf(err);
  if (status === 429) return "rate_limited";
  if (status != null) {
    if (status === 408 || status >= 500) return "transient";
    if (NON_RETRYABLE_STATUSES.has(status)) return "non_retryable";
  }

  const name = readProp(err, "name");
  if (name === "AbortError" || name === "TimeoutError") return "transient";
  const code = readProp(err, "code");
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return "transient";

  const message = err instanceof Error ? err.message : String(err);
  if (RATE_LIMIT_PATTERNS.some((p) => p.test(message))) return "rate_limited";
  return "transient";
}
