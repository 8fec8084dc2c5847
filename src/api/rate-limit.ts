import { T212_BACKOFF_BASE_MS, T212_BACKOFF_MAX_MS } from "../constants.js";

/**
 * Parse a Retry-After header value, either delay-seconds or an HTTP date.
 * Returns the delay in milliseconds, capped at the backoff maximum.
 */
export function parseRetryAfter(value: string, now: number): number | undefined {
  const seconds = Number(value.trim());
  if (value.trim() !== "" && Number.isFinite(seconds)) {
    if (seconds < 0) return undefined;
    // A zero hint still waits the base delay.
    return Math.min(Math.max(seconds * 1000, T212_BACKOFF_BASE_MS), T212_BACKOFF_MAX_MS);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const delayMs = date - now;
    if (delayMs > 0) return Math.min(delayMs, T212_BACKOFF_MAX_MS);
  }

  return undefined;
}

/** x-ratelimit-reset carries the Unix time (seconds) at which the quota refills. */
export function parseRateLimitReset(value: string, now: number): number | undefined {
  const timestamp = Number(value.trim());
  if (!Number.isInteger(timestamp) || timestamp <= 0) return undefined;

  const delayMs = timestamp * 1000 - now;
  if (delayMs <= 0) return undefined;
  return Math.min(delayMs, T212_BACKOFF_MAX_MS);
}

export function exponentialBackoff(attempt: number): number {
  return Math.min(T212_BACKOFF_BASE_MS * 2 ** (attempt - 1), T212_BACKOFF_MAX_MS);
}

/**
 * Delay before retrying a throttled request. Server hints win over the
 * computed backoff: Retry-After first, then x-ratelimit-reset.
 */
export function retryDelay(headers: Headers, attempt: number, now: number): number {
  const retryAfter = headers.get("retry-after");
  if (retryAfter) {
    const delayMs = parseRetryAfter(retryAfter, now);
    if (delayMs !== undefined) return delayMs;
  }

  const reset = headers.get("x-ratelimit-reset");
  if (reset) {
    const delayMs = parseRateLimitReset(reset, now);
    if (delayMs !== undefined) return delayMs;
  }

  return exponentialBackoff(attempt);
}
