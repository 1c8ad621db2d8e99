import type { RetryPolicyConfig } from "../types";

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return Math.max(0, seconds * 1000);
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

/** GitHub reports rate limits as 403 or 429 with `x-ratelimit-remaining: 0`. */
export function parseRateLimitResetMs(
  remainingHeader: string | null,
  resetHeader: string | null,
  nowMs: number
): number | null {
  if (remainingHeader === null || remainingHeader.trim() !== "0") {
    return null;
  }

  const resetSeconds = Number(resetHeader?.trim() ?? "");
  if (!resetHeader || Number.isNaN(resetSeconds)) {
    return null;
  }

  return Math.max(0, Math.floor(resetSeconds * 1000 - nowMs));
}

export function computeExponentialBackoffMs(
  retryAttempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  randomFn: () => number
): number {
  const base = Math.max(1, baseDelayMs);
  const max = Math.max(base, maxDelayMs);
  const exponential = Math.min(max, base * 2 ** Math.max(0, retryAttempt - 1));
  const jitterWindow = Math.floor(exponential * 0.2);
  const jitter = Math.floor(randomFn() * (jitterWindow + 1));

  return Math.min(max, exponential + jitter);
}

/**
 * `retryCount` is the record's count before the failure being recorded, so
 * the first failure waits `baseDelayMs`, the second twice that, and so on.
 */
export function computeNextRetryAt(
  retryCount: number,
  policy: RetryPolicyConfig,
  nowMs: number,
  randomFn: () => number
): string {
  const delayMs = computeExponentialBackoffMs(
    retryCount + 1,
    policy.baseDelayMs,
    policy.maxDelayMs,
    randomFn
  );

  return new Date(nowMs + delayMs).toISOString();
}
