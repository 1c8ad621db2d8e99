import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
  computeExponentialBackoffMs,
  computeNextRetryAt,
  parseRateLimitResetMs,
  parseRetryAfterMs
} from "../src/api/retryPolicy";

const NOW = Date.parse("2026-01-01T00:00:00.000Z");

describe("parseRetryAfterMs", () => {
  it("parses numeric seconds", () => {
    expect(parseRetryAfterMs("5", NOW)).toBe(5000);
  });

  it("parses HTTP-date", () => {
    expect(parseRetryAfterMs("Thu, 01 Jan 2026 00:00:03 GMT", NOW)).toBe(3000);
  });

  it("returns null for invalid values", () => {
    expect(parseRetryAfterMs(null, NOW)).toBeNull();
    expect(parseRetryAfterMs("", NOW)).toBeNull();
    expect(parseRetryAfterMs("abc", NOW)).toBeNull();
  });
});

describe("parseRateLimitResetMs", () => {
  it("waits until the reset epoch when the quota is spent", () => {
    expect(parseRateLimitResetMs("0", "1767225610", NOW)).toBe(10_000);
  });

  it("ignores headers while quota remains", () => {
    expect(parseRateLimitResetMs("12", "1767225610", NOW)).toBeNull();
    expect(parseRateLimitResetMs(null, "1767225610", NOW)).toBeNull();
  });

  it("returns null for an unreadable reset header", () => {
    expect(parseRateLimitResetMs("0", null, NOW)).toBeNull();
    expect(parseRateLimitResetMs("0", "soon", NOW)).toBeNull();
  });

  it("never returns a negative wait", () => {
    expect(parseRateLimitResetMs("0", "1767225500", NOW)).toBe(0);
  });
});

describe("computeExponentialBackoffMs", () => {
  it("computes exponential delay with bounded jitter", () => {
    expect(computeExponentialBackoffMs(2, 100, 1000, () => 0)).toBe(200);
  });

  it("caps delay at max", () => {
    expect(computeExponentialBackoffMs(10, 100, 500, () => 0.99)).toBe(500);
  });

  it("never shrinks as attempts grow", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 30 }),
        fc.integer({ min: 1, max: 10_000 }),
        fc.integer({ min: 1, max: 600_000 }),
        fc.double({ min: 0, max: 0.999, noNaN: true }),
        (attempt, base, max, random) => {
          const current = computeExponentialBackoffMs(attempt, base, max, () => random);
          const next = computeExponentialBackoffMs(attempt + 1, base, max, () => random);
          return next >= current && next <= Math.max(base, max);
        }
      )
    );
  });
});

describe("computeNextRetryAt", () => {
  const policy = { maxRetries: 3, baseDelayMs: 4000, maxDelayMs: 60_000 };

  it("doubles the wait for each recorded retry", () => {
    expect(computeNextRetryAt(0, policy, NOW, () => 0)).toBe("2026-01-01T00:00:04.000Z");
    expect(computeNextRetryAt(1, policy, NOW, () => 0)).toBe("2026-01-01T00:00:08.000Z");
    expect(computeNextRetryAt(2, policy, NOW, () => 0)).toBe("2026-01-01T00:00:16.000Z");
  });

  it("adds up to twenty percent jitter and respects the cap", () => {
    expect(computeNextRetryAt(0, policy, NOW, () => 0.99)).toBe("2026-01-01T00:00:04.792Z");
    expect(computeNextRetryAt(10, policy, NOW, () => 0.99)).toBe("2026-01-01T00:01:00.000Z");
  });
});
