import { describe, expect, it } from "vitest";
import { computeRetryBackoff, parseRetryAfterMs } from "../src/retry-backoff";

describe("parseRetryAfterMs", () => {
  it("reads Retry-After headers as seconds", () => {
    expect(parseRetryAfterMs("HTTP Error 429: Too Many Requests (Retry-After: 30)")).toBe(30_000);
  });

  it("reads retry hints with units", () => {
    expect(parseRetryAfterMs("rate limited, retry in 1.5s")).toBe(1_500);
    expect(parseRetryAfterMs("please try again in 2 minutes")).toBe(120_000);
    expect(parseRetryAfterMs("retry after 250ms")).toBe(250);
  });

  it("returns null without a hint", () => {
    expect(parseRetryAfterMs("connection reset by peer")).toBeNull();
    expect(parseRetryAfterMs(undefined)).toBeNull();
  });
});

describe("computeRetryBackoff", () => {
  it("grows exponentially without jitter when the ratio is zero", () => {
    const delays = [1, 2, 3, 4].map(
      (attempt) =>
        computeRetryBackoff({
          seedKey: "job-1",
          attempt,
          baseDelayMs: 1_000,
          maxDelayMs: 5_000,
          jitterRatio: 0,
        }).delayMs,
    );
    expect(delays).toEqual([1_000, 2_000, 4_000, 5_000]);
  });

  it("adds the same jitter for the same job and attempt", () => {
    const options = { seedKey: "job-7", attempt: 2, baseDelayMs: 1_000, maxDelayMs: 60_000 };
    const first = computeRetryBackoff(options);
    const second = computeRetryBackoff(options);
    expect(first).toEqual(second);
    expect(first.exponentialMs).toBe(2_000);
    expect(first.jitterMs).toBeGreaterThanOrEqual(0);
    expect(first.jitterMs).toBeLessThanOrEqual(200);
    expect(first.delayMs).toBe(2_000 + first.jitterMs);
  });

  it("honours a longer retry-after hint even above the cap", () => {
    const result = computeRetryBackoff({
      seedKey: "job-1",
      attempt: 1,
      baseDelayMs: 1_000,
      maxDelayMs: 5_000,
      retryAfterMs: 30_000,
    });
    expect(result).toEqual({
      delayMs: 30_000,
      retryAfterMs: 30_000,
      exponentialMs: 1_000,
      jitterMs: 0,
    });
  });
});
