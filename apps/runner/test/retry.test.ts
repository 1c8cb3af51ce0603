import { describe, expect, it, vi } from "vitest";
import { CancelledError, ToolError, TransientError } from "@trackpress/core";
import { withRetry, type RetryPolicy, type SleepFn } from "../src/retry";

const policy: RetryPolicy = { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 1000, jitterRatio: 0 };

describe("withRetry", () => {
  it("retries transient failures with exponential backoff", async () => {
    const sleep = vi.fn<SleepFn>(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError("connection reset", "network_error"))
      .mockRejectedValueOnce(new TransientError("connection reset", "network_error"))
      .mockResolvedValueOnce("done");

    const outcome = await withRetry(fn, { policy, seedKey: "job:acquire", sleep });

    expect(outcome).toEqual({ ok: true, value: "done", attempts: 3 });
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
  });

  it("gives up after the configured retries", async () => {
    const sleep = vi.fn<SleepFn>(async () => {});
    const error = new TransientError("timed out", "timeout");
    const fn = vi.fn(async () => {
      throw error;
    });

    const outcome = await withRetry(fn, { policy, seedKey: "k", sleep });

    expect(outcome).toEqual({ ok: false, error, attempts: 3 });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("never retries non-transient failures", async () => {
    const sleep = vi.fn<SleepFn>(async () => {});
    const fn = vi.fn(async () => {
      throw new ToolError("Video unavailable", "not_found");
    });

    const outcome = await withRetry(fn, { policy, seedKey: "k", sleep });

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("waits at least the delay a rate limit names", async () => {
    const sleep = vi.fn<SleepFn>(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new TransientError("slow down", "rate_limited", { retryAfterMs: 5000 }))
      .mockResolvedValueOnce(1);

    await withRetry(fn, { policy, seedKey: "k", sleep });

    expect(sleep.mock.calls[0]?.[0]).toBe(5000);
  });

  it("classifies plain errors before deciding", async () => {
    const sleep = vi.fn<SleepFn>(async () => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("HTTP Error 503: Service Unavailable"))
      .mockResolvedValueOnce("ok");

    const outcome = await withRetry(fn, { policy, seedKey: "k", sleep });

    expect(outcome).toEqual({ ok: true, value: "ok", attempts: 2 });
  });

  it("reports cancellation instead of the failure once the signal fires", async () => {
    const controller = new AbortController();
    const reason = new CancelledError("Run interrupted by SIGINT");
    const fn = vi.fn(async () => {
      controller.abort(reason);
      throw new Error("killed");
    });

    const outcome = await withRetry(fn, { policy, seedKey: "k", signal: controller.signal });

    expect(outcome).toEqual({ ok: false, error: reason, attempts: 1 });
  });

  it("does not start when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => "never");

    const outcome = await withRetry(fn, { policy, seedKey: "k", signal: controller.signal });

    expect(fn).not.toHaveBeenCalled();
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(0);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(CancelledError);
    }
  });
});
