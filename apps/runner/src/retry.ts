import { setTimeout as sleepFor } from "node:timers/promises";
import {
  CancelledError,
  TransientError,
  computeRetryBackoff,
  resolveFailureCategoryRetryLimit,
  toPipelineError,
  type PipelineError,
} from "@trackpress/core";
import type { Logger } from "./logger";

export interface RetryPolicy {
  // Retries after the first attempt, for transient failures only
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  jitterRatio?: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  policy: RetryPolicy;
  // Keeps jitter stable for one job/stage pair
  seedKey: string;
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: SleepFn;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: PipelineError; attempts: number };

export const abortableSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

function cancellationOf(signal: AbortSignal | undefined): CancelledError {
  const reason: unknown = signal?.reason;
  return reason instanceof CancelledError ? reason : new CancelledError();
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? abortableSleep;
  let attempt = 0;

  while (true) {
    attempt += 1;
    if (options.signal?.aborted) {
      return { ok: false, error: cancellationOf(options.signal), attempts: attempt - 1 };
    }

    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (caught) {
      const error = options.signal?.aborted
        ? cancellationOf(options.signal)
        : toPipelineError(caught);
      const allowedRetries = resolveFailureCategoryRetryLimit(
        error.category,
        options.policy.maxRetries,
      );
      if (!error.retryable || attempt > allowedRetries) {
        return { ok: false, error, attempts: attempt };
      }

      const backoff = computeRetryBackoff({
        seedKey: options.seedKey,
        attempt,
        baseDelayMs: options.policy.baseDelayMs,
        maxDelayMs: options.policy.maxDelayMs,
        factor: options.policy.factor,
        jitterRatio: options.policy.jitterRatio,
        retryAfterMs: error instanceof TransientError ? error.retryAfterMs : null,
      });
      options.logger?.retry(attempt, allowedRetries + 1, error.message, backoff.delayMs);

      try {
        await sleep(backoff.delayMs, options.signal);
      } catch (sleepError) {
        if (options.signal?.aborted) {
          return { ok: false, error: cancellationOf(options.signal), attempts: attempt };
        }
        throw sleepError;
      }
    }
  }
}
