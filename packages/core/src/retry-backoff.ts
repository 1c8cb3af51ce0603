type DurationUnit = "ms" | "s" | "m";

function parseDurationTokenMs(value: string): number | null {
  const match = value.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|sec|secs|seconds?|minutes?)?$/i);
  if (!match) {
    return null;
  }
  const rawAmount = match[1];
  if (!rawAmount) {
    return null;
  }
  const amount = Number.parseFloat(rawAmount);
  if (!Number.isFinite(amount) || amount < 0) {
    return null;
  }
  const rawUnit = match[2]?.toLowerCase() ?? "s";
  const unit: DurationUnit = rawUnit === "ms" ? "ms" : rawUnit.startsWith("m") ? "m" : "s";
  if (unit === "ms") {
    return Math.ceil(amount);
  }
  if (unit === "m") {
    return Math.ceil(amount * 60_000);
  }
  return Math.ceil(amount * 1_000);
}

// Extracts the wait a remote side asked for, e.g. "Retry-After: 30" or "retry in 12s".
export function parseRetryAfterMs(errorMessage: string | null | undefined): number | null {
  if (!errorMessage) {
    return null;
  }
  const patterns = [
    /retry-after:\s*(\d+(?:\.\d+)?)/i,
    /retry (?:again )?(?:in|after)\s+(\d+(?:\.\d+)?\s*(?:ms|s|m|sec|secs|seconds?|minutes?)?)/i,
    /try again in\s+(\d+(?:\.\d+)?\s*(?:ms|s|m|sec|secs|seconds?|minutes?)?)/i,
  ];

  const candidates: number[] = [];
  for (const pattern of patterns) {
    const raw = errorMessage.match(pattern)?.[1];
    if (!raw) {
      continue;
    }
    const ms = parseDurationTokenMs(raw);
    if (ms && ms > 0) {
      candidates.push(ms);
    }
  }

  if (candidates.length === 0) {
    return null;
  }
  return Math.max(...candidates);
}

function deterministicJitter(seedKey: string, attempt: number, maxJitterMs: number): number {
  if (maxJitterMs <= 0) {
    return 0;
  }
  let hash = 0;
  const seed = `${seedKey}:${attempt}`;
  for (let index = 0; index < seed.length; index += 1) {
    hash = (hash * 31 + seed.charCodeAt(index)) >>> 0;
  }
  return hash % (maxJitterMs + 1);
}

export interface RetryBackoffOptions {
  // Stable key so that reruns of the same job wait the same amount
  seedKey: string;
  // 1-based attempt that just failed
  attempt: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  jitterRatio?: number;
  retryAfterMs?: number | null;
}

export interface RetryBackoffResult {
  delayMs: number;
  retryAfterMs: number | null;
  exponentialMs: number;
  jitterMs: number;
}

export function computeRetryBackoff(options: RetryBackoffOptions): RetryBackoffResult {
  const baseDelayMs = Math.max(0, Math.floor(options.baseDelayMs));
  const maxDelayMs = Math.max(baseDelayMs, Math.floor(options.maxDelayMs));
  const exponent = Math.max(0, Math.floor(options.attempt) - 1);
  const factor =
    options.factor !== undefined && Number.isFinite(options.factor) && options.factor > 1
      ? options.factor
      : 2;
  const jitterRatio =
    options.jitterRatio !== undefined &&
    Number.isFinite(options.jitterRatio) &&
    options.jitterRatio >= 0
      ? Math.min(options.jitterRatio, 1)
      : 0.1;

  const exponentialMs = Math.min(maxDelayMs, Math.ceil(baseDelayMs * Math.pow(factor, exponent)));
  const retryAfterMs = options.retryAfterMs ?? null;
  // An explicit hint from the remote side wins over the cap and gets no jitter.
  if (retryAfterMs !== null && retryAfterMs > 0) {
    return {
      delayMs: Math.max(exponentialMs, retryAfterMs),
      retryAfterMs,
      exponentialMs,
      jitterMs: 0,
    };
  }

  const maxJitterMs = Math.floor(exponentialMs * jitterRatio);
  const jitterMs = deterministicJitter(options.seedKey, exponent, maxJitterMs);
  return {
    delayMs: Math.min(maxDelayMs, exponentialMs + jitterMs),
    retryAfterMs: null,
    exponentialMs,
    jitterMs,
  };
}
