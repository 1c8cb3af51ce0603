import type { StageLane } from "@trackpress/core";

export type LaneLimits = Record<StageLane, number>;

export interface SchedulerLimits {
  maxJobs: number;
  maxAcquire: number;
  maxTranscode: number;
}

// Caps <= 0 (or not finite) mean unlimited.
export function normalizeLaneCap(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.floor(value);
}

export function resolveLaneLimits(limits: SchedulerLimits): LaneLimits {
  return {
    network: normalizeLaneCap(limits.maxAcquire),
    transcode: normalizeLaneCap(limits.maxTranscode),
    light: Number.POSITIVE_INFINITY,
  };
}

export function formatLaneCap(value: number): string {
  return Number.isFinite(value) ? String(value) : "unlimited";
}
