import type { FailureCategory } from "./errors";

export const FAILURE_CATEGORY_RETRY_LIMIT: Record<FailureCategory, number> = {
  validation: 0,
  transient: 5,
  tool: 0,
  placement: 0,
  cancelled: 0,
};

export function resolveFailureCategoryRetryLimit(
  category: FailureCategory,
  globalRetryLimit: number,
): number {
  const categoryLimit = FAILURE_CATEGORY_RETRY_LIMIT[category];
  if (globalRetryLimit < 0) {
    return categoryLimit;
  }
  return Math.min(categoryLimit, globalRetryLimit);
}
