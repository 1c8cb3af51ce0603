import { describe, expect, it } from "vitest";
import {
  FAILURE_CATEGORY_RETRY_LIMIT,
  resolveFailureCategoryRetryLimit,
} from "../src/failure-retry-policy";

describe("resolveFailureCategoryRetryLimit", () => {
  it("caps the configured limit by the category limit", () => {
    expect(resolveFailureCategoryRetryLimit("transient", 2)).toBe(2);
    expect(resolveFailureCategoryRetryLimit("transient", 50)).toBe(
      FAILURE_CATEGORY_RETRY_LIMIT.transient,
    );
  });

  it("never retries non-transient categories", () => {
    expect(resolveFailureCategoryRetryLimit("tool", 3)).toBe(0);
    expect(resolveFailureCategoryRetryLimit("placement", 3)).toBe(0);
    expect(resolveFailureCategoryRetryLimit("validation", 3)).toBe(0);
    expect(resolveFailureCategoryRetryLimit("cancelled", 3)).toBe(0);
  });

  it("uses the category limit when the configured limit is negative", () => {
    expect(resolveFailureCategoryRetryLimit("transient", -1)).toBe(5);
  });
});
