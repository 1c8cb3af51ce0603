import {
  classifyFailureMessage,
  FAILURE_CODE,
  maskEchoedLocations,
  type FailureClassification,
} from "@trackpress/core";

const NOT_FOUND_PATTERNS = [
  /HTTP Error 404/i,
  /Video unavailable/i,
  /Private video/i,
  /This video is not available/i,
  /has been removed/i,
  /Unsupported URL/i,
  /No video results/i,
];

const UNSUPPORTED_PATTERNS = [/Requested format is not available/i];

export function classifyYtDlpStderr(stderr: string): FailureClassification {
  const text = maskEchoedLocations(stderr);
  if (NOT_FOUND_PATTERNS.some((pattern) => pattern.test(text))) {
    return {
      category: "tool",
      code: FAILURE_CODE.NOT_FOUND,
      retryable: false,
      reason: FAILURE_CODE.NOT_FOUND,
    };
  }
  if (UNSUPPORTED_PATTERNS.some((pattern) => pattern.test(text))) {
    return {
      category: "tool",
      code: FAILURE_CODE.UNSUPPORTED_FORMAT,
      retryable: false,
      reason: FAILURE_CODE.UNSUPPORTED_FORMAT,
    };
  }
  return classifyFailureMessage(stderr);
}
