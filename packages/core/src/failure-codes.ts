export const FAILURE_CODE = {
  INVALID_ENTRY: "invalid_entry",
  NOT_FOUND: "not_found",
  RATE_LIMITED: "rate_limited",
  NETWORK_ERROR: "network_error",
  TIMEOUT: "timeout",
  UNSUPPORTED_FORMAT: "unsupported_format",
  TOOL_FAILED: "tool_failed",
  MISSING_ARTIFACT: "missing_artifact",
  WORKDIR_LOCKED: "workdir_locked",
  PLACEMENT_COLLISION: "placement_collision",
  FILESYSTEM_ERROR: "filesystem_error",
  CANCELLED: "cancelled",
} as const;

export type FailureCode = (typeof FAILURE_CODE)[keyof typeof FAILURE_CODE];

export const TRANSIENT_FAILURE_CODES = [
  FAILURE_CODE.RATE_LIMITED,
  FAILURE_CODE.NETWORK_ERROR,
  FAILURE_CODE.TIMEOUT,
] as const;

export type TransientFailureCode = (typeof TRANSIENT_FAILURE_CODES)[number];

const TRANSIENT_FAILURE_CODE_SET = new Set<string>(TRANSIENT_FAILURE_CODES);
export function isTransientFailureCode(value: string): value is TransientFailureCode {
  return TRANSIENT_FAILURE_CODE_SET.has(value);
}
