import { FAILURE_CODE, type FailureCode, type TransientFailureCode } from "./failure-codes";

export type FailureCategory = "validation" | "transient" | "tool" | "placement" | "cancelled";

export interface PipelineErrorOptions {
  cause?: unknown;
  // Free-form context attached to logs and the run report
  meta?: Record<string, unknown>;
}

export abstract class PipelineError extends Error {
  abstract readonly category: FailureCategory;
  readonly code: FailureCode;
  readonly meta: Record<string, unknown>;

  protected constructor(message: string, code: FailureCode, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.meta = options.meta ?? {};
  }

  get retryable(): boolean {
    return this.category === "transient";
  }
}

export interface ValidationIssue {
  // 0-based position in the job list, after comments and blank lines are dropped
  index: number;
  // 1-based line in the source file, when known
  line?: number;
  field: string;
  message: string;
}

export class ValidationError extends PipelineError {
  readonly category = "validation";
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], options: PipelineErrorOptions = {}) {
    super(formatValidationIssues(issues), FAILURE_CODE.INVALID_ENTRY, options);
    this.issues = issues;
  }
}

export class TransientError extends PipelineError {
  readonly category = "transient";
  // Delay requested by the remote side (e.g. a rate limit hint)
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    code: TransientFailureCode,
    options: PipelineErrorOptions & { retryAfterMs?: number | null } = {},
  ) {
    super(message, code, options);
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

export class ToolError extends PipelineError {
  readonly category = "tool";

  constructor(
    message: string,
    code: FailureCode = FAILURE_CODE.TOOL_FAILED,
    options: PipelineErrorOptions = {},
  ) {
    super(message, code, options);
  }
}

export class PlacementError extends PipelineError {
  readonly category = "placement";

  constructor(
    message: string,
    code:
      | typeof FAILURE_CODE.PLACEMENT_COLLISION
      | typeof FAILURE_CODE.FILESYSTEM_ERROR = FAILURE_CODE.FILESYSTEM_ERROR,
    options: PipelineErrorOptions = {},
  ) {
    super(message, code, options);
  }
}

export class CancelledError extends PipelineError {
  readonly category = "cancelled";

  constructor(message = "Run cancelled", options: PipelineErrorOptions = {}) {
    super(message, FAILURE_CODE.CANCELLED, options);
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

export function formatValidationIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return "Job list validation failed";
  }
  const rows = new Set(issues.map((issue) => issue.index));
  const lines = issues.map((issue) => {
    const where = issue.line !== undefined ? `line ${issue.line}` : `entry #${issue.index + 1}`;
    return `  ${where}: ${issue.field}: ${issue.message}`;
  });
  return [`Job list has ${rows.size} malformed entr${rows.size === 1 ? "y" : "ies"}:`, ...lines].join(
    "\n",
  );
}
