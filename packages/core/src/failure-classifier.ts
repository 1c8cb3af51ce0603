import {
  CancelledError,
  PlacementError,
  ToolError,
  TransientError,
  isPipelineError,
  type FailureCategory,
  type PipelineError,
} from "./errors";
import {
  FAILURE_CODE,
  isTransientFailureCode,
  type FailureCode,
} from "./failure-codes";
import { parseRetryAfterMs } from "./retry-backoff";

export type FailureClassification = {
  category: FailureCategory;
  code: FailureCode;
  retryable: boolean;
  reason: string;
};

// Quotes at word boundaries only, so apostrophes in "can't" are left alone
const QUOTED_TEXT_REGEX = /(?<!\w)(?:'[^'\n]*'|"[^"\n]*")(?!\w)/g;
const URL_REGEX = /\b[a-z][a-z0-9+.-]*:\/\/\S+/gi;
const PATH_TOKEN_REGEX = /\S*[\\/]\S*/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errnoCodeOf(error: unknown): string | null {
  if (!isRecord(error) || typeof error.code !== "string") {
    return null;
  }
  const code = error.code.trim();
  return code.length > 0 ? code : null;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

// Tools echo file names and URLs, which carry titles; those must not steer classification.
export function maskEchoedLocations(text: string): string {
  return text
    .replace(QUOTED_TEXT_REGEX, "<quoted>")
    .replace(URL_REGEX, "<url>")
    .replace(PATH_TOKEN_REGEX, "<path>");
}

export function classifyFailureMessage(errorMessage: string | null): FailureClassification {
  const message = maskEchoedLocations(errorMessage ?? "").toLowerCase();

  if (/\b429\b|too many requests|rate.?limit/.test(message)) {
    return {
      category: "transient",
      code: FAILURE_CODE.RATE_LIMITED,
      retryable: true,
      reason: FAILURE_CODE.RATE_LIMITED,
    };
  }

  if (/timed out|timeout|etimedout/.test(message)) {
    return {
      category: "transient",
      code: FAILURE_CODE.TIMEOUT,
      retryable: true,
      reason: FAILURE_CODE.TIMEOUT,
    };
  }

  if (
    /econnreset|econnrefused|eai_again|enotfound|getaddrinfo|network is unreachable|connection reset|temporarily unavailable|\b50[234]\b|unable to download webpage/.test(
      message,
    )
  ) {
    return {
      category: "transient",
      code: FAILURE_CODE.NETWORK_ERROR,
      retryable: true,
      reason: FAILURE_CODE.NETWORK_ERROR,
    };
  }

  if (/\b404\b|not found|video unavailable|private video|has been removed/.test(message)) {
    return {
      category: "tool",
      code: FAILURE_CODE.NOT_FOUND,
      retryable: false,
      reason: FAILURE_CODE.NOT_FOUND,
    };
  }

  if (/invalid data found|unsupported codec|could not find codec|unknown format|not supported/.test(message)) {
    return {
      category: "tool",
      code: FAILURE_CODE.UNSUPPORTED_FORMAT,
      retryable: false,
      reason: FAILURE_CODE.UNSUPPORTED_FORMAT,
    };
  }

  return {
    category: "tool",
    code: FAILURE_CODE.TOOL_FAILED,
    retryable: false,
    reason: FAILURE_CODE.TOOL_FAILED,
  };
}

const FILESYSTEM_ERRNO_CODES = new Set(["EACCES", "EPERM", "ENOSPC", "EROFS", "EXDEV", "EISDIR"]);

export function classifyFailure(error: unknown): FailureClassification {
  if (isPipelineError(error)) {
    return {
      category: error.category,
      code: error.code,
      retryable: error.retryable,
      reason: error.code,
    };
  }

  if (error instanceof Error && error.name === "AbortError") {
    return {
      category: "cancelled",
      code: FAILURE_CODE.CANCELLED,
      retryable: false,
      reason: FAILURE_CODE.CANCELLED,
    };
  }

  const errno = errnoCodeOf(error);
  if (errno === "EEXIST") {
    return {
      category: "placement",
      code: FAILURE_CODE.PLACEMENT_COLLISION,
      retryable: false,
      reason: FAILURE_CODE.PLACEMENT_COLLISION,
    };
  }
  if (errno && FILESYSTEM_ERRNO_CODES.has(errno)) {
    return {
      category: "placement",
      code: FAILURE_CODE.FILESYSTEM_ERROR,
      retryable: false,
      reason: FAILURE_CODE.FILESYSTEM_ERROR,
    };
  }

  return classifyFailureMessage(messageOf(error));
}

export interface PipelineErrorConversionOptions {
  cause?: unknown;
  retryAfterMs?: number | null;
  meta?: Record<string, unknown>;
}

export function errorFromClassification(
  message: string,
  classification: FailureClassification,
  options: PipelineErrorConversionOptions = {},
): PipelineError {
  const errorOptions = { cause: options.cause, meta: options.meta };
  const { code } = classification;
  switch (classification.category) {
    case "transient":
      return new TransientError(
        message,
        isTransientFailureCode(code) ? code : FAILURE_CODE.NETWORK_ERROR,
        { ...errorOptions, retryAfterMs: options.retryAfterMs },
      );
    case "placement":
      return new PlacementError(
        message,
        code === FAILURE_CODE.PLACEMENT_COLLISION
          ? FAILURE_CODE.PLACEMENT_COLLISION
          : FAILURE_CODE.FILESYSTEM_ERROR,
        errorOptions,
      );
    case "cancelled":
      return new CancelledError(message, errorOptions);
    case "validation":
    case "tool":
      return new ToolError(message, code, errorOptions);
  }
}

// Anything thrown by a collaborator or the filesystem ends up as a PipelineError.
export function toPipelineError(error: unknown): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  const message = messageOf(error);
  return errorFromClassification(message, classifyFailure(error), {
    cause: error,
    retryAfterMs: parseRetryAfterMs(message),
  });
}
