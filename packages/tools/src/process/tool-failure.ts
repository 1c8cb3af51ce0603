import {
  CancelledError,
  ToolError,
  TransientError,
  classifyFailureMessage,
  errorFromClassification,
  parseRetryAfterMs,
  type FailureClassification,
  type PipelineError,
} from "@trackpress/core";
import type { ToolRunResult } from "./run-tool";

const MAX_SUMMARY_LINES = 5;

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r\n|\n|\r/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// ERROR lines when the tool prints any, otherwise the tail of its output.
export function summarizeStderr(stderr: string, maxLines = MAX_SUMMARY_LINES): string {
  const lines = nonEmptyLines(stderr);
  const errorLines = lines.filter((line) => /^error\b|\berror:/i.test(line));
  const picked = errorLines.length > 0 ? errorLines : lines;
  return picked.slice(-maxLines).join("\n");
}

export function collectWarnings(output: string): string[] {
  return nonEmptyLines(output).filter((line) => /^warning\b/i.test(line));
}

export function isSuccessfulRun(result: ToolRunResult): boolean {
  return !result.timedOut && !result.aborted && !result.spawnError && result.exitCode === 0;
}

export type StderrClassifier = (stderr: string) => FailureClassification;

export function toolFailureFromResult(
  toolLabel: string,
  result: ToolRunResult,
  classify: StderrClassifier = (stderr) => classifyFailureMessage(stderr),
): PipelineError {
  if (result.aborted) {
    return new CancelledError(`${toolLabel} was cancelled`);
  }
  if (result.timedOut) {
    return new TransientError(`${toolLabel} timed out after ${result.durationMs}ms`, "timeout");
  }
  if (result.spawnError) {
    return new ToolError(`${toolLabel} could not be started: ${result.spawnError}`);
  }
  // Only the error summary is classified; cancellation comes from `aborted` alone.
  const summary = summarizeStderr(result.stderr);
  const detail = summary || `exit code ${result.exitCode}`;
  return errorFromClassification(`${toolLabel} failed: ${detail}`, classify(summary), {
    retryAfterMs: parseRetryAfterMs(result.stderr),
    meta: { exitCode: result.exitCode, signal: result.signal },
  });
}
