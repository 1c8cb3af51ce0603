import {
  FAILURE_CODE,
  countOutcomes,
  describeJob,
  isRunSuccessful,
  type AcceptedJob,
  type JobFailure,
  type JobOutcomeStatus,
  type JobReportEntry,
  type PipelineError,
  type RejectedJob,
  type RunReport,
  type StageOutcome,
  type StageRef,
  type StageSkipReason,
} from "@trackpress/core";
import { planStages } from "./pipeline/plan";
import type { PipelineRun } from "./pipeline/pipeline-run";

function failureOf(ref: StageRef | null, error: PipelineError): JobFailure {
  return {
    stage: ref?.id ?? null,
    track: ref?.track ?? null,
    category: error.category,
    code: error.code,
    message: error.message,
  };
}

function locationOf(job: { index: number; line?: number }): string {
  return job.line !== undefined ? `line ${job.line}` : `entry #${job.index + 1}`;
}

export function entryFromRun(run: PipelineRun, note?: string): JobReportEntry {
  const failure = run.firstFailure();
  const outputs = run.targetTracks.flatMap((track) => {
    const path = run.finalOutputPaths[track];
    return path ? [path] : [];
  });
  return {
    index: run.index,
    line: run.job.line,
    label: describeJob(run.spec),
    kind: run.spec.kind,
    status: run.outcome(),
    outputs,
    stages: run.stageStates.map((state) => ({
      id: state.ref.id,
      status: state.status,
      skipReason: state.skipReason,
      attempts: state.attempts,
      durationMs: state.durationMs,
    })),
    failure: failure ? failureOf(failure.ref, failure.error) : undefined,
    note,
  };
}

// Entry for a job that never reached its first stage.
export function unstartedEntry(
  job: AcceptedJob,
  status: Extract<JobOutcomeStatus, "skipped" | "cancelled">,
  reason: StageSkipReason,
  note?: string,
): JobReportEntry {
  const stages: StageOutcome[] = planStages(job.spec.kind).stages.map((ref) => ({
    id: ref.id,
    status: "skipped",
    skipReason: reason,
    attempts: 0,
  }));
  return {
    index: job.index,
    line: job.line,
    label: describeJob(job.spec),
    kind: job.spec.kind,
    status,
    outputs: [],
    stages,
    note,
  };
}

// Entry for a job whose pipeline threw instead of reporting a stage failure.
export function crashedEntry(job: AcceptedJob, error: PipelineError): JobReportEntry {
  return {
    index: job.index,
    line: job.line,
    label: describeJob(job.spec),
    kind: job.spec.kind,
    status: error.category === "cancelled" ? "cancelled" : "failed",
    outputs: [],
    stages: [],
    failure: failureOf(null, error),
  };
}

export function rejectedEntry(job: RejectedJob): JobReportEntry {
  return {
    index: job.index,
    line: job.line,
    label: locationOf(job),
    kind: null,
    status: "failed",
    outputs: [],
    stages: [],
    failure: {
      stage: null,
      track: null,
      category: "validation",
      code: FAILURE_CODE.INVALID_ENTRY,
      message: job.issues.map((issue) => `${issue.field}: ${issue.message}`).join("; "),
    },
  };
}

export interface RunReportInput {
  startedAt: Date;
  finishedAt: Date;
  entries: JobReportEntry[];
  warnings: string[];
  cancelled: boolean;
}

export function buildRunReport(input: RunReportInput): RunReport {
  const entries = [...input.entries].sort((left, right) => left.index - right.index);
  return {
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    durationMs: Math.max(0, input.finishedAt.getTime() - input.startedAt.getTime()),
    cancelled: input.cancelled,
    counts: countOutcomes(entries),
    entries,
    warnings: input.warnings,
  };
}

const STATUS_LABEL: Record<JobOutcomeStatus, string> = {
  succeeded: "OK",
  failed: "FAILED",
  skipped: "SKIPPED",
  cancelled: "CANCELLED",
};

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m${Math.round(seconds - minutes * 60)}s`;
}

export function formatReportEntry(entry: JobReportEntry): string[] {
  const lines = [`#${entry.index + 1} ${STATUS_LABEL[entry.status].padEnd(9)} ${entry.label}`];
  for (const output of entry.outputs) {
    lines.push(`    -> ${output}`);
  }
  if (entry.failure) {
    const where = entry.failure.stage ? `${entry.failure.stage}: ` : "";
    lines.push(`    ${where}[${entry.failure.category}/${entry.failure.code}] ${entry.failure.message}`);
  }
  if (entry.note) {
    lines.push(`    ${entry.note}`);
  }
  return lines;
}

export function formatRunReport(report: RunReport): string {
  const { counts } = report;
  const lines = ["Run report", ...report.entries.flatMap(formatReportEntry)];
  if (report.warnings.length > 0) {
    lines.push("Warnings:", ...report.warnings.map((warning) => `  ${warning}`));
  }
  lines.push(
    `${counts.total} jobs: ${counts.succeeded} succeeded, ${counts.failed} failed, ` +
      `${counts.skipped} skipped, ${counts.cancelled} cancelled in ${formatDuration(report.durationMs)}`,
  );
  if (report.cancelled) {
    lines.push("Run was cancelled");
  }
  lines.push(isRunSuccessful(report) ? "Result: success" : "Result: failure");
  return lines.join("\n");
}
