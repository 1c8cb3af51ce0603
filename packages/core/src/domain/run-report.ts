import { z } from "zod";
import { JobKind } from "./job-spec";
import { StageSkipReason, StageStatus, Track } from "./stage";

export const JobOutcomeStatus = z.enum([
  "succeeded", // every stage succeeded or was reused
  "failed",
  "skipped", // nothing left to do (all stages resumed, or deduplicated)
  "cancelled",
]);
export type JobOutcomeStatus = z.infer<typeof JobOutcomeStatus>;

export const FailureCategorySchema = z.enum([
  "validation",
  "transient",
  "tool",
  "placement",
  "cancelled",
]);

export const StageOutcomeSchema = z.object({
  id: z.string(),
  status: StageStatus,
  skipReason: StageSkipReason.optional(),
  attempts: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative().optional(),
});
export type StageOutcome = z.infer<typeof StageOutcomeSchema>;

export const JobFailureSchema = z.object({
  // null when the row never reached a stage (validation)
  stage: z.string().nullable(),
  track: Track.nullable(),
  category: FailureCategorySchema,
  code: z.string(),
  message: z.string(),
});
export type JobFailure = z.infer<typeof JobFailureSchema>;

export const JobReportEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  line: z.number().int().positive().optional(),
  label: z.string(),
  kind: JobKind.nullable(),
  status: JobOutcomeStatus,
  outputs: z.array(z.string()),
  stages: z.array(StageOutcomeSchema),
  failure: JobFailureSchema.optional(),
  note: z.string().optional(),
});
export type JobReportEntry = z.infer<typeof JobReportEntrySchema>;

export const RunReportCountsSchema = z.object({
  total: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  cancelled: z.number().int().nonnegative(),
});
export type RunReportCounts = z.infer<typeof RunReportCountsSchema>;

export const RunReportSchema = z.object({
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().nonnegative(),
  cancelled: z.boolean(),
  counts: RunReportCountsSchema,
  entries: z.array(JobReportEntrySchema),
  warnings: z.array(z.string()),
});
export type RunReport = z.infer<typeof RunReportSchema>;

export function countOutcomes(entries: Pick<JobReportEntry, "status">[]): RunReportCounts {
  const counts: RunReportCounts = {
    total: entries.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    cancelled: 0,
  };
  for (const entry of entries) {
    counts[entry.status] += 1;
  }
  return counts;
}

// Partial success is never success: every entry must be succeeded or skipped.
export function isRunSuccessful(report: Pick<RunReport, "entries">): boolean {
  return report.entries.every((entry) => entry.status === "succeeded" || entry.status === "skipped");
}
