import PQueue from "p-queue";
import {
  resolveTargetTracks,
  toPipelineError,
  type AcceptedJob,
  type JobListWarning,
  type JobReportEntry,
  type RejectedJob,
  type RunReport,
  type StageRef,
} from "@trackpress/core";
import type { Collaborators } from "@trackpress/tools";
import type { Logger } from "../logger";
import { OutputPlacer } from "../output-placer";
import { JobPipeline } from "../pipeline/job-pipeline";
import { buildJobKey, resolveWorkingDirectory } from "../pipeline/working-dir";
import {
  buildRunReport,
  crashedEntry,
  entryFromRun,
  rejectedEntry,
  unstartedEntry,
} from "../report";
import type { RetryPolicy, SleepFn } from "../retry";
import { StageExecutor } from "../stage-executor";
import type { PipelineStage, StageSettings } from "../stages/types";
import { buildDestinationClaims } from "./destination-claims";
import { LaneLimiter } from "./lane-limiter";
import {
  formatLaneCap,
  normalizeLaneCap,
  resolveLaneLimits,
  type SchedulerLimits,
} from "./lane-policy";

export interface JobBatch {
  accepted: AcceptedJob[];
  rejected: RejectedJob[];
  warnings: JobListWarning[];
}

export interface SchedulerOptions {
  limits: SchedulerLimits;
  collaborators: Collaborators;
  settings: StageSettings;
  workRoot: string;
  retryPolicy: RetryPolicy;
  stageTimeoutMs: number;
  resume: boolean;
  keepWork: boolean;
  dedupe: boolean;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: SleepFn;
  stageFactory?: (ref: StageRef) => PipelineStage;
  now?: () => Date;
}

function formatWarning(warning: JobListWarning): string {
  const where = warning.line !== undefined ? `line ${warning.line}` : `entry #${warning.index + 1}`;
  return `${where}: ${warning.message}`;
}

// Runs every accepted job under the job and lane limits; one report entry per input row.
export async function runBatch(batch: JobBatch, options: SchedulerOptions): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const { logger, signal } = options;

  const entries: JobReportEntry[] = batch.rejected.map(rejectedEntry);
  const warnings = batch.warnings.map(formatWarning);

  const runnable: AcceptedJob[] = [];
  for (const job of batch.accepted) {
    if (options.dedupe && job.duplicateOf !== undefined) {
      entries.push(
        unstartedEntry(job, "skipped", "duplicate", `duplicate of entry #${job.duplicateOf + 1}`),
      );
      continue;
    }
    runnable.push(job);
  }

  const placer = new OutputPlacer({
    outputRoot: options.settings.outputRoot,
    container: options.settings.container,
    overwrite: options.settings.overwrite,
  });
  const claims = buildDestinationClaims(
    runnable,
    (job, track) => placer.destinationFor(job.spec, track).path,
    (job) => resolveTargetTracks(job.spec.kind),
  );

  const laneLimits = resolveLaneLimits(options.limits);
  const jobConcurrency = normalizeLaneCap(options.limits.maxJobs);
  logger.info(
    `Scheduling ${runnable.length} jobs (jobs: ${formatLaneCap(jobConcurrency)}, ` +
      `acquire: ${formatLaneCap(laneLimits.network)}, transcode: ${formatLaneCap(laneLimits.transcode)})`,
  );

  const executor = new StageExecutor({
    collaborators: options.collaborators,
    lanes: new LaneLimiter(laneLimits),
    retryPolicy: options.retryPolicy,
    stageTimeoutMs: options.stageTimeoutMs,
    settings: options.settings,
    placer,
    claims,
    signal,
    logger,
    sleep: options.sleep,
  });
  const pipeline = new JobPipeline({
    executor,
    settings: options.settings,
    resume: options.resume,
    keepWork: options.keepWork,
    logger,
    stageFactory: options.stageFactory,
  });

  // Identical rows get their own working directory.
  const occurrences = new Map<string, number>();
  const directoryOf = (job: AcceptedJob) => {
    const baseKey = buildJobKey(job.spec);
    const occurrence = occurrences.get(baseKey) ?? 0;
    occurrences.set(baseKey, occurrence + 1);
    return resolveWorkingDirectory(options.workRoot, buildJobKey(job.spec, occurrence));
  };

  const queue = new PQueue({ concurrency: jobConcurrency });
  const tasks = runnable.map((job) => {
    const directory = directoryOf(job);
    return queue.add(async () => {
      if (signal?.aborted) {
        entries.push(unstartedEntry(job, "cancelled", "cancelled"));
        return;
      }
      try {
        const result = await pipeline.run(job, directory);
        entries.push(entryFromRun(result.run));
      } catch (error) {
        const failure = toPipelineError(error);
        logger.child({ jobIndex: job.index }).error(`Job crashed: ${failure.message}`);
        entries.push(crashedEntry(job, failure));
      }
    });
  });
  await Promise.all(tasks);

  return buildRunReport({
    startedAt,
    finishedAt: now(),
    entries,
    warnings,
    cancelled: signal?.aborted ?? false,
  });
}
