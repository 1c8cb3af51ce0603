import { mkdir, rm } from "node:fs/promises";
import { parseJobSpecs, readJobList, type RunReport } from "@trackpress/core";
import { createCollaborators, type Collaborators } from "@trackpress/tools";
import type { RunnerConfig } from "./config";
import type { Logger } from "./logger";
import type { SleepFn } from "./retry";
import { runBatch } from "./scheduler/scheduler";

export interface RunDependencies {
  collaborators?: Collaborators;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

// Reads and validates the job list, then runs the batch it describes.
export async function runJobList(
  config: RunnerConfig,
  logger: Logger,
  deps: RunDependencies = {},
): Promise<RunReport> {
  if (config.clearCache) {
    logger.info(`Clearing downloader cache ${config.cacheDir}`);
    await rm(config.cacheDir, { recursive: true, force: true });
  }
  await mkdir(config.cacheDir, { recursive: true });

  const rawEntries = await readJobList(config.inputList);
  const batch = parseJobSpecs(rawEntries, { coverDir: config.coverDir });
  logger.info(
    `Read ${rawEntries.length} entries from ${config.inputList} ` +
      `(${batch.accepted.length} accepted, ${batch.rejected.length} rejected)`,
  );
  for (const rejected of batch.rejected) {
    const where = rejected.line !== undefined ? `line ${rejected.line}` : `entry #${rejected.index + 1}`;
    for (const issue of rejected.issues) {
      logger.warn(`${where}: ${issue.field}: ${issue.message}`);
    }
  }
  for (const warning of batch.warnings) {
    logger.warn(warning.message);
  }

  return runBatch(batch, {
    limits: {
      maxJobs: config.maxJobs,
      maxAcquire: config.maxAcquire,
      maxTranscode: config.maxTranscode,
    },
    collaborators: deps.collaborators ?? createCollaborators(),
    settings: {
      outputRoot: config.outputDir,
      cacheDir: config.cacheDir,
      container: config.container,
      subtitleLanguages: config.subtitleLanguages,
      overwrite: config.overwrite,
    },
    workRoot: config.workDir,
    retryPolicy: {
      maxRetries: config.retries,
      baseDelayMs: config.retryDelayMs,
      maxDelayMs: config.maxRetryDelayMs,
    },
    stageTimeoutMs: config.stageTimeoutMs,
    resume: config.resume,
    keepWork: config.keepWork,
    dedupe: config.dedupe,
    logger,
    signal: deps.signal,
    sleep: deps.sleep,
  });
}
