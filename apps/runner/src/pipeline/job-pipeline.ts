import {
  describeJob,
  toPipelineError,
  type AcceptedJob,
  type JobOutcomeStatus,
  type StageId,
  type StageRef,
  type StageSkipReason,
  type Track,
} from "@trackpress/core";
import type { Logger } from "../logger";
import type { StageExecutor } from "../stage-executor";
import { createStage } from "../stages/index";
import type { PipelineStage, StageSettings } from "../stages/types";
import {
  artifactsIntact,
  markerArtifacts,
  markerDigests,
  readCompletionMarker,
  removeCompletionMarker,
  writeCompletionMarker,
  type CompletionMarker,
} from "./completion-marker";
import { computeStageFingerprint, digestInputFile } from "./fingerprint";
import { PipelineRun } from "./pipeline-run";
import {
  acquireWorkingDirectoryLock,
  prepareWorkingDirectory,
  releaseWorkingDirectoryLock,
  removeArtifacts,
  type WorkingDirectory,
  type WorkingDirectoryLock,
} from "./working-dir";

export interface JobPipelineOptions {
  executor: StageExecutor;
  settings: StageSettings;
  resume: boolean;
  keepWork: boolean;
  logger: Logger;
  stageFactory?: (ref: StageRef) => PipelineStage;
}

export interface JobRunResult {
  run: PipelineRun;
  status: JobOutcomeStatus;
  durationMs: number;
}

// Furthest reusable position in [acquire, ...chain], or -1.
export interface ChainResumePoint {
  track: Track;
  position: number;
}

export interface ResumePlan {
  markers: Map<StageId, CompletionMarker>;
  points: ChainResumePoint[];
  reuseAcquire: boolean;
}

// Runs one job: acquire once, then each track chain in order, skipping what earlier runs finished.
export class JobPipeline {
  private readonly options: JobPipelineOptions;
  private readonly stageFactory: (ref: StageRef) => PipelineStage;

  constructor(options: JobPipelineOptions) {
    this.options = options;
    this.stageFactory = options.stageFactory ?? createStage;
  }

  private get signal(): AbortSignal | undefined {
    return this.options.executor.signal;
  }

  private blockedReason(): StageSkipReason {
    return this.signal?.aborted ? "cancelled" : "dependency_failed";
  }

  private async fingerprintOf(
    run: PipelineRun,
    stage: PipelineStage,
    markers: Map<StageId, CompletionMarker>,
  ): Promise<string> {
    const predecessor = run.predecessorOf(stage.ref.id);
    const inputMarker = predecessor ? markers.get(predecessor) : undefined;
    const fileDigests = await Promise.all((stage.inputFiles?.(run) ?? []).map(digestInputFile));
    return computeStageFingerprint(
      stage.ref.id,
      stage.fingerprintParams(run, this.options.settings),
      [...(inputMarker ? markerDigests(inputMarker) : []), ...fileDigests],
    );
  }

  // A marker counts only when its fingerprint matches what this run would compute.
  async planResume(run: PipelineRun): Promise<ResumePlan> {
    const consistent = new Map<StageId, CompletionMarker>();
    const logger = this.options.logger.child({ jobIndex: run.index });

    const loadConsistent = async (ref: StageRef): Promise<CompletionMarker | undefined> => {
      const result = await readCompletionMarker(run.workingDirectory, ref.id);
      if (result.status === "invalid") {
        logger.debug(`Ignoring marker for ${ref.id}: ${result.reason}`);
        return undefined;
      }
      if (result.status === "missing") {
        return undefined;
      }
      const expected = await this.fingerprintOf(run, this.stageFactory(ref), consistent);
      if (result.marker.fingerprint !== expected) {
        logger.debug(`Marker for ${ref.id} is stale`);
        return undefined;
      }
      consistent.set(ref.id, result.marker);
      return result.marker;
    };

    const acquireRef = run.stage("acquire").ref;
    const acquireMarker = await loadConsistent(acquireRef);
    const points: ChainResumePoint[] = [];
    const reusable = new Map<StageId, CompletionMarker>();

    for (const track of run.targetTracks) {
      const sequence = [acquireRef, ...run.chain(track)];
      const chainMarkers: CompletionMarker[] = [];
      if (acquireMarker) {
        chainMarkers.push(acquireMarker);
        for (const ref of run.chain(track)) {
          const marker = await loadConsistent(ref);
          if (!marker) {
            break;
          }
          chainMarkers.push(marker);
        }
      }

      let position = chainMarkers.length - 1;
      while (position >= 0) {
        const marker = chainMarkers[position];
        if (marker && (await artifactsIntact(marker))) {
          break;
        }
        position -= 1;
      }
      points.push({ track, position });
      for (let index = 1; index <= position; index += 1) {
        const ref = sequence[index];
        const marker = chainMarkers[index];
        if (ref && marker) {
          reusable.set(ref.id, marker);
        }
      }
    }

    const reuseAcquire = acquireMarker !== undefined && points.every((point) => point.position >= 0);
    if (acquireMarker && reuseAcquire) {
      reusable.set("acquire", acquireMarker);
    }
    return { markers: reusable, points, reuseAcquire };
  }

  private applyResume(run: PipelineRun, plan: ResumePlan, logger: Logger): void {
    for (const ref of run.plan.stages) {
      const marker = plan.markers.get(ref.id);
      if (marker) {
        run.skip(ref.id, "resumed", markerArtifacts(marker));
        logger.child({ stage: ref.id }).stepSkipped(ref.id, "resumed");
      }
    }
  }

  private async executeStage(
    run: PipelineRun,
    ref: StageRef,
    markers: Map<StageId, CompletionMarker>,
    logger: Logger,
  ): Promise<boolean> {
    const stage = this.stageFactory(ref);
    const fingerprint = await this.fingerprintOf(run, stage, markers);
    markers.delete(ref.id);
    await removeCompletionMarker(run.workingDirectory, ref.id);

    const result = await this.options.executor.execute(stage, run);
    if (result.status === "failed") {
      return false;
    }

    try {
      markers.set(
        ref.id,
        await writeCompletionMarker(run.workingDirectory, ref.id, fingerprint, result.output.artifacts),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not record completion of ${ref.id}, it will run again next time: ${message}`);
    }
    return true;
  }

  private async runStages(
    run: PipelineRun,
    markers: Map<StageId, CompletionMarker>,
    logger: Logger,
  ): Promise<void> {
    const acquire = run.stage("acquire");
    if (acquire.status === "pending") {
      if (this.signal?.aborted) {
        run.skipPending(run.plan.stages, "cancelled");
        return;
      }
      const acquired = await this.executeStage(run, acquire.ref, markers, logger);
      if (!acquired) {
        run.skipPending(run.plan.stages, this.blockedReason());
        return;
      }
    }

    // One chain failing never stops the other.
    for (const track of run.targetTracks) {
      const chain = run.chain(track);
      for (const [position, ref] of chain.entries()) {
        if (run.stage(ref.id).status !== "pending") {
          continue;
        }
        if (this.signal?.aborted) {
          run.skipPending(chain.slice(position), "cancelled");
          break;
        }
        if (run.isChainBlocked(track)) {
          run.skipPending(chain.slice(position), this.blockedReason());
          break;
        }
        const ok = await this.executeStage(run, ref, markers, logger);
        if (!ok) {
          run.skipPending(chain.slice(position + 1), this.blockedReason());
          break;
        }
      }
    }
  }

  async run(job: AcceptedJob, directory: WorkingDirectory): Promise<JobRunResult> {
    const startedAt = Date.now();
    const run = new PipelineRun(job, directory);
    const logger = this.options.logger.child({ jobIndex: job.index });
    logger.jobStart(describeJob(job.spec));

    let lock: WorkingDirectoryLock | undefined;
    try {
      lock = await acquireWorkingDirectoryLock(directory);
      await prepareWorkingDirectory(directory);
    } catch (error) {
      const failure = toPipelineError(error);
      run.start("acquire");
      run.fail("acquire", failure, 0, Date.now() - startedAt);
      logger.child({ stage: "acquire" }).stepFailed("acquire", failure.message);
      run.skipPending(run.plan.stages, "dependency_failed");
      if (lock) {
        await releaseWorkingDirectoryLock(lock);
      }
      return this.finish(run, startedAt, logger);
    }

    try {
      const markers = new Map<StageId, CompletionMarker>();
      if (this.options.resume) {
        const plan = await this.planResume(run);
        this.applyResume(run, plan, logger);
        for (const [id, marker] of plan.markers) {
          markers.set(id, marker);
        }
      }

      await this.runStages(run, markers, logger);

      const status = run.outcome();
      if ((status === "succeeded" || status === "skipped") && !this.options.keepWork) {
        await removeArtifacts(directory);
      }
    } finally {
      if (lock) {
        await releaseWorkingDirectoryLock(lock);
      }
    }
    return this.finish(run, startedAt, logger);
  }

  private finish(run: PipelineRun, startedAt: number, logger: Logger): JobRunResult {
    const durationMs = Date.now() - startedAt;
    const status = run.outcome();
    logger.jobFinished(status, durationMs);
    return { run, status, durationMs };
  }
}
