import { stat } from "node:fs/promises";
import { FAILURE_CODE, ToolError, type PipelineError } from "@trackpress/core";
import type { Collaborators, ToolCallContext } from "@trackpress/tools";
import type { Logger } from "./logger";
import type { OutputPlacer } from "./output-placer";
import type { PipelineRun } from "./pipeline/pipeline-run";
import { withRetry, type RetryPolicy, type SleepFn } from "./retry";
import type { DestinationClaims } from "./scheduler/destination-claims";
import type { LaneLimiter } from "./scheduler/lane-limiter";
import type { PipelineStage, StageOutput, StageSettings } from "./stages/types";

export interface StageExecutorOptions {
  collaborators: Collaborators;
  lanes: LaneLimiter;
  retryPolicy: RetryPolicy;
  // Limit for a single collaborator call
  stageTimeoutMs: number;
  settings: StageSettings;
  placer: OutputPlacer;
  claims?: DestinationClaims;
  signal?: AbortSignal;
  logger: Logger;
  sleep?: SleepFn;
}

export type StageResult =
  | { status: "succeeded"; output: StageOutput; attempts: number; durationMs: number }
  | { status: "failed"; error: PipelineError; attempts: number; durationMs: number };

async function assertUsableArtifacts(stage: PipelineStage, output: StageOutput): Promise<void> {
  if (output.artifacts.length === 0) {
    throw new ToolError(`${stage.ref.id} produced no artifacts`, FAILURE_CODE.MISSING_ARTIFACT);
  }
  for (const artifact of output.artifacts) {
    let size = 0;
    try {
      const info = await stat(artifact.path);
      size = info.isFile() ? info.size : 0;
    } catch {
      size = 0;
    }
    if (size === 0) {
      throw new ToolError(
        `${stage.ref.id} produced no usable ${artifact.role} file: ${artifact.path}`,
        FAILURE_CODE.MISSING_ARTIFACT,
      );
    }
  }
}

// Runs one stage of one job: lane slot per attempt, retries for transient failures,
// and the stage's state transitions on the run.
export class StageExecutor {
  private readonly options: StageExecutorOptions;

  constructor(options: StageExecutorOptions) {
    this.options = options;
  }

  get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  private toolContext(run: PipelineRun, logger: Logger): ToolCallContext {
    return {
      cwd: run.workingDirectory.root,
      timeoutMs: this.options.stageTimeoutMs,
      signal: this.options.signal,
      onCommand: (commandLine) => logger.debug(`$ ${commandLine}`),
      onOutput: (line, stream) => logger.debug(line, { stream }),
    };
  }

  private async attempt(stage: PipelineStage, run: PipelineRun, logger: Logger): Promise<StageOutput> {
    const output = await stage.run({
      run,
      collaborators: this.options.collaborators,
      settings: this.options.settings,
      placer: this.options.placer,
      claims: this.options.claims,
      tool: this.toolContext(run, logger),
    });
    await assertUsableArtifacts(stage, output);
    return output;
  }

  async execute(stage: PipelineStage, run: PipelineRun): Promise<StageResult> {
    const { ref } = stage;
    const logger = this.options.logger.child({ jobIndex: run.index, stage: ref.id });
    const startedAt = Date.now();

    run.start(ref.id);
    logger.stepStart(ref.id, stage.describe(run));

    const outcome = await withRetry(
      () =>
        this.options.lanes.run(stage.lane, () => this.attempt(stage, run, logger), this.options.signal),
      {
        policy: this.options.retryPolicy,
        seedKey: `${run.workingDirectory.key}:${ref.id}`,
        signal: this.options.signal,
        logger,
        sleep: this.options.sleep,
      },
    );
    const durationMs = Date.now() - startedAt;

    if (!outcome.ok) {
      run.fail(ref.id, outcome.error, outcome.attempts, durationMs);
      if (outcome.error.category === "cancelled") {
        logger.stepSkipped(ref.id, "cancelled");
      } else {
        logger.stepFailed(ref.id, outcome.error.message);
      }
      return { status: "failed", error: outcome.error, attempts: outcome.attempts, durationMs };
    }

    for (const diagnostic of outcome.value.diagnostics) {
      logger.warn(diagnostic);
    }
    run.succeed(ref.id, {
      artifacts: outcome.value.artifacts,
      attempts: outcome.attempts,
      durationMs,
      diagnostics: outcome.value.diagnostics,
    });
    logger.stepComplete(ref.id, durationMs);
    return { status: "succeeded", output: outcome.value, attempts: outcome.attempts, durationMs };
  }
}
