import {
  FAILURE_CODE,
  ToolError,
  assertStageTransition,
  type AcceptedJob,
  type JobOutcomeStatus,
  type JobSpec,
  type PipelineError,
  type StageId,
  type StageRef,
  type StageSkipReason,
  type StageStatus,
  type Track,
} from "@trackpress/core";
import type { ArtifactRole, StageArtifact } from "../stages/types";
import { planStages, predecessorOf, type StagePlan } from "./plan";
import type { WorkingDirectory } from "./working-dir";

export interface StageState {
  ref: StageRef;
  status: StageStatus;
  skipReason?: StageSkipReason;
  attempts: number;
  durationMs?: number;
  failure?: PipelineError;
  diagnostics: string[];
}

export interface StageCompletion {
  artifacts: StageArtifact[];
  attempts: number;
  durationMs: number;
  diagnostics: string[];
}

export interface RunFailure {
  ref: StageRef;
  error: PipelineError;
}

// Per-job state: stage statuses in plan order, artifacts handed between stages, final outputs.
export class PipelineRun {
  readonly job: AcceptedJob;
  readonly plan: StagePlan;
  readonly workingDirectory: WorkingDirectory;
  readonly finalOutputPaths: Partial<Record<Track, string>> = {};
  private readonly states = new Map<StageId, StageState>();
  private readonly outputs = new Map<StageId, StageArtifact[]>();

  constructor(job: AcceptedJob, workingDirectory: WorkingDirectory) {
    this.job = job;
    this.workingDirectory = workingDirectory;
    this.plan = planStages(job.spec.kind);
    for (const ref of this.plan.stages) {
      this.states.set(ref.id, { ref, status: "pending", attempts: 0, diagnostics: [] });
    }
  }

  get spec(): JobSpec {
    return this.job.spec;
  }

  get index(): number {
    return this.job.index;
  }

  get targetTracks(): readonly Track[] {
    return this.plan.targetTracks;
  }

  get stageStates(): StageState[] {
    return this.plan.stages.map((ref) => this.stage(ref.id));
  }

  chain(track: Track): StageRef[] {
    return this.plan.chains.get(track) ?? [];
  }

  predecessorOf(id: StageId): StageId | null {
    return predecessorOf(id, this.plan);
  }

  stage(id: StageId): StageState {
    const state = this.states.get(id);
    if (!state) {
      throw new Error(`Stage ${id} is not part of this job`);
    }
    return state;
  }

  private transition(id: StageId, to: StageStatus): StageState {
    const state = this.stage(id);
    assertStageTransition(id, state.status, to);
    state.status = to;
    return state;
  }

  start(id: StageId): void {
    this.transition(id, "running");
  }

  succeed(id: StageId, completion: StageCompletion): void {
    const state = this.transition(id, "succeeded");
    state.attempts = completion.attempts;
    state.durationMs = completion.durationMs;
    state.diagnostics = completion.diagnostics;
    this.outputs.set(id, completion.artifacts);
    this.recordFinalOutput(state.ref, completion.artifacts);
  }

  fail(id: StageId, error: PipelineError, attempts: number, durationMs: number): void {
    const state = this.transition(id, "failed");
    state.failure = error;
    state.attempts = attempts;
    state.durationMs = durationMs;
  }

  skip(id: StageId, reason: StageSkipReason, artifacts?: StageArtifact[]): void {
    const state = this.transition(id, "skipped");
    state.skipReason = reason;
    if (artifacts) {
      this.outputs.set(id, artifacts);
      this.recordFinalOutput(state.ref, artifacts);
    }
  }

  // Marks every still-pending stage in `refs` as skipped.
  skipPending(refs: StageRef[], reason: StageSkipReason): void {
    for (const ref of refs) {
      if (this.stage(ref.id).status === "pending") {
        this.skip(ref.id, reason);
      }
    }
  }

  private recordFinalOutput(ref: StageRef, artifacts: StageArtifact[]): void {
    if (ref.name !== "place" || !ref.track) {
      return;
    }
    const output = artifacts.find((artifact) => artifact.role === "output");
    if (output) {
      this.finalOutputPaths[ref.track] = output.path;
    }
  }

  artifactsOf(id: StageId): StageArtifact[] {
    return this.outputs.get(id) ?? [];
  }

  findArtifact(id: StageId, role: ArtifactRole): string | undefined {
    return this.artifactsOf(id).find((artifact) => artifact.role === role)?.path;
  }

  requireArtifact(id: StageId, role: ArtifactRole): string {
    const path = this.findArtifact(id, role);
    if (!path) {
      throw new ToolError(`No ${role} artifact from ${id}`, FAILURE_CODE.MISSING_ARTIFACT);
    }
    return path;
  }

  firstFailure(): RunFailure | undefined {
    for (const state of this.stageStates) {
      if (state.status === "failed" && state.failure) {
        return { ref: state.ref, error: state.failure };
      }
    }
    return undefined;
  }

  isChainBlocked(track: Track): boolean {
    if (this.stage("acquire").status === "failed") {
      return true;
    }
    return this.chain(track).some((ref) => this.stage(ref.id).status === "failed");
  }

  outcome(): JobOutcomeStatus {
    const states = this.stageStates;
    const failure = this.firstFailure();
    const wasCancelled =
      failure?.error.category === "cancelled" ||
      states.some((state) => state.skipReason === "cancelled");
    if (wasCancelled) {
      return "cancelled";
    }
    if (failure) {
      return "failed";
    }
    if (states.every((state) => state.status === "skipped")) {
      return "skipped";
    }
    if (states.every((state) => state.status === "succeeded" || state.status === "skipped")) {
      return "succeeded";
    }
    // Pending stages left behind count as cancelled work
    return "cancelled";
  }
}
