import type { StageLane, StageRef } from "@trackpress/core";
import type { Collaborators, ToolCallContext, VideoContainer } from "@trackpress/tools";
import type { OutputPlacer } from "../output-placer";
import type { PipelineRun } from "../pipeline/pipeline-run";
import type { DestinationClaims } from "../scheduler/destination-claims";

export const ARTIFACT_ROLES = ["audio", "video", "subtitle", "output"] as const;
export type ArtifactRole = (typeof ARTIFACT_ROLES)[number];

export interface StageArtifact {
  role: ArtifactRole;
  // Absolute path
  path: string;
}

export interface StageOutput {
  artifacts: StageArtifact[];
  diagnostics: string[];
}

// Run-wide settings every stage may read.
export interface StageSettings {
  outputRoot: string;
  cacheDir?: string;
  container: VideoContainer;
  subtitleLanguages: string[];
  overwrite: boolean;
}

export interface StageContext {
  run: PipelineRun;
  collaborators: Collaborators;
  settings: StageSettings;
  placer: OutputPlacer;
  claims?: DestinationClaims;
  tool: ToolCallContext;
}

export interface PipelineStage {
  ref: StageRef;
  lane: StageLane;
  describe(run: PipelineRun): string;
  // Everything besides the input artifacts that decides the stage output
  fingerprintParams(run: PipelineRun, settings: StageSettings): Record<string, unknown>;
  // Files from outside the working directory whose content feeds the stage
  inputFiles?(run: PipelineRun): string[];
  run(context: StageContext): Promise<StageOutput>;
}
