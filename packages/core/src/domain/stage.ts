import { z } from "zod";
import type { JobKind } from "./job-spec";

// Stage names in their fixed relative order
export const StageName = z.enum(["acquire", "assemble", "normalize", "tag", "place"]);
export type StageName = z.infer<typeof StageName>;

export const StageStatus = z.enum([
  "pending", // not started
  "running", // collaborator call in flight
  "succeeded",
  "failed",
  "skipped", // see StageSkipReason
]);
export type StageStatus = z.infer<typeof StageStatus>;

export const StageSkipReason = z.enum([
  "resumed", // completion marker from an earlier run was reused
  "dependency_failed", // an earlier stage of the same chain failed
  "cancelled", // the run was cancelled before the stage started
  "duplicate", // the whole job was deduplicated against an earlier row
]);
export type StageSkipReason = z.infer<typeof StageSkipReason>;

export const Track = z.enum(["audio", "video"]);
export type Track = z.infer<typeof Track>;

// Lane a stage occupies while it runs
export const StageLane = z.enum(["network", "transcode", "light"]);
export type StageLane = z.infer<typeof StageLane>;

export type TrackStageName = Exclude<StageName, "acquire">;

// "acquire" is shared by every chain of a job; the rest are qualified by track.
export type StageId = "acquire" | `${Track}.${TrackStageName}`;

export interface StageRef {
  id: StageId;
  name: StageName;
  track: Track | null;
}

const TRACK_CHAINS: Record<Track, readonly TrackStageName[]> = {
  audio: ["assemble", "normalize", "tag", "place"],
  // Video containers are not tagged.
  video: ["assemble", "normalize", "place"],
};

export const STAGE_LANES: Record<StageName, StageLane> = {
  acquire: "network",
  assemble: "transcode",
  normalize: "transcode",
  tag: "light",
  place: "light",
};

export function stageId(name: TrackStageName, track: Track): StageId {
  return `${track}.${name}`;
}

export function acquireStage(): StageRef {
  return { id: "acquire", name: "acquire", track: null };
}

export function trackStages(track: Track): StageRef[] {
  return TRACK_CHAINS[track].map((name) => ({ id: stageId(name, track), name, track }));
}

export function resolveTargetTracks(kind: JobKind): Track[] {
  switch (kind) {
    case "audio_only":
      return ["audio"];
    case "video_only":
      return ["video"];
    case "audio_and_video":
      // Video first, then audio, matching the order the streams are used.
      return ["video", "audio"];
  }
}

// Streams the acquire stage must fetch. Video output needs the audio stream too.
export function resolveAcquireStreams(kind: JobKind): Track[] {
  return kind === "audio_only" ? ["audio"] : ["audio", "video"];
}

export function canTransitionStage(from: StageStatus, to: StageStatus): boolean {
  switch (from) {
    case "pending":
      return to === "running" || to === "skipped";
    case "running":
      return to === "succeeded" || to === "failed";
    case "succeeded":
    case "failed":
    case "skipped":
      return false;
  }
}

export function assertStageTransition(stage: StageId, from: StageStatus, to: StageStatus): void {
  if (!canTransitionStage(from, to)) {
    throw new Error(`Invalid stage transition for ${stage}: ${from} -> ${to}`);
  }
}
