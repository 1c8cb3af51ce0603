import {
  acquireStage,
  resolveTargetTracks,
  trackStages,
  type JobKind,
  type StageId,
  type StageRef,
  type Track,
} from "@trackpress/core";

export interface StagePlan {
  targetTracks: Track[];
  // acquire, then each chain in target-track order
  stages: StageRef[];
  chains: Map<Track, StageRef[]>;
}

export function planStages(kind: JobKind): StagePlan {
  const targetTracks = resolveTargetTracks(kind);
  const chains = new Map<Track, StageRef[]>();
  const stages: StageRef[] = [acquireStage()];
  for (const track of targetTracks) {
    const chain = trackStages(track);
    chains.set(track, chain);
    stages.push(...chain);
  }
  return { targetTracks, stages, chains };
}

// The stage whose outputs feed `id`; null for acquire.
export function predecessorOf(id: StageId, plan: StagePlan): StageId | null {
  if (id === "acquire") {
    return null;
  }
  for (const chain of plan.chains.values()) {
    const position = chain.findIndex((ref) => ref.id === id);
    if (position === 0) {
      return "acquire";
    }
    if (position > 0) {
      return chain[position - 1]?.id ?? null;
    }
  }
  return null;
}
