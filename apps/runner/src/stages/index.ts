import type { StageRef } from "@trackpress/core";
import { createAcquireStage } from "./acquire";
import { createAssembleStage } from "./assemble";
import { createNormalizeStage } from "./normalize";
import { createPlaceStage } from "./place";
import { createTagStage } from "./tag";
import type { PipelineStage } from "./types";

export function createStage(ref: StageRef): PipelineStage {
  switch (ref.name) {
    case "acquire":
      return createAcquireStage();
    case "assemble":
      return createAssembleStage(ref.track ?? "audio");
    case "normalize":
      return createNormalizeStage(ref.track ?? "audio");
    case "tag":
      return createTagStage();
    case "place":
      return createPlaceStage(ref.track ?? "audio");
  }
}

export { createAcquireStage, createAssembleStage, createNormalizeStage, createPlaceStage, createTagStage };
export { tagsFor } from "./tag";
export * from "./types";
