import {
  FAILURE_CODE,
  PlacementError,
  STAGE_LANES,
  stageId,
  type Track,
} from "@trackpress/core";
import type { PipelineStage } from "./types";

export function createPlaceStage(track: Track): PipelineStage {
  const id = stageId("place", track);
  return {
    ref: { id, name: "place", track },
    lane: STAGE_LANES.place,
    describe: () => `Placing the ${track} file`,
    fingerprintParams: (run, settings) => ({
      outputRoot: settings.outputRoot,
      albumArtist: run.spec.albumArtist,
      albumName: run.spec.albumName,
      trackTitle: run.spec.trackTitle,
      container: track === "video" ? settings.container : null,
    }),
    async run({ run, settings, placer, claims }) {
      const destination = placer.destinationFor(run.spec, track);
      const owner = claims?.ownerOf(destination.path);
      if (!settings.overwrite && owner && owner.jobIndex !== run.index) {
        throw new PlacementError(
          `Destination ${destination.path} belongs to entry #${owner.jobIndex + 1}`,
          FAILURE_CODE.PLACEMENT_COLLISION,
        );
      }
      const finalPath = await placer.place(run, track);
      return { artifacts: [{ role: "output", path: finalPath }], diagnostics: [] };
    },
  };
}
