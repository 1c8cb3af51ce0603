import { join } from "node:path";
import { STAGE_LANES, stageId } from "@trackpress/core";
import type { TrackTags } from "@trackpress/tools";
import type { PipelineRun } from "../pipeline/pipeline-run";
import { trackArtifactsDir } from "../pipeline/working-dir";
import type { PipelineStage } from "./types";

export function tagsFor(run: PipelineRun): TrackTags {
  const { spec } = run;
  return {
    albumArtist: spec.albumArtist,
    album: spec.albumName,
    title: spec.trackTitle,
    artist: spec.trackArtist,
    genre: spec.genre,
    year: spec.year,
    sourceLink: spec.sourceLocator,
  };
}

// Audio only: video containers keep the metadata of their streams.
export function createTagStage(): PipelineStage {
  const id = stageId("tag", "audio");
  return {
    ref: { id, name: "tag", track: "audio" },
    lane: STAGE_LANES.tag,
    describe: (run) => `Writing ID3 tags for ${run.spec.trackTitle}`,
    fingerprintParams: (run) => ({
      tags: tagsFor(run),
      coverImagePath: run.spec.coverImagePath ?? null,
    }),
    inputFiles: (run) => (run.spec.coverImagePath ? [run.spec.coverImagePath] : []),
    async run({ run, collaborators, tool }) {
      const inputPath = run.requireArtifact(stageId("normalize", "audio"), "output");
      const outputPath = join(trackArtifactsDir(run.workingDirectory, "audio"), "tagged.mp3");
      const output = await collaborators.tagger.tag(
        {
          inputPath,
          outputPath,
          tags: tagsFor(run),
          coverImagePath: run.spec.coverImagePath,
        },
        tool,
      );
      return {
        artifacts: [{ role: "output", path: output.outputPath }],
        diagnostics: output.diagnostics,
      };
    },
  };
}
