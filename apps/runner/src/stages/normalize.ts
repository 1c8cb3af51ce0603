import { join } from "node:path";
import { STAGE_LANES, stageId, type Track } from "@trackpress/core";
import { AUDIO_BITRATE, AUDIO_CODEC, LOUDNESS_TARGET_LUFS } from "@trackpress/tools";
import { outputExtension } from "../output-placer";
import { trackArtifactsDir } from "../pipeline/working-dir";
import type { PipelineStage } from "./types";

export function createNormalizeStage(track: Track): PipelineStage {
  const id = stageId("normalize", track);
  return {
    ref: { id, name: "normalize", track },
    lane: STAGE_LANES.normalize,
    describe: () => `Normalizing loudness to ${LOUDNESS_TARGET_LUFS} LUFS`,
    fingerprintParams: () => ({
      targetLufs: LOUDNESS_TARGET_LUFS,
      standard: "ebu",
      dualMono: true,
      codec: AUDIO_CODEC,
      bitrate: AUDIO_BITRATE,
    }),
    async run({ run, collaborators, settings, tool }) {
      const inputPath = run.requireArtifact(stageId("assemble", track), "output");
      const outputPath = join(
        trackArtifactsDir(run.workingDirectory, track),
        `normalized.${outputExtension(track, settings.container)}`,
      );
      const output = await collaborators.normalizer.normalize(
        { track, inputPath, outputPath },
        tool,
      );
      return {
        artifacts: [{ role: "output", path: output.outputPath }],
        diagnostics: output.diagnostics,
      };
    },
  };
}
