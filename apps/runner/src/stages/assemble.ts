import { join } from "node:path";
import { STAGE_LANES, stageId, type Track } from "@trackpress/core";
import { AUDIO_BITRATE, AUDIO_CODEC } from "@trackpress/tools";
import { outputExtension } from "../output-placer";
import { trackArtifactsDir } from "../pipeline/working-dir";
import type { PipelineStage } from "./types";

export function createAssembleStage(track: Track): PipelineStage {
  const id = stageId("assemble", track);
  return {
    ref: { id, name: "assemble", track },
    lane: STAGE_LANES.assemble,
    describe: () =>
      track === "audio" ? "Converting audio to MP3 320k" : "Muxing video, audio and subtitles",
    fingerprintParams: (_run, settings) =>
      track === "audio"
        ? { codec: AUDIO_CODEC, bitrate: AUDIO_BITRATE }
        : { container: settings.container },
    async run({ run, collaborators, settings, tool }) {
      const outputPath = join(
        trackArtifactsDir(run.workingDirectory, track),
        `assembled.${outputExtension(track, settings.container)}`,
      );
      const audioPath = run.requireArtifact("acquire", "audio");
      const videoPath = track === "video" ? run.requireArtifact("acquire", "video") : undefined;
      const subtitlePaths =
        track === "video"
          ? run
              .artifactsOf("acquire")
              .filter((artifact) => artifact.role === "subtitle")
              .map((artifact) => artifact.path)
          : [];

      const output = await collaborators.assembler.assemble(
        { track, audioPath, videoPath, subtitlePaths, container: settings.container, outputPath },
        tool,
      );
      return {
        artifacts: [{ role: "output", path: output.outputPath }],
        diagnostics: output.diagnostics,
      };
    },
  };
}
