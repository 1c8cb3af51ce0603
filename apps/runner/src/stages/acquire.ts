import {
  FAILURE_CODE,
  STAGE_LANES,
  ToolError,
  acquireStage,
  resolveAcquireStreams,
  type JobSpec,
} from "@trackpress/core";
import type { PipelineRun } from "../pipeline/pipeline-run";
import type { PipelineStage, StageArtifact, StageSettings } from "./types";

function subtitleLanguagesFor(spec: JobSpec, settings: StageSettings): string[] {
  return resolveAcquireStreams(spec.kind).includes("video") ? settings.subtitleLanguages : [];
}

export function createAcquireStage(): PipelineStage {
  const ref = acquireStage();
  return {
    ref,
    lane: STAGE_LANES.acquire,
    describe: (run: PipelineRun) =>
      `Acquiring ${resolveAcquireStreams(run.spec.kind).join("+")} from ${run.spec.sourceLocator}`,
    fingerprintParams: (run, settings) => ({
      sourceLocator: run.spec.sourceLocator,
      streams: resolveAcquireStreams(run.spec.kind),
      subtitleLanguages: subtitleLanguagesFor(run.spec, settings),
    }),
    async run({ run, collaborators, settings, tool }) {
      const streams = resolveAcquireStreams(run.spec.kind);
      const media = await collaborators.acquirer.acquire(
        {
          sourceLocator: run.spec.sourceLocator,
          streams,
          outputDir: run.workingDirectory.acquireDir,
          subtitleLanguages: subtitleLanguagesFor(run.spec, settings),
          cacheDir: settings.cacheDir,
        },
        tool,
      );

      const artifacts: StageArtifact[] = [];
      for (const stream of streams) {
        const path = stream === "audio" ? media.audioPath : media.videoPath;
        if (!path) {
          throw new ToolError(`Acquire returned no ${stream} stream`, FAILURE_CODE.MISSING_ARTIFACT);
        }
        artifacts.push({ role: stream, path });
      }
      for (const path of media.subtitlePaths) {
        artifacts.push({ role: "subtitle", path });
      }
      return { artifacts, diagnostics: media.diagnostics };
    },
  };
}
