import { basename } from "node:path";
import { ToolError, type EnvSource } from "@trackpress/core";
import { resolveToolCommand } from "../executables";
import { describeCommand, runTool } from "../process/run-tool";
import { isSuccessfulRun, toolFailureFromResult } from "../process/tool-failure";
import { subtitleLanguageOf } from "../yt-dlp/yt-dlp-args";
import type { AssembleRequest, Assembler, ToolCallContext, ToolOutput } from "../types";
import { buildAudioAssembleArgs, buildVideoAssembleArgs } from "./ffmpeg-args";

export interface FfmpegAssemblerOptions {
  command?: string;
  env?: EnvSource;
}

export class FfmpegAssembler implements Assembler {
  private readonly command: string;

  constructor(options: FfmpegAssemblerOptions = {}) {
    this.command = options.command ?? resolveToolCommand("ffmpeg", options.env);
  }

  async assemble(request: AssembleRequest, context: ToolCallContext): Promise<ToolOutput> {
    const args = this.buildArgs(request);
    context.onCommand?.(describeCommand(this.command, args));
    const result = await runTool({
      command: this.command,
      args,
      cwd: context.cwd,
      timeoutMs: context.timeoutMs,
      signal: context.signal,
      onLine: context.onOutput,
    });
    if (!isSuccessfulRun(result)) {
      throw toolFailureFromResult(`ffmpeg assemble (${request.track})`, result);
    }
    return { outputPath: request.outputPath, diagnostics: [] };
  }

  private buildArgs(request: AssembleRequest): string[] {
    if (request.track === "audio") {
      return buildAudioAssembleArgs(request.audioPath, request.outputPath);
    }
    if (!request.videoPath) {
      throw new ToolError("video assemble requires an acquired video stream");
    }
    return buildVideoAssembleArgs({
      videoPath: request.videoPath,
      audioPath: request.audioPath,
      subtitles: request.subtitlePaths.map((path) => ({
        path,
        language: subtitleLanguageOf(basename(path)),
      })),
      container: request.container,
      outputPath: request.outputPath,
    });
  }
}
