import type { EnvSource } from "@trackpress/core";
import { resolveToolCommand } from "../executables";
import { describeCommand, runTool } from "../process/run-tool";
import { isSuccessfulRun, toolFailureFromResult } from "../process/tool-failure";
import type { NormalizeRequest, Normalizer, ToolCallContext, ToolOutput } from "../types";
import { buildNormalizeArgs } from "./ffmpeg-normalize-args";

export interface FfmpegNormalizerOptions {
  command?: string;
  env?: EnvSource;
  targetLufs?: number;
}

export class FfmpegNormalizer implements Normalizer {
  private readonly command: string;
  private readonly targetLufs: number | undefined;

  constructor(options: FfmpegNormalizerOptions = {}) {
    this.command = options.command ?? resolveToolCommand("ffmpegNormalize", options.env);
    this.targetLufs = options.targetLufs;
  }

  async normalize(request: NormalizeRequest, context: ToolCallContext): Promise<ToolOutput> {
    const args = buildNormalizeArgs({
      inputPath: request.inputPath,
      outputPath: request.outputPath,
      targetLufs: this.targetLufs,
    });
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
      throw toolFailureFromResult(`ffmpeg-normalize (${request.track})`, result);
    }
    return { outputPath: request.outputPath, diagnostics: [] };
  }
}
