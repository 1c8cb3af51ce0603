import type { EnvSource } from "@trackpress/core";
import { resolveToolCommand } from "../executables";
import { describeCommand, runTool } from "../process/run-tool";
import { isSuccessfulRun, toolFailureFromResult } from "../process/tool-failure";
import type { TagRequest, Tagger, ToolCallContext, ToolOutput } from "../types";
import { buildTagArgs } from "./ffmpeg-args";

export interface FfmpegTaggerOptions {
  command?: string;
  env?: EnvSource;
}

export class FfmpegTagger implements Tagger {
  private readonly command: string;

  constructor(options: FfmpegTaggerOptions = {}) {
    this.command = options.command ?? resolveToolCommand("ffmpeg", options.env);
  }

  async tag(request: TagRequest, context: ToolCallContext): Promise<ToolOutput> {
    const args = buildTagArgs(request);
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
      throw toolFailureFromResult("ffmpeg tag", result);
    }
    return { outputPath: request.outputPath, diagnostics: [] };
  }
}
