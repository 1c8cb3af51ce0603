import { mkdir, readdir, stat } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { ToolError, FAILURE_CODE, type EnvSource, type Track } from "@trackpress/core";
import { resolveToolCommand } from "../executables";
import { describeCommand, runTool } from "../process/run-tool";
import { collectWarnings, isSuccessfulRun, toolFailureFromResult } from "../process/tool-failure";
import type { AcquiredMedia, AcquireRequest, Acquirer, ToolCallContext } from "../types";
import { classifyYtDlpStderr } from "./yt-dlp-errors";
import { buildYtDlpArgs, isSubtitleFile, parseDownloadedPath } from "./yt-dlp-args";

export interface YtDlpAcquirerOptions {
  command?: string;
  env?: EnvSource;
}

async function isNonEmptyFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}

// Fallback when the printed path is missing: pick the finished <stream>.<ext> file.
async function findStreamFile(outputDir: string, stream: Track): Promise<string | null> {
  const entries = await readdir(outputDir);
  const candidate = entries
    .filter((name) => name.startsWith(`${stream}.`))
    .filter((name) => !/\.(part|ytdl|temp)$/i.test(name))
    .sort()
    .at(0);
  return candidate ? join(outputDir, candidate) : null;
}

export class YtDlpAcquirer implements Acquirer {
  private readonly command: string;

  constructor(options: YtDlpAcquirerOptions = {}) {
    this.command = options.command ?? resolveToolCommand("ytDlp", options.env);
  }

  async acquire(request: AcquireRequest, context: ToolCallContext): Promise<AcquiredMedia> {
    await mkdir(request.outputDir, { recursive: true });
    const media: AcquiredMedia = { subtitlePaths: [], diagnostics: [] };

    for (const stream of request.streams) {
      const path = await this.downloadStream(request, stream, context, media.diagnostics);
      if (stream === "audio") {
        media.audioPath = path;
      } else {
        media.videoPath = path;
      }
    }

    if (request.streams.includes("video") && request.subtitleLanguages.length > 0) {
      const entries = await readdir(request.outputDir);
      media.subtitlePaths = entries
        .filter(isSubtitleFile)
        .sort()
        .map((name) => join(request.outputDir, name));
      if (media.subtitlePaths.length === 0) {
        media.diagnostics.push(
          `no subtitles found for languages: ${request.subtitleLanguages.join(",")}`,
        );
      }
    }

    return media;
  }

  private async downloadStream(
    request: AcquireRequest,
    stream: Track,
    context: ToolCallContext,
    diagnostics: string[],
  ): Promise<string> {
    const args = buildYtDlpArgs({
      sourceLocator: request.sourceLocator,
      stream,
      outputDir: request.outputDir,
      subtitleLanguages: request.subtitleLanguages,
      cacheDir: request.cacheDir,
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
      throw toolFailureFromResult(`yt-dlp (${stream})`, result, classifyYtDlpStderr);
    }
    diagnostics.push(...collectWarnings(result.stderr));

    const printed = parseDownloadedPath(result.stdout);
    const resolved =
      printed !== null
        ? isAbsolute(printed)
          ? printed
          : join(context.cwd, printed)
        : await findStreamFile(request.outputDir, stream);
    if (!resolved || !(await isNonEmptyFile(resolved))) {
      throw new ToolError(
        `yt-dlp (${stream}) reported success but produced no file`,
        FAILURE_CODE.MISSING_ARTIFACT,
      );
    }
    return resolved;
  }
}
