import type { Track } from "@trackpress/core";

export const YT_DLP_FORMATS: Record<Track, string> = {
  audio: "bestaudio",
  video: "bestvideo",
};

export const SUBTITLE_BASENAME = "subtitles";

export interface YtDlpArgsInput {
  sourceLocator: string;
  stream: Track;
  outputDir: string;
  subtitleLanguages: string[];
  cacheDir?: string;
}

export function buildYtDlpArgs(input: YtDlpArgsInput): string[] {
  const args = [
    "--no-playlist",
    "--no-progress",
    "--force-overwrites",
    "-f",
    YT_DLP_FORMATS[input.stream],
    "-o",
    `${input.outputDir}/${input.stream}.%(ext)s`,
  ];
  if (input.cacheDir) {
    args.push("--cache-dir", input.cacheDir);
  } else {
    args.push("--no-cache-dir");
  }
  // Subtitles ride along with the video stream only
  if (input.stream === "video" && input.subtitleLanguages.length > 0) {
    args.push(
      "--write-subs",
      "--sub-langs",
      input.subtitleLanguages.join(","),
      "--convert-subs",
      "srt",
      "-o",
      `subtitle:${input.outputDir}/${SUBTITLE_BASENAME}.%(ext)s`,
    );
  }
  args.push("--print", "after_move:filepath", "--no-simulate", "--", input.sourceLocator);
  return args;
}

// The last printed line is the final file path after all post-processing.
export function parseDownloadedPath(stdout: string): string | null {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("["));
  return lines.at(-1) ?? null;
}

export function isSubtitleFile(fileName: string): boolean {
  return fileName.startsWith(`${SUBTITLE_BASENAME}.`) && /\.(srt|vtt|ass)$/i.test(fileName);
}

// subtitles.en.srt -> en
export function subtitleLanguageOf(fileName: string): string | null {
  const match = fileName.match(/^subtitles\.([^.]+)\.[^.]+$/);
  return match?.[1] ?? null;
}
