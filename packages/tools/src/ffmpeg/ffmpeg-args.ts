import type { TrackTags } from "../types";

export type VideoContainer = "mkv" | "mp4";

export const AUDIO_CODEC = "libmp3lame";
export const AUDIO_BITRATE = "320k";

const COMMON_ARGS = ["-hide_banner", "-nostdin", "-y", "-loglevel", "error"];

const SUBTITLE_CODECS: Record<VideoContainer, string> = {
  mkv: "srt",
  mp4: "mov_text",
};

export function buildAudioAssembleArgs(inputPath: string, outputPath: string): string[] {
  return [
    ...COMMON_ARGS,
    "-i",
    inputPath,
    "-vn",
    "-c:a",
    AUDIO_CODEC,
    "-b:a",
    AUDIO_BITRATE,
    outputPath,
  ];
}

export interface SubtitleInput {
  path: string;
  language: string | null;
}

export interface VideoAssembleArgsInput {
  videoPath: string;
  audioPath: string;
  subtitles: SubtitleInput[];
  container: VideoContainer;
  outputPath: string;
}

export function buildVideoAssembleArgs(input: VideoAssembleArgsInput): string[] {
  const args = [...COMMON_ARGS, "-i", input.videoPath, "-i", input.audioPath];
  for (const subtitle of input.subtitles) {
    args.push("-i", subtitle.path);
  }
  args.push("-map", "0:v:0", "-map", "1:a:0");
  input.subtitles.forEach((_, index) => {
    args.push("-map", `${index + 2}:s:0`);
  });
  args.push("-c:v", "copy", "-c:a", "copy");
  if (input.subtitles.length > 0) {
    args.push("-c:s", SUBTITLE_CODECS[input.container]);
    input.subtitles.forEach((subtitle, index) => {
      if (subtitle.language) {
        args.push(`-metadata:s:s:${index}`, `language=${subtitle.language}`);
      }
    });
  }
  if (input.container === "mp4") {
    args.push("-movflags", "+faststart");
  }
  args.push("-f", input.container === "mkv" ? "matroska" : "mp4", input.outputPath);
  return args;
}

export interface TagArgsInput {
  inputPath: string;
  outputPath: string;
  tags: TrackTags;
  coverImagePath?: string;
}

// ID3v2.3: album_artist -> TPE2, date -> TYER, comment -> COMM.
export function buildTagArgs(input: TagArgsInput): string[] {
  const args = [...COMMON_ARGS, "-i", input.inputPath];
  if (input.coverImagePath) {
    args.push("-i", input.coverImagePath, "-map", "0:a", "-map", "1:0");
  } else {
    args.push("-map", "0:a");
  }
  args.push("-c", "copy", "-map_metadata", "-1", "-id3v2_version", "3", "-write_id3v1", "1");

  const metadata: Array<[string, string]> = [
    ["album_artist", input.tags.albumArtist],
    ["album", input.tags.album],
    ["title", input.tags.title],
    ["artist", input.tags.artist],
    ["genre", input.tags.genre],
    ["date", String(input.tags.year)],
    ["comment", input.tags.sourceLink],
  ];
  for (const [key, value] of metadata) {
    args.push("-metadata", `${key}=${value}`);
  }

  if (input.coverImagePath) {
    args.push(
      "-metadata:s:v",
      "title=Album cover",
      "-metadata:s:v",
      "comment=Cover (front)",
      "-disposition:v",
      "attached_pic",
    );
  }
  args.push("-f", "mp3", input.outputPath);
  return args;
}
