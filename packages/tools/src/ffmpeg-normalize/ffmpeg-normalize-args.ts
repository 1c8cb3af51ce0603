import { AUDIO_BITRATE, AUDIO_CODEC } from "../ffmpeg/ffmpeg-args";

export const LOUDNESS_TARGET_LUFS = -14;

export interface NormalizeArgsInput {
  inputPath: string;
  outputPath: string;
  targetLufs?: number;
}

// EBU R128 to -14 LUFS, re-encoded as MP3 320k; video and subtitle streams are copied.
export function buildNormalizeArgs(input: NormalizeArgsInput): string[] {
  return [
    input.inputPath,
    "-o",
    input.outputPath,
    "-f",
    "-nt",
    "ebu",
    "-t",
    String(input.targetLufs ?? LOUDNESS_TARGET_LUFS),
    "--dual-mono",
    "-c:a",
    AUDIO_CODEC,
    "-b:a",
    AUDIO_BITRATE,
  ];
}
