import { readRuntimeEnv, type EnvSource } from "@trackpress/core";

export const TOOL_EXECUTABLES = {
  ytDlp: { envKey: "YT_DLP_PATH", defaultCommand: "yt-dlp" },
  ffmpeg: { envKey: "FFMPEG_PATH", defaultCommand: "ffmpeg" },
  ffmpegNormalize: { envKey: "FFMPEG_NORMALIZE_PATH", defaultCommand: "ffmpeg-normalize" },
} as const;

export type ToolName = keyof typeof TOOL_EXECUTABLES;

export const REQUIRED_TOOLS: ToolName[] = ["ytDlp", "ffmpeg", "ffmpegNormalize"];

export function resolveToolCommand(
  tool: ToolName,
  env?: EnvSource,
  processEnv: EnvSource = process.env,
): string {
  const spec = TOOL_EXECUTABLES[tool];
  return readRuntimeEnv(env, spec.envKey, processEnv)?.trim() ?? spec.defaultCommand;
}
