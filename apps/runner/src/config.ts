import { stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import {
  parseBooleanEnvValue,
  parseIntegerEnvValue,
  resolveLogDir,
  type EnvSource,
} from "@trackpress/core";
import { parseContainer, parseSubtitleLanguages, UsageError, type CliOptions } from "./cli";

export const DEFAULT_MAX_JOBS = 4;
export const DEFAULT_MAX_ACQUIRE = 2;
export const DEFAULT_MAX_TRANSCODE = 2;
export const DEFAULT_STAGE_RETRIES = 2;
export const DEFAULT_STAGE_TIMEOUT_SECONDS = 1800;
export const DEFAULT_RETRY_DELAY_MS = 2000;
export const DEFAULT_MAX_RETRY_DELAY_MS = 60_000;
export const WORK_DIR_NAME = ".trackpress";

export const RunnerConfig = z.object({
  inputList: z.string().min(1),
  outputDir: z.string().min(1),
  coverDir: z.string().min(1),
  workDir: z.string().min(1),
  cacheDir: z.string().min(1),
  logDir: z.string().min(1),
  verbosity: z.number().int().nonnegative(),
  // <= 0 means unlimited
  maxJobs: z.number().int(),
  maxAcquire: z.number().int(),
  maxTranscode: z.number().int(),
  retries: z.number().int().nonnegative(),
  stageTimeoutMs: z.number().int().positive(),
  retryDelayMs: z.number().int().nonnegative(),
  maxRetryDelayMs: z.number().int().nonnegative(),
  resume: z.boolean(),
  overwrite: z.boolean(),
  dedupe: z.boolean(),
  container: z.enum(["mkv", "mp4"]),
  subtitleLanguages: z.array(z.string().min(1)),
  clearCache: z.boolean(),
  keepWork: z.boolean(),
  json: z.boolean(),
});
export type RunnerConfig = z.infer<typeof RunnerConfig>;

function envText(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

// CLI flags win over TRACKPRESS_* env vars, which win over defaults.
export function resolveRunnerConfig(
  cli: CliOptions & { inputList: string },
  env: EnvSource = process.env,
  cwd: string = process.cwd(),
): RunnerConfig {
  const outputDir = resolve(cwd, cli.outputDir ?? envText(env, "TRACKPRESS_OUTPUT_DIR") ?? "output");
  const coverDir = resolve(cwd, cli.coverDir ?? envText(env, "TRACKPRESS_COVER_DIR") ?? "cover");
  const workDirInput = cli.workDir ?? envText(env, "TRACKPRESS_WORK_DIR");
  const workDir = workDirInput ? resolve(cwd, workDirInput) : join(outputDir, WORK_DIR_NAME);
  const envContainer = envText(env, "TRACKPRESS_CONTAINER");
  const envSubtitles = envText(env, "TRACKPRESS_SUBTITLES");
  const timeoutSeconds =
    cli.timeoutSeconds ??
    parseIntegerEnvValue(env.TRACKPRESS_STAGE_TIMEOUT_SECONDS, DEFAULT_STAGE_TIMEOUT_SECONDS);

  return RunnerConfig.parse({
    inputList: resolve(cwd, cli.inputList),
    outputDir,
    coverDir,
    workDir,
    cacheDir: join(workDir, "cache"),
    logDir: resolveLogDir({ fallbackDir: join(workDir, "logs"), env }),
    verbosity: cli.verbosity,
    maxJobs: cli.maxJobs ?? parseIntegerEnvValue(env.TRACKPRESS_MAX_JOBS, DEFAULT_MAX_JOBS),
    maxAcquire:
      cli.maxAcquire ?? parseIntegerEnvValue(env.TRACKPRESS_MAX_ACQUIRE, DEFAULT_MAX_ACQUIRE),
    maxTranscode:
      cli.maxTranscode ??
      parseIntegerEnvValue(env.TRACKPRESS_MAX_TRANSCODE, DEFAULT_MAX_TRANSCODE),
    retries: Math.max(
      0,
      cli.retries ?? parseIntegerEnvValue(env.TRACKPRESS_STAGE_RETRIES, DEFAULT_STAGE_RETRIES),
    ),
    stageTimeoutMs: Math.max(1, timeoutSeconds) * 1000,
    retryDelayMs: Math.max(
      0,
      parseIntegerEnvValue(env.TRACKPRESS_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    ),
    maxRetryDelayMs: DEFAULT_MAX_RETRY_DELAY_MS,
    resume: cli.resume ?? parseBooleanEnvValue(env.TRACKPRESS_RESUME, true),
    overwrite: cli.overwrite ?? parseBooleanEnvValue(env.TRACKPRESS_OVERWRITE, false),
    dedupe: cli.dedupe ?? parseBooleanEnvValue(env.TRACKPRESS_DEDUPE, false),
    container: cli.container ?? (envContainer ? parseContainer(envContainer) : "mkv"),
    subtitleLanguages:
      cli.subtitleLanguages ?? (envSubtitles ? parseSubtitleLanguages(envSubtitles) : ["en"]),
    clearCache: cli.clearCache ?? false,
    keepWork: cli.keepWork ?? parseBooleanEnvValue(env.TRACKPRESS_KEEP_WORK, false),
    json: cli.json ?? false,
  });
}

export async function assertDirectoryExists(path: string, label: string): Promise<void> {
  try {
    const info = await stat(path);
    if (info.isDirectory()) {
      return;
    }
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code !== "ENOENT" && code !== "ENOTDIR") {
      throw error;
    }
  }
  throw new UsageError(`${label} does not exist: ${path}`);
}
