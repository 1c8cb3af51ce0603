import { resolve } from "node:path";

export function resolveLogDir(options: { fallbackDir: string; env?: NodeJS.ProcessEnv }): string {
  const env = options.env ?? process.env;
  const candidate = env.TRACKPRESS_LOG_DIR?.trim();
  if (candidate) {
    return resolve(candidate);
  }
  return resolve(options.fallbackDir);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// trackpress_20240131_235959
export function buildRunLogName(prefix: string, now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${prefix}_${date}_${time}`;
}
