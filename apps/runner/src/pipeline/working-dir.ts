import { createHash } from "node:crypto";
import { mkdir, open, readFile, rm, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import {
  FAILURE_CODE,
  ToolError,
  sanitizePathSegment,
  type JobSpec,
  type Track,
} from "@trackpress/core";

export interface WorkingDirectory {
  key: string;
  root: string;
  artifactsDir: string;
  acquireDir: string;
  markersDir: string;
  lockPath: string;
}

export interface WorkingDirectoryLock {
  path: string;
  handle: FileHandle;
}

const KEY_TITLE_LENGTH = 40;

// Stable per job: the same entry maps to the same directory on every run.
export function buildJobKey(spec: JobSpec, occurrence = 0): string {
  const digest = createHash("sha256")
    .update(
      [spec.kind, spec.sourceLocator, spec.albumArtist, spec.albumName, spec.trackTitle].join("|"),
    )
    .digest("hex")
    .slice(0, 12);
  const title = Array.from(sanitizePathSegment(spec.trackTitle).replace(/\s+/g, "_"))
    .slice(0, KEY_TITLE_LENGTH)
    .join("");
  const base = `${title}-${digest}`;
  return occurrence > 0 ? `${base}-dup${occurrence}` : base;
}

export function resolveWorkingDirectory(workRoot: string, key: string): WorkingDirectory {
  const root = join(workRoot, "jobs", key);
  const artifactsDir = join(root, "artifacts");
  return {
    key,
    root,
    artifactsDir,
    acquireDir: join(artifactsDir, "acquire"),
    markersDir: join(root, "markers"),
    lockPath: join(root, ".lock"),
  };
}

export function trackArtifactsDir(directory: WorkingDirectory, track: Track): string {
  return join(directory.artifactsDir, track);
}

export async function prepareWorkingDirectory(directory: WorkingDirectory): Promise<void> {
  await mkdir(directory.acquireDir, { recursive: true });
  await mkdir(trackArtifactsDir(directory, "audio"), { recursive: true });
  await mkdir(trackArtifactsDir(directory, "video"), { recursive: true });
  await mkdir(directory.markersDir, { recursive: true });
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

function errnoOf(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

async function readLockOwner(lockPath: string): Promise<number | null> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, "utf-8"));
    if (typeof parsed === "object" && parsed !== null && "pid" in parsed) {
      return typeof parsed.pid === "number" ? parsed.pid : null;
    }
    return null;
  } catch {
    // Unreadable lock info still blocks the directory
    return null;
  }
}

// Exclusive per-job lock; a lock left by a dead process is taken over.
export async function acquireWorkingDirectoryLock(
  directory: WorkingDirectory,
): Promise<WorkingDirectoryLock> {
  await mkdir(directory.root, { recursive: true });
  try {
    const handle = await open(directory.lockPath, "wx");
    await handle.writeFile(
      JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }, null, 2),
      "utf-8",
    );
    return { path: directory.lockPath, handle };
  } catch (error) {
    if (errnoOf(error) !== "EEXIST") {
      throw error;
    }
    const owner = await readLockOwner(directory.lockPath);
    if (owner !== null && owner !== process.pid && !isPidAlive(owner)) {
      await rm(directory.lockPath, { force: true });
      return acquireWorkingDirectoryLock(directory);
    }
    throw new ToolError(
      `Working directory is in use${owner !== null ? ` by process ${owner}` : ""}: ${directory.root}`,
      FAILURE_CODE.WORKDIR_LOCKED,
    );
  }
}

export async function releaseWorkingDirectoryLock(lock: WorkingDirectoryLock): Promise<void> {
  try {
    await lock.handle.close();
  } finally {
    await rm(lock.path, { force: true });
  }
}

// Intermediate artifacts go; completion markers stay so a rerun can skip the job.
export async function removeArtifacts(directory: WorkingDirectory): Promise<void> {
  await rm(directory.artifactsDir, { recursive: true, force: true });
}
