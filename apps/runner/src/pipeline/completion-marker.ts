import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { StageId } from "@trackpress/core";
import { ARTIFACT_ROLES, type StageArtifact } from "../stages/types";
import { digestFile } from "./fingerprint";
import type { WorkingDirectory } from "./working-dir";

export const MARKER_VERSION = 1;

export const MarkerArtifactSchema = z.object({
  role: z.enum(ARTIFACT_ROLES),
  path: z.string().min(1),
  size: z.number().int().positive(),
  digest: z.string().regex(/^[0-9a-f]{64}$/),
});
export type MarkerArtifact = z.infer<typeof MarkerArtifactSchema>;

export const CompletionMarkerSchema = z.object({
  version: z.literal(MARKER_VERSION),
  stage: z.string(),
  fingerprint: z.string(),
  artifacts: z.array(MarkerArtifactSchema),
  completedAt: z.string().datetime(),
});
export type CompletionMarker = z.infer<typeof CompletionMarkerSchema>;

export function markerPath(directory: WorkingDirectory, stageId: StageId): string {
  return join(directory.markersDir, `${stageId}.json`);
}

export type MarkerReadResult =
  | { status: "found"; marker: CompletionMarker }
  | { status: "missing" }
  | { status: "invalid"; reason: string };

export async function readCompletionMarker(
  directory: WorkingDirectory,
  stageId: StageId,
): Promise<MarkerReadResult> {
  let raw: string;
  try {
    raw = await readFile(markerPath(directory, stageId), "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { status: "missing" };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { status: "invalid", reason: error instanceof Error ? error.message : String(error) };
  }
  const result = CompletionMarkerSchema.safeParse(parsed);
  if (!result.success) {
    return { status: "invalid", reason: result.error.issues[0]?.message ?? "invalid marker" };
  }
  if (result.data.stage !== stageId) {
    return { status: "invalid", reason: `marker belongs to ${result.data.stage}` };
  }
  return { status: "found", marker: result.data };
}

export async function describeArtifact(artifact: StageArtifact): Promise<MarkerArtifact> {
  const info = await stat(artifact.path);
  return {
    role: artifact.role,
    path: artifact.path,
    size: info.size,
    digest: await digestFile(artifact.path),
  };
}

export async function writeCompletionMarker(
  directory: WorkingDirectory,
  stageId: StageId,
  fingerprint: string,
  artifacts: StageArtifact[],
  now: Date = new Date(),
): Promise<CompletionMarker> {
  const marker: CompletionMarker = {
    version: MARKER_VERSION,
    stage: stageId,
    fingerprint,
    artifacts: await Promise.all(artifacts.map(describeArtifact)),
    completedAt: now.toISOString(),
  };
  const path = markerPath(directory, stageId);
  const tempPath = `${path}.${process.pid}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(marker, null, 2)}\n`, "utf-8");
  await rename(tempPath, path);
  return marker;
}

export async function removeCompletionMarker(
  directory: WorkingDirectory,
  stageId: StageId,
): Promise<void> {
  await rm(markerPath(directory, stageId), { force: true });
}

// Every recorded artifact still exists with its recorded, non-zero size.
export async function artifactsIntact(marker: CompletionMarker): Promise<boolean> {
  if (marker.artifacts.length === 0) {
    return false;
  }
  for (const artifact of marker.artifacts) {
    try {
      const info = await stat(artifact.path);
      if (!info.isFile() || info.size !== artifact.size) {
        return false;
      }
    } catch {
      return false;
    }
  }
  return true;
}

export function markerDigests(marker: CompletionMarker): string[] {
  return marker.artifacts.map((artifact) => artifact.digest);
}

export function markerArtifacts(marker: CompletionMarker): StageArtifact[] {
  return marker.artifacts.map((artifact) => ({ role: artifact.role, path: artifact.path }));
}
