import { randomBytes } from "node:crypto";
import { copyFile, link, mkdir, rename, rm, unlink } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  FAILURE_CODE,
  PlacementError,
  sanitizePathSegment,
  type JobSpec,
  type Track,
} from "@trackpress/core";
import type { VideoContainer } from "@trackpress/tools";
import type { PipelineRun } from "./pipeline/pipeline-run";

export interface Destination {
  dir: string;
  path: string;
}

export function outputExtension(track: Track, container: VideoContainer): string {
  return track === "audio" ? "mp3" : container;
}

// <root>/<albumArtist>/<albumName>/<trackTitle>/<trackTitle>.<ext>
export function resolveDestination(
  outputRoot: string,
  spec: Pick<JobSpec, "albumArtist" | "albumName" | "trackTitle">,
  extension: string,
): Destination {
  const title = sanitizePathSegment(spec.trackTitle);
  const dir = join(
    outputRoot,
    sanitizePathSegment(spec.albumArtist),
    sanitizePathSegment(spec.albumName),
    title,
  );
  return { dir, path: join(dir, `${title}.${extension}`) };
}

function errnoOf(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function toPlacementError(error: unknown, destination: string): PlacementError {
  if (error instanceof PlacementError) {
    return error;
  }
  if (errnoOf(error) === "EEXIST") {
    return new PlacementError(
      `Destination already exists: ${destination}`,
      FAILURE_CODE.PLACEMENT_COLLISION,
      { cause: error },
    );
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new PlacementError(`Could not place ${destination}: ${detail}`, FAILURE_CODE.FILESYSTEM_ERROR, {
    cause: error,
  });
}

// link fails on an existing destination; rename replaces it atomically.
async function commit(source: string, destination: string, overwrite: boolean): Promise<void> {
  if (overwrite) {
    await rename(source, destination);
    return;
  }
  await link(source, destination);
  await unlink(source);
}

export interface PlaceFileOptions {
  overwrite: boolean;
}

export async function placeFile(
  source: string,
  destination: string,
  options: PlaceFileOptions,
): Promise<string> {
  try {
    await mkdir(dirname(destination), { recursive: true });
    try {
      await commit(source, destination, options.overwrite);
      return destination;
    } catch (error) {
      if (errnoOf(error) !== "EXDEV") {
        throw error;
      }
    }

    // Different filesystem: copy beside the destination, then commit within that directory.
    const tempPath = `${destination}.${randomBytes(6).toString("hex")}.partial`;
    try {
      await copyFile(source, tempPath);
      await commit(tempPath, destination, options.overwrite);
    } finally {
      await rm(tempPath, { force: true });
    }
    await rm(source, { force: true });
    return destination;
  } catch (error) {
    throw toPlacementError(error, destination);
  }
}

export interface OutputPlacerOptions {
  outputRoot: string;
  container: VideoContainer;
  overwrite: boolean;
}

export class OutputPlacer {
  private readonly options: OutputPlacerOptions;

  constructor(options: OutputPlacerOptions) {
    this.options = options;
  }

  destinationFor(spec: JobSpec, track: Track): Destination {
    return resolveDestination(
      this.options.outputRoot,
      spec,
      outputExtension(track, this.options.container),
    );
  }

  // Moves the last artifact of the track's chain to its final path.
  async place(run: PipelineRun, track: Track): Promise<string> {
    const placeId = run.chain(track).at(-1)?.id;
    const sourceStage = placeId ? run.predecessorOf(placeId) : null;
    if (!sourceStage) {
      throw new PlacementError(`No ${track} chain to place for this job`);
    }
    const source = run.requireArtifact(sourceStage, "output");
    const destination = this.destinationFor(run.spec, track);
    return placeFile(source, destination.path, { overwrite: this.options.overwrite });
  }
}
