import type { Track } from "@trackpress/core";
import type { VideoContainer } from "./ffmpeg/ffmpeg-args";

export type ToolStream = "stdout" | "stderr";

// Per-call settings handed to a collaborator by the stage executor.
export interface ToolCallContext {
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
  onCommand?: (commandLine: string) => void;
  onOutput?: (line: string, stream: ToolStream) => void;
}

export interface AcquireRequest {
  sourceLocator: string;
  streams: Track[];
  outputDir: string;
  // Empty list disables the subtitle download
  subtitleLanguages: string[];
  cacheDir?: string;
}

export interface AcquiredMedia {
  audioPath?: string;
  videoPath?: string;
  subtitlePaths: string[];
  diagnostics: string[];
}

export interface AssembleRequest {
  track: Track;
  audioPath: string;
  videoPath?: string;
  subtitlePaths: string[];
  // Used for the video track only
  container: VideoContainer;
  outputPath: string;
}

export interface NormalizeRequest {
  track: Track;
  inputPath: string;
  outputPath: string;
}

export interface TrackTags {
  albumArtist: string;
  album: string;
  title: string;
  artist: string;
  genre: string;
  year: number;
  sourceLink: string;
}

export interface TagRequest {
  inputPath: string;
  outputPath: string;
  tags: TrackTags;
  coverImagePath?: string;
}

export interface ToolOutput {
  outputPath: string;
  diagnostics: string[];
}

export interface Acquirer {
  acquire(request: AcquireRequest, context: ToolCallContext): Promise<AcquiredMedia>;
}

export interface Assembler {
  assemble(request: AssembleRequest, context: ToolCallContext): Promise<ToolOutput>;
}

export interface Normalizer {
  normalize(request: NormalizeRequest, context: ToolCallContext): Promise<ToolOutput>;
}

export interface Tagger {
  tag(request: TagRequest, context: ToolCallContext): Promise<ToolOutput>;
}

export interface Collaborators {
  acquirer: Acquirer;
  assembler: Assembler;
  normalizer: Normalizer;
  tagger: Tagger;
}
