import type { EnvSource } from "@trackpress/core";
import { FfmpegAssembler } from "./ffmpeg/ffmpeg-assembler";
import { FfmpegTagger } from "./ffmpeg/ffmpeg-tagger";
import { FfmpegNormalizer } from "./ffmpeg-normalize/ffmpeg-normalizer";
import type { Collaborators } from "./types";
import { YtDlpAcquirer } from "./yt-dlp/yt-dlp-acquirer";

export interface CollaboratorOptions {
  env?: EnvSource;
}

export function createCollaborators(options: CollaboratorOptions = {}): Collaborators {
  return {
    acquirer: new YtDlpAcquirer({ env: options.env }),
    assembler: new FfmpegAssembler({ env: options.env }),
    normalizer: new FfmpegNormalizer({ env: options.env }),
    tagger: new FfmpegTagger({ env: options.env }),
  };
}
