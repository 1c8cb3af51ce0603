export * from "./types";
export * from "./executables";
export * from "./preflight";
export * from "./collaborators";
export * from "./process/run-tool";
export * from "./process/tool-failure";
export * from "./yt-dlp/yt-dlp-args";
export * from "./yt-dlp/yt-dlp-errors";
export * from "./yt-dlp/yt-dlp-acquirer";
export * from "./ffmpeg/ffmpeg-args";
export * from "./ffmpeg/ffmpeg-assembler";
export * from "./ffmpeg/ffmpeg-tagger";
export * from "./ffmpeg-normalize/ffmpeg-normalize-args";
export * from "./ffmpeg-normalize/ffmpeg-normalizer";
