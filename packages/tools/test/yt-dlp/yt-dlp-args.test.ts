import { describe, expect, it } from "vitest";
import {
  buildYtDlpArgs,
  isSubtitleFile,
  parseDownloadedPath,
  subtitleLanguageOf,
} from "../../src/yt-dlp/yt-dlp-args";
import { classifyYtDlpStderr } from "../../src/yt-dlp/yt-dlp-errors";

describe("buildYtDlpArgs", () => {
  it("requests the best video stream with subtitles", () => {
    const args = buildYtDlpArgs({
      sourceLocator: "https://media.example/watch?v=abc",
      stream: "video",
      outputDir: "/work/job/artifacts/acquire",
      subtitleLanguages: ["en"],
      cacheDir: "/work/cache",
    });

    expect(args).toEqual([
      "--no-playlist",
      "--no-progress",
      "--force-overwrites",
      "-f",
      "bestvideo",
      "-o",
      "/work/job/artifacts/acquire/video.%(ext)s",
      "--cache-dir",
      "/work/cache",
      "--write-subs",
      "--sub-langs",
      "en",
      "--convert-subs",
      "srt",
      "-o",
      "subtitle:/work/job/artifacts/acquire/subtitles.%(ext)s",
      "--print",
      "after_move:filepath",
      "--no-simulate",
      "--",
      "https://media.example/watch?v=abc",
    ]);
  });

  it("never asks for subtitles on the audio stream", () => {
    const args = buildYtDlpArgs({
      sourceLocator: "ytsearch1:every night",
      stream: "audio",
      outputDir: "/out",
      subtitleLanguages: ["en"],
    });

    expect(args).toEqual([
      "--no-playlist",
      "--no-progress",
      "--force-overwrites",
      "-f",
      "bestaudio",
      "-o",
      "/out/audio.%(ext)s",
      "--no-cache-dir",
      "--print",
      "after_move:filepath",
      "--no-simulate",
      "--",
      "ytsearch1:every night",
    ]);
  });
});

describe("parseDownloadedPath", () => {
  it("returns the last printed path", () => {
    expect(parseDownloadedPath("\n/out/audio.webm\n")).toBe("/out/audio.webm");
    expect(parseDownloadedPath("[info] note\n/out/video.mp4")).toBe("/out/video.mp4");
  });

  it("returns null for empty output", () => {
    expect(parseDownloadedPath("")).toBeNull();
  });
});

describe("subtitle files", () => {
  it("recognizes downloaded subtitle files", () => {
    expect(isSubtitleFile("subtitles.en.srt")).toBe(true);
    expect(isSubtitleFile("video.webm")).toBe(false);
  });

  it("extracts the language", () => {
    expect(subtitleLanguageOf("subtitles.en.srt")).toBe("en");
    expect(subtitleLanguageOf("subtitles.srt")).toBeNull();
  });
});

describe("classifyYtDlpStderr", () => {
  it("treats unavailable media as not found", () => {
    expect(classifyYtDlpStderr("ERROR: Unsupported URL: https://media.example/").code).toBe(
      "not_found",
    );
    expect(classifyYtDlpStderr("ERROR: [youtube] abc: Private video").code).toBe("not_found");
  });

  it("detects missing formats", () => {
    expect(
      classifyYtDlpStderr("ERROR: [youtube] abc: Requested format is not available").code,
    ).toBe("unsupported_format");
  });

  it("falls back to the generic classifier", () => {
    const result = classifyYtDlpStderr("ERROR: unable to download webpage: HTTP Error 503");
    expect(result.category).toBe("transient");
    expect(result.code).toBe("network_error");
  });
});
