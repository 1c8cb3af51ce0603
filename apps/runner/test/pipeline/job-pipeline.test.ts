import { existsSync } from "node:fs";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CancelledError, ToolError, TransientError } from "@trackpress/core";
import type { Collaborators } from "@trackpress/tools";
import { createFakeCollaborators } from "../helpers/fake-collaborators";
import { createPipelineHarness, createTempRoots, type TempRoots } from "../helpers/harness";
import { makeJob } from "../helpers/jobs";

const LOCATOR = "https://media.example.test/watch?v=item0001";

describe("JobPipeline", () => {
  let roots: TempRoots;
  let trackDir: string;

  beforeEach(async () => {
    roots = await createTempRoots();
    trackDir = join(roots.outputRoot, "Queen Singer", "Immortal Songs", "Every Night");
  });

  afterEach(async () => {
    await roots.cleanup();
  });

  it("runs an audio job end to end and keeps only the markers", async () => {
    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators });
    const job = makeJob(0);
    const directory = harness.directoryOf(job);

    const result = await harness.pipeline.run(job, directory);

    const outputPath = join(trackDir, "Every Night.mp3");
    expect(result.status).toBe("succeeded");
    expect(result.run.finalOutputPaths).toEqual({ audio: outputPath });
    expect(await readFile(outputPath, "utf-8")).toBe(
      `tagged Every Night: normalized assembled audio: audio of ${LOCATOR}`,
    );
    expect(result.run.stageStates.map((state) => [state.ref.id, state.status, state.attempts])).toEqual([
      ["acquire", "succeeded", 1],
      ["audio.assemble", "succeeded", 1],
      ["audio.normalize", "succeeded", 1],
      ["audio.tag", "succeeded", 1],
      ["audio.place", "succeeded", 1],
    ]);
    expect(existsSync(directory.artifactsDir)).toBe(false);
    expect(existsSync(directory.lockPath)).toBe(false);
    expect((await readdir(directory.markersDir)).sort()).toEqual([
      "acquire.json",
      "audio.assemble.json",
      "audio.normalize.json",
      "audio.place.json",
      "audio.tag.json",
    ]);
  });

  it("skips every stage when run again", async () => {
    const job = makeJob(0);
    const first = createPipelineHarness({ roots, collaborators: createFakeCollaborators() });
    await first.pipeline.run(job, first.directoryOf(job));

    const collaborators = createFakeCollaborators();
    const second = createPipelineHarness({ roots, collaborators });
    const result = await second.pipeline.run(job, second.directoryOf(job));

    expect(result.status).toBe("skipped");
    expect(collaborators.calls).toEqual([]);
    expect(result.run.stageStates.every((state) => state.skipReason === "resumed")).toBe(true);
    expect(result.run.finalOutputPaths.audio).toBe(join(trackDir, "Every Night.mp3"));
  });

  it("acquires once for audio and video and runs the video chain first", async () => {
    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators });
    const job = makeJob(0, { kind: "audio_and_video" });

    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("succeeded");
    expect(collaborators.countOf("acquire")).toBe(1);
    expect(collaborators.calls.map((call) => `${call.step}:${call.track ?? "-"}`)).toEqual([
      "acquire:-",
      "assemble:video",
      "normalize:video",
      "assemble:audio",
      "normalize:audio",
      "tag:audio",
    ]);
    expect(result.run.finalOutputPaths).toEqual({
      video: join(trackDir, "Every Night.mkv"),
      audio: join(trackDir, "Every Night.mp3"),
    });
    expect(await readFile(join(trackDir, "Every Night.mkv"), "utf-8")).toBe(
      `normalized assembled video: audio of ${LOCATOR}`,
    );
  });

  it("skips the rest of a chain after a failure and keeps the artifacts", async () => {
    const collaborators = createFakeCollaborators({
      fail: (step) => (step === "normalize" ? new ToolError("ffmpeg-normalize failed: exit code 1") : undefined),
    });
    const harness = createPipelineHarness({ roots, collaborators });
    const job = makeJob(0);
    const directory = harness.directoryOf(job);

    const result = await harness.pipeline.run(job, directory);

    expect(result.status).toBe("failed");
    expect(result.run.firstFailure()?.ref.id).toBe("audio.normalize");
    expect(result.run.firstFailure()?.error.code).toBe("tool_failed");
    expect(result.run.stage("audio.tag")).toMatchObject({ status: "skipped", skipReason: "dependency_failed" });
    expect(result.run.stage("audio.place")).toMatchObject({ status: "skipped", skipReason: "dependency_failed" });
    expect(existsSync(join(trackDir, "Every Night.mp3"))).toBe(false);
    expect(existsSync(join(directory.artifactsDir, "audio", "assembled.mp3"))).toBe(true);
  });

  it("resumes after the last intact stage", async () => {
    const job = makeJob(0);
    const failing = createPipelineHarness({
      roots,
      collaborators: createFakeCollaborators({
        fail: (step) => (step === "tag" ? new ToolError("ffmpeg failed: exit code 1") : undefined),
      }),
    });
    await failing.pipeline.run(job, failing.directoryOf(job));

    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators });
    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("succeeded");
    expect(collaborators.calls.map((call) => call.step)).toEqual(["tag"]);
    expect(result.run.stageStates.map((state) => state.skipReason ?? state.status)).toEqual([
      "resumed",
      "resumed",
      "resumed",
      "succeeded",
      "succeeded",
    ]);
  });

  it("redoes the stages whose parameters changed", async () => {
    const first = createPipelineHarness({ roots, collaborators: createFakeCollaborators(), keepWork: true });
    const original = makeJob(0);
    await first.pipeline.run(original, first.directoryOf(original));

    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators, overwrite: true });
    const retagged = makeJob(0, { genre: "Ballad" });
    const result = await harness.pipeline.run(retagged, harness.directoryOf(retagged));

    expect(result.status).toBe("succeeded");
    expect(collaborators.calls.map((call) => call.step)).toEqual(["tag"]);
    expect(result.run.stage("audio.normalize").skipReason).toBe("resumed");
  });

  it("retags when the cover image content changes", async () => {
    const coverPath = join(roots.root, "cover.jpg");
    await writeFile(coverPath, "first cover");
    const job = makeJob(0, { coverImagePath: coverPath });
    const first = createPipelineHarness({ roots, collaborators: createFakeCollaborators(), keepWork: true });
    await first.pipeline.run(job, first.directoryOf(job));

    await writeFile(coverPath, "second cover");
    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators, overwrite: true });
    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("succeeded");
    expect(collaborators.countOf("tag")).toBe(1);
    expect(result.run.stage("audio.normalize").skipReason).toBe("resumed");
    expect(result.run.stage("audio.tag").status).toBe("succeeded");
    expect(result.run.stage("audio.place").status).toBe("succeeded");
  });

  it("ignores markers when resume is off", async () => {
    const job = makeJob(0);
    const first = createPipelineHarness({ roots, collaborators: createFakeCollaborators() });
    await first.pipeline.run(job, first.directoryOf(job));

    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators, resume: false, overwrite: true });
    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("succeeded");
    expect(collaborators.countOf("acquire")).toBe(1);
    expect(collaborators.countOf("tag")).toBe(1);
  });

  it("keeps the other chain going when one fails", async () => {
    const collaborators = createFakeCollaborators({
      fail: (step, call) =>
        step === "assemble" && call.track === "video"
          ? new ToolError("ffmpeg failed: Invalid data found", "unsupported_format")
          : undefined,
    });
    const harness = createPipelineHarness({ roots, collaborators });
    const job = makeJob(0, { kind: "audio_and_video" });
    const directory = harness.directoryOf(job);

    const result = await harness.pipeline.run(job, directory);

    expect(result.status).toBe("failed");
    expect(result.run.stage("video.normalize").skipReason).toBe("dependency_failed");
    expect(result.run.stage("audio.place").status).toBe("succeeded");
    expect(result.run.finalOutputPaths).toEqual({ audio: join(trackDir, "Every Night.mp3") });
    expect(existsSync(directory.artifactsDir)).toBe(true);
  });

  it("retries a transient acquire failure", async () => {
    const collaborators = createFakeCollaborators({
      fail: (step, _call, attempt) =>
        step === "acquire" && attempt === 1 ? new TransientError("connection reset", "network_error") : undefined,
    });
    const harness = createPipelineHarness({ roots, collaborators, maxRetries: 2 });
    const job = makeJob(0);

    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("succeeded");
    expect(result.run.stage("acquire").attempts).toBe(2);
  });

  it("fails a stage whose output is empty", async () => {
    const fake = createFakeCollaborators();
    const collaborators: Collaborators = {
      ...fake,
      acquirer: {
        async acquire(request) {
          const audioPath = join(request.outputDir, "audio.m4a");
          await writeFile(audioPath, "");
          return { audioPath, subtitlePaths: [], diagnostics: [] };
        },
      },
    };
    const harness = createPipelineHarness({ roots, collaborators });
    const job = makeJob(0);

    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("failed");
    expect(result.run.firstFailure()?.error.code).toBe("missing_artifact");
    expect(fake.countOf("assemble")).toBe(0);
  });

  it("fails without running anything when the working directory is locked", async () => {
    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators });
    const job = makeJob(0);
    const directory = harness.directoryOf(job);
    await mkdir(directory.root, { recursive: true });
    await writeFile(directory.lockPath, JSON.stringify({ pid: process.pid }));

    const result = await harness.pipeline.run(job, directory);

    expect(result.status).toBe("failed");
    expect(result.run.firstFailure()?.error.code).toBe("workdir_locked");
    expect(result.run.stage("audio.assemble").skipReason).toBe("dependency_failed");
    expect(collaborators.calls).toEqual([]);
    expect(existsSync(directory.lockPath)).toBe(true);
  });

  it("marks the job cancelled when the run is interrupted mid-stage", async () => {
    const controller = new AbortController();
    const collaborators = createFakeCollaborators({
      beforeCall: async (call) => {
        if (call.step === "assemble") {
          controller.abort(new CancelledError("Run interrupted by SIGINT"));
        }
      },
      fail: (step) => (step === "assemble" ? new CancelledError("ffmpeg was cancelled") : undefined),
    });
    const harness = createPipelineHarness({ roots, collaborators, signal: controller.signal });
    const job = makeJob(0);

    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("cancelled");
    expect(result.run.stage("audio.assemble").status).toBe("failed");
    expect(result.run.stage("audio.normalize").skipReason).toBe("cancelled");
    expect(collaborators.countOf("normalize")).toBe(0);
  });

  it("cancels before the first stage when the signal already fired", async () => {
    const controller = new AbortController();
    controller.abort(new CancelledError());
    const collaborators = createFakeCollaborators();
    const harness = createPipelineHarness({ roots, collaborators, signal: controller.signal });
    const job = makeJob(0);

    const result = await harness.pipeline.run(job, harness.directoryOf(job));

    expect(result.status).toBe("cancelled");
    expect(result.run.stageStates.every((state) => state.skipReason === "cancelled")).toBe(true);
    expect(collaborators.calls).toEqual([]);
  });
});
