import { describe, expect, it } from "vitest";
import { CancelledError, ToolError } from "@trackpress/core";
import { PipelineRun } from "../../src/pipeline/pipeline-run";
import { resolveWorkingDirectory } from "../../src/pipeline/working-dir";
import { makeJob } from "../helpers/jobs";

const directory = resolveWorkingDirectory("/work", "job");

function completion(path: string) {
  return {
    artifacts: [{ role: "output" as const, path }],
    attempts: 1,
    durationMs: 10,
    diagnostics: [],
  };
}

describe("PipelineRun", () => {
  it("starts with every planned stage pending", () => {
    const run = new PipelineRun(makeJob(0, { kind: "video_only" }), directory);
    expect(run.stageStates.map((state) => [state.ref.id, state.status])).toEqual([
      ["acquire", "pending"],
      ["video.assemble", "pending"],
      ["video.normalize", "pending"],
      ["video.place", "pending"],
    ]);
    expect(run.outcome()).toBe("cancelled");
  });

  it("rejects illegal transitions", () => {
    const run = new PipelineRun(makeJob(0), directory);
    expect(() => run.succeed("acquire", completion("/work/a"))).toThrow(
      "Invalid stage transition for acquire: pending -> succeeded",
    );
    run.skip("acquire", "resumed");
    expect(() => run.start("acquire")).toThrow("skipped -> running");
    expect(() => run.stage("video.place")).toThrow("Stage video.place is not part of this job");
  });

  it("hands artifacts forward and records placed outputs", () => {
    const run = new PipelineRun(makeJob(0), directory);
    run.start("audio.normalize");
    run.succeed("audio.normalize", completion("/work/normalized.mp3"));
    run.skip("audio.place", "resumed", [{ role: "output", path: "/music/a.mp3" }]);

    expect(run.requireArtifact("audio.normalize", "output")).toBe("/work/normalized.mp3");
    expect(run.findArtifact("audio.normalize", "audio")).toBeUndefined();
    expect(() => run.requireArtifact("acquire", "audio")).toThrow(ToolError);
    expect(run.finalOutputPaths).toEqual({ audio: "/music/a.mp3" });
  });

  it("derives the job outcome", () => {
    const failed = new PipelineRun(makeJob(0), directory);
    failed.start("acquire");
    failed.fail("acquire", new ToolError("Video unavailable", "not_found"), 1, 5);
    failed.skipPending(failed.plan.stages, "dependency_failed");
    expect(failed.outcome()).toBe("failed");
    expect(failed.firstFailure()?.ref.id).toBe("acquire");
    expect(failed.isChainBlocked("audio")).toBe(true);

    const cancelled = new PipelineRun(makeJob(1), directory);
    cancelled.start("acquire");
    cancelled.fail("acquire", new CancelledError(), 1, 5);
    expect(cancelled.outcome()).toBe("cancelled");

    const resumed = new PipelineRun(makeJob(2), directory);
    resumed.skipPending(resumed.plan.stages, "resumed");
    expect(resumed.outcome()).toBe("skipped");

    const done = new PipelineRun(makeJob(3), directory);
    for (const state of done.stageStates) {
      done.start(state.ref.id);
      done.succeed(state.ref.id, completion(`/work/${state.ref.id}`));
    }
    expect(done.outcome()).toBe("succeeded");
  });
});
