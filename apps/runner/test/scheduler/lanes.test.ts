import { describe, expect, it } from "vitest";
import { LaneLimiter } from "../../src/scheduler/lane-limiter";
import { formatLaneCap, normalizeLaneCap, resolveLaneLimits } from "../../src/scheduler/lane-policy";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("lane policy", () => {
  it("treats non-positive caps as unlimited", () => {
    expect(normalizeLaneCap(3)).toBe(3);
    expect(normalizeLaneCap(0)).toBe(Number.POSITIVE_INFINITY);
    expect(normalizeLaneCap(-1)).toBe(Number.POSITIVE_INFINITY);
    expect(formatLaneCap(normalizeLaneCap(0))).toBe("unlimited");
  });

  it("maps scheduler limits onto lanes", () => {
    expect(resolveLaneLimits({ maxJobs: 4, maxAcquire: 1, maxTranscode: 0 })).toEqual({
      network: 1,
      transcode: Number.POSITIVE_INFINITY,
      light: Number.POSITIVE_INFINITY,
    });
  });
});

describe("LaneLimiter", () => {
  it("never runs more tasks in a lane than its cap", async () => {
    const limiter = new LaneLimiter({ network: 1, transcode: 2, light: Number.POSITIVE_INFINITY });
    const gate = deferred();
    let running = 0;
    let peak = 0;
    const task = async () => {
      running += 1;
      peak = Math.max(peak, running);
      await gate.promise;
      running -= 1;
    };

    const tasks = [limiter.run("network", task), limiter.run("network", task)];
    await Promise.resolve();
    expect(limiter.stats("network")).toEqual({ running: 1, waiting: 1 });

    gate.resolve();
    await Promise.all(tasks);
    expect(peak).toBe(1);
  });

  it("keeps lanes independent", async () => {
    const limiter = new LaneLimiter({ network: 1, transcode: 1, light: Number.POSITIVE_INFINITY });
    const gate = deferred();
    const order: string[] = [];

    const blocked = limiter.run("network", async () => {
      await gate.promise;
      order.push("network");
    });
    await limiter.run("transcode", async () => {
      order.push("transcode");
    });
    gate.resolve();
    await blocked;

    expect(order).toEqual(["transcode", "network"]);
  });

  it("drops a waiting task when its signal aborts", async () => {
    const limiter = new LaneLimiter({ network: 1, transcode: 1, light: 1 });
    const gate = deferred();
    const controller = new AbortController();

    const first = limiter.run("network", () => gate.promise);
    const second = limiter.run("network", async () => "ran", controller.signal);
    const rejected = expect(second).rejects.toThrow();
    controller.abort();

    gate.resolve();
    await first;
    await rejected;
  });
});
