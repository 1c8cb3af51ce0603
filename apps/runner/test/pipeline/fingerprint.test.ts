import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  computeStageFingerprint,
  digestFile,
  digestInputFile,
  stableStringify,
} from "../../src/pipeline/fingerprint";

describe("stableStringify", () => {
  it("sorts keys at every depth and drops undefined", () => {
    expect(stableStringify({ b: 1, a: { d: [3, { z: 1, y: 2 }], c: undefined } })).toBe(
      '{"a":{"d":[3,{"y":2,"z":1}]},"b":1}',
    );
  });
});

describe("computeStageFingerprint", () => {
  it("ignores key order but not values or inputs", () => {
    const base = computeStageFingerprint("audio.tag", { genre: "Pop", year: 2011 }, ["aa"]);
    expect(computeStageFingerprint("audio.tag", { year: 2011, genre: "Pop" }, ["aa"])).toBe(base);
    expect(computeStageFingerprint("audio.tag", { genre: "Rock", year: 2011 }, ["aa"])).not.toBe(base);
    expect(computeStageFingerprint("audio.tag", { genre: "Pop", year: 2011 }, ["bb"])).not.toBe(base);
    expect(computeStageFingerprint("video.place", { genre: "Pop", year: 2011 }, ["aa"])).not.toBe(base);
    expect(base).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("digestFile", () => {
  it("hashes file contents with SHA-256", async () => {
    const dir = await mkdtemp(join(tmpdir(), "digest-"));
    try {
      const path = join(dir, "data.txt");
      await writeFile(path, "abc");
      expect(await digestFile(path)).toBe(
        "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("digestInputFile", () => {
  it("combines size and content digest, or reports a missing file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "digest-"));
    try {
      const path = join(dir, "cover.jpg");
      await writeFile(path, "abc");
      expect(await digestInputFile(path)).toBe(
        "3:ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      );
      expect(await digestInputFile(join(dir, "absent.jpg"))).toBe("missing");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
