import { describe, expect, it } from "vitest";
import { buildRunLogName, resolveLogDir } from "../src/log-dir";

describe("resolveLogDir", () => {
  it("uses TRACKPRESS_LOG_DIR when set", () => {
    const result = resolveLogDir({
      fallbackDir: "/music/.trackpress/logs",
      env: { TRACKPRESS_LOG_DIR: "/tmp/custom-logs" },
    });
    expect(result).toBe("/tmp/custom-logs");
  });

  it("falls back when the variable is blank", () => {
    const result = resolveLogDir({
      fallbackDir: "/music/.trackpress/logs",
      env: { TRACKPRESS_LOG_DIR: "   " },
    });
    expect(result).toBe("/music/.trackpress/logs");
  });
});

describe("buildRunLogName", () => {
  it("stamps the local date and time", () => {
    const name = buildRunLogName("trackpress", new Date(2024, 0, 31, 23, 59, 5));
    expect(name).toBe("trackpress_20240131_235905");
  });
});
