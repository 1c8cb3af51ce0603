import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { parseJobListText, readJobList, splitDelimitedLine, stripComment } from "../src/job-list";

describe("stripComment", () => {
  it("drops everything after the comment character", () => {
    expect(stripComment("a,b # note")).toBe("a,b ");
    expect(stripComment("# whole line")).toBe("");
    expect(stripComment("a;b", ";")).toBe("a");
  });
});

describe("splitDelimitedLine", () => {
  it("keeps delimiters inside quotes", () => {
    expect(splitDelimitedLine('a,"b, c",d')).toEqual(["a", "b, c", "d"]);
  });

  it("unescapes doubled quotes", () => {
    expect(splitDelimitedLine('"say ""hi""",x')).toEqual(['say "hi"', "x"]);
  });

  it("keeps empty fields", () => {
    expect(splitDelimitedLine("a,,b,")).toEqual(["a", "", "b", ""]);
  });
});

describe("parseJobListText", () => {
  it("skips comments and blank lines and keeps source line numbers", () => {
    const text = [
      "\uFEFF# kind,source,albumArtist,album,title,artist,genre,year,cover",
      'av, https://media.example/watch?v=abc , Queen Singer,Immortal Songs,"Every Night, Live",Queen Singer,Pop,1999,cover.jpg',
      "",
      "  v,https://media.example/watch?v=def # second",
    ].join("\n");

    const entries = parseJobListText(text);

    expect(entries).toEqual([
      {
        line: 2,
        fields: {
          kind: "av",
          sourceLocator: "https://media.example/watch?v=abc",
          albumArtist: "Queen Singer",
          albumName: "Immortal Songs",
          trackTitle: "Every Night, Live",
          trackArtist: "Queen Singer",
          genre: "Pop",
          year: "1999",
          coverImage: "cover.jpg",
        },
      },
      {
        line: 4,
        fields: {
          kind: "v",
          sourceLocator: "https://media.example/watch?v=def",
        },
      },
    ]);
  });

  it("handles CRLF line endings and custom delimiters", () => {
    const entries = parseJobListText("a;loc1\r\na;loc2\r\n", { delimiter: ";" });
    expect(entries.map((entry) => entry.fields.sourceLocator)).toEqual(["loc1", "loc2"]);
    expect(entries.map((entry) => entry.line)).toEqual([1, 2]);
  });
});

describe("readJobList", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it("reads entries from a file", async () => {
    dir = await mkdtemp(join(tmpdir(), "job-list-"));
    const path = join(dir, "jobs.csv");
    await writeFile(path, "a,ytsearch:every night\n", "utf-8");

    const entries = await readJobList(path);

    expect(entries).toEqual([
      { line: 1, fields: { kind: "a", sourceLocator: "ytsearch:every night" } },
    ]);
  });
});
