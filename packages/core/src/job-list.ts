import { readFile } from "node:fs/promises";
import { JOB_LIST_COLUMNS, type JobListColumn, type RawJobEntry } from "./domain/job-spec";

export interface JobListParseOptions {
  commentChar?: string;
  delimiter?: string;
}

export const DEFAULT_COMMENT_CHAR = "#";
export const DEFAULT_DELIMITER = ",";

// Everything from the comment character to the end of the line is dropped.
export function stripComment(line: string, commentChar = DEFAULT_COMMENT_CHAR): string {
  const commentIndex = line.indexOf(commentChar);
  return commentIndex < 0 ? line : line.slice(0, commentIndex);
}

export function splitDelimitedLine(line: string, delimiter = DEFAULT_DELIMITER): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      if (inQuotes && line[index + 1] === '"') {
        current += '"';
        index += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (char === delimiter && !inQuotes) {
      fields.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  fields.push(current);
  return fields;
}

function cleanField(value: string): string {
  return value.trim().replace(/^"+|"+$/g, "").trim();
}

export function parseJobListText(text: string, options: JobListParseOptions = {}): RawJobEntry[] {
  const commentChar = options.commentChar ?? DEFAULT_COMMENT_CHAR;
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const entries: RawJobEntry[] = [];

  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  lines.forEach((rawLine, lineIndex) => {
    const content = stripComment(rawLine, commentChar).trim();
    if (!content) {
      return;
    }
    const values = splitDelimitedLine(content, delimiter);
    const fields: Partial<Record<JobListColumn, string>> = {};
    JOB_LIST_COLUMNS.forEach((column, columnIndex) => {
      const value = values[columnIndex];
      if (value !== undefined) {
        fields[column] = cleanField(value);
      }
    });
    entries.push({ line: lineIndex + 1, fields });
  });

  return entries;
}

export async function readJobList(
  path: string,
  options: JobListParseOptions = {},
): Promise<RawJobEntry[]> {
  const text = await readFile(path, "utf-8");
  return parseJobListText(text, options);
}
