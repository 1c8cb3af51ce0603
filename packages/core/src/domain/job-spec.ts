import { existsSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { z } from "zod";
import { ValidationError, type ValidationIssue } from "../errors";

// Column order of a job-list row
export const JOB_LIST_COLUMNS = [
  "kind",
  "sourceLocator",
  "albumArtist",
  "albumName",
  "trackTitle",
  "trackArtist",
  "genre",
  "year",
  "coverImage",
] as const;
export type JobListColumn = (typeof JOB_LIST_COLUMNS)[number];

export const JobKind = z.enum(["audio_only", "video_only", "audio_and_video"]);
export type JobKind = z.infer<typeof JobKind>;

const JOB_KIND_BY_CODE = {
  a: "audio_only",
  v: "video_only",
  av: "audio_and_video",
} as const satisfies Record<string, JobKind>;

export const JobKindCode = z.enum(["a", "v", "av"]);
export type JobKindCode = z.infer<typeof JobKindCode>;

export function jobKindFromCode(code: JobKindCode): JobKind {
  return JOB_KIND_BY_CODE[code];
}

export interface RawJobEntry {
  // 1-based line in the job-list file
  line?: number;
  fields: Partial<Record<JobListColumn, string>>;
}

export const JobSpecSchema = z.object({
  kind: JobKind,
  sourceLocator: z.string().min(1),
  albumArtist: z.string().min(1),
  albumName: z.string().min(1),
  trackTitle: z.string().min(1),
  trackArtist: z.string().min(1),
  genre: z.string().min(1),
  year: z.number().int().min(1000).max(9999),
  coverImagePath: z.string().min(1).optional(),
});
export type JobSpec = Readonly<z.infer<typeof JobSpecSchema>>;

export interface AcceptedJob {
  index: number;
  line?: number;
  spec: JobSpec;
  // Earlier accepted entry with the same source and kind
  duplicateOf?: number;
}

export interface RejectedJob {
  index: number;
  line?: number;
  issues: ValidationIssue[];
}

export interface JobListWarning {
  index: number;
  line?: number;
  message: string;
}

export interface JobSpecParseResult {
  accepted: AcceptedJob[];
  rejected: RejectedJob[];
  warnings: JobListWarning[];
}

export interface JobSpecParseOptions {
  coverDir: string;
  fileExists?: (path: string) => boolean;
}

const SEARCH_LOCATOR_PATTERN = /^[a-z0-9]*search(\d+|all)?:/i;
const URL_LOCATOR_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const COLLECTION_PATH_PATTERNS = [
  /\/playlist\/?$/i,
  /\/(?:channel|c|user)\/[^/]+/i,
  /^\/@[^/]+(?:\/(?:videos|shorts|streams|playlists|featured))?\/?$/i,
  /\/(?:album|sets)\/[^/]+\/?$/i,
];

// A locator must point at exactly one media item, never a playlist, channel or multi-result search.
export function isSingleItemLocator(locator: string): boolean {
  const value = locator.trim();
  if (!value || /\s/.test(value)) {
    return false;
  }

  const search = SEARCH_LOCATOR_PATTERN.exec(value);
  if (search) {
    const count = search[1];
    if (count === undefined) {
      return true;
    }
    return count.toLowerCase() !== "all" && Number.parseInt(count, 10) === 1;
  }

  if (!URL_LOCATOR_PATTERN.test(value)) {
    return true;
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  if (COLLECTION_PATH_PATTERNS.some((pattern) => pattern.test(url.pathname))) {
    return false;
  }
  if (url.searchParams.has("list") && !url.searchParams.has("v")) {
    return false;
  }
  return true;
}

function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} must not be empty`);
}

const RawJobRowSchema = z.object({
  kind: z
    .string({ required_error: "download kind is required" })
    .trim()
    .toLowerCase()
    .pipe(
      z.enum(JobKindCode.options, {
        errorMap: () => ({ message: 'download kind must be one of "a", "v" or "av"' }),
      }),
    )
    .transform(jobKindFromCode),
  sourceLocator: requiredText("source locator").refine(
    isSingleItemLocator,
    "source locator must resolve to a single item, not a playlist, channel or search collection",
  ),
  albumArtist: requiredText("album artist"),
  albumName: requiredText("album name"),
  trackTitle: requiredText("track title"),
  trackArtist: requiredText("track artist"),
  genre: requiredText("genre"),
  year: requiredText("year")
    .regex(/^\d{4}$/, "year must be a four-digit integer")
    .transform((value) => Number.parseInt(value, 10)),
  coverImage: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
});

function toIssues(error: z.ZodError, index: number, line: number | undefined): ValidationIssue[] {
  return error.issues.map((issue) => ({
    index,
    ...(line !== undefined && { line }),
    field: issue.path.map(String).join(".") || "row",
    message: issue.message,
  }));
}

export function resolveCoverImagePath(coverDir: string, coverImage: string): string {
  return isAbsolute(coverImage) ? coverImage : resolve(coverDir, coverImage);
}

export function parseJobSpecs(
  entries: RawJobEntry[],
  options: JobSpecParseOptions,
): JobSpecParseResult {
  const fileExists = options.fileExists ?? existsSync;
  const accepted: AcceptedJob[] = [];
  const rejected: RejectedJob[] = [];
  const warnings: JobListWarning[] = [];
  const firstIndexByKey = new Map<string, AcceptedJob>();

  entries.forEach((entry, index) => {
    const line = entry.line;
    const coverImage = entry.fields.coverImage?.trim();
    const coverImagePath = coverImage
      ? resolveCoverImagePath(options.coverDir, coverImage)
      : undefined;
    const coverMissing = coverImagePath !== undefined && !fileExists(coverImagePath);

    const parsed = RawJobRowSchema.safeParse(entry.fields);
    if (!parsed.success || coverMissing) {
      const issues = parsed.success ? [] : toIssues(parsed.error, index, line);
      if (coverMissing) {
        issues.push({
          index,
          ...(line !== undefined && { line }),
          field: "coverImage",
          message: `cover image not found: ${coverImagePath}`,
        });
      }
      rejected.push({ index, line, issues });
      return;
    }

    const row = parsed.data;
    const spec: JobSpec = Object.freeze({
      kind: row.kind,
      sourceLocator: row.sourceLocator,
      albumArtist: row.albumArtist,
      albumName: row.albumName,
      trackTitle: row.trackTitle,
      trackArtist: row.trackArtist,
      genre: row.genre,
      year: row.year,
      ...(coverImagePath !== undefined && { coverImagePath }),
    });

    const job: AcceptedJob = { index, line, spec };
    const key = `${spec.kind}\u0000${spec.sourceLocator}`;
    const first = firstIndexByKey.get(key);
    if (first) {
      job.duplicateOf = first.index;
      const where = first.line !== undefined ? `line ${first.line}` : `entry #${first.index + 1}`;
      warnings.push({
        index,
        line,
        message: `same source and kind as ${where}: ${spec.sourceLocator}`,
      });
    } else {
      firstIndexByKey.set(key, job);
    }
    accepted.push(job);
  });

  return { accepted, rejected, warnings };
}

export function parseJobSpecsOrThrow(
  entries: RawJobEntry[],
  options: JobSpecParseOptions,
): JobSpec[] {
  const result = parseJobSpecs(entries, options);
  if (result.rejected.length > 0) {
    throw new ValidationError(result.rejected.flatMap((job) => job.issues));
  }
  return result.accepted.map((job) => job.spec);
}

export function describeJob(spec: Pick<JobSpec, "albumArtist" | "trackTitle">): string {
  return `${spec.albumArtist} - ${spec.trackTitle}`;
}
