import type { VideoContainer } from "@trackpress/tools";

export interface CliOptions {
  inputList?: string;
  outputDir?: string;
  coverDir?: string;
  workDir?: string;
  verbosity: number;
  maxJobs?: number;
  maxAcquire?: number;
  maxTranscode?: number;
  retries?: number;
  timeoutSeconds?: number;
  resume?: boolean;
  overwrite?: boolean;
  dedupe?: boolean;
  container?: VideoContainer;
  subtitleLanguages?: string[];
  clearCache?: boolean;
  keepWork?: boolean;
  json?: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; options: CliOptions & { inputList: string } };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE_TEXT = `Usage: trackpress -i <job-list> [options]

Download, assemble, normalize, tag and place every track of a job list.

Options:
  -i, --input-list <file>      Job list (required)
  -o, --output-folder <dir>    Output root, must exist (default: ./output)
  -c, --cover-folder <dir>     Cover image folder (default: ./cover)
  -w, --work-folder <dir>      Working directory root (default: <output>/.trackpress)
  -v, --verbose                More output; repeat for debug (-vv)
      --max-jobs <n>           Jobs running at once (default: 4, 0 = unlimited)
      --max-acquire <n>        Concurrent downloads (default: 2, 0 = unlimited)
      --max-transcode <n>      Concurrent transcodes (default: 2, 0 = unlimited)
      --retries <n>            Retries per stage for transient failures (default: 2)
      --timeout <seconds>      Per-call tool timeout (default: 1800)
      --no-resume              Ignore completion markers and redo every stage
      --overwrite              Replace existing output files
      --dedupe                 Skip entries repeating an earlier source and kind
  -m, --container <mkv|mp4>    Video container (default: mkv)
      --subtitles <langs|none> Subtitle languages for video (default: en)
  -r, --rm-cache-dir           Clear the downloader cache before the run
      --keep-work              Keep intermediate artifacts after success
      --json                   Print the run report as JSON
      --version                Print the version
  -h, --help                   Show this help
`;

const VALUE_FLAGS = new Map<string, string>([
  ["-i", "--input-list"],
  ["--input-list", "--input-list"],
  ["-o", "--output-folder"],
  ["--output-folder", "--output-folder"],
  ["-c", "--cover-folder"],
  ["--cover-folder", "--cover-folder"],
  ["-w", "--work-folder"],
  ["--work-folder", "--work-folder"],
  ["--max-jobs", "--max-jobs"],
  ["--max-acquire", "--max-acquire"],
  ["--max-transcode", "--max-transcode"],
  ["--retries", "--retries"],
  ["--timeout", "--timeout"],
  ["-m", "--container"],
  ["--container", "--container"],
  ["--subtitles", "--subtitles"],
]);

function parseIntegerFlag(flag: string, raw: string, minimum: number): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new UsageError(`${flag} expects an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < minimum) {
    throw new UsageError(`${flag} must be at least ${minimum}, got ${value}`);
  }
  return value;
}

export function parseContainer(raw: string): VideoContainer {
  const value = raw.trim().toLowerCase();
  if (value === "mkv" || value === "mp4") {
    return value;
  }
  throw new UsageError(`--container must be "mkv" or "mp4", got "${raw}"`);
}

// "none" disables subtitles; otherwise a comma-separated language list.
export function parseSubtitleLanguages(raw: string): string[] {
  if (raw.trim().toLowerCase() === "none") {
    return [];
  }
  const languages = raw
    .split(",")
    .map((language) => language.trim())
    .filter((language) => language.length > 0);
  if (languages.length === 0) {
    throw new UsageError(`--subtitles expects a language list or "none", got "${raw}"`);
  }
  return languages;
}

function applyValueFlag(options: CliOptions, flag: string, value: string): void {
  switch (flag) {
    case "--input-list":
      options.inputList = value;
      return;
    case "--output-folder":
      options.outputDir = value;
      return;
    case "--cover-folder":
      options.coverDir = value;
      return;
    case "--work-folder":
      options.workDir = value;
      return;
    case "--max-jobs":
      options.maxJobs = parseIntegerFlag(flag, value, 0);
      return;
    case "--max-acquire":
      options.maxAcquire = parseIntegerFlag(flag, value, 0);
      return;
    case "--max-transcode":
      options.maxTranscode = parseIntegerFlag(flag, value, 0);
      return;
    case "--retries":
      options.retries = parseIntegerFlag(flag, value, 0);
      return;
    case "--timeout":
      options.timeoutSeconds = parseIntegerFlag(flag, value, 1);
      return;
    case "--container":
      options.container = parseContainer(value);
      return;
    case "--subtitles":
      options.subtitleLanguages = parseSubtitleLanguages(value);
      return;
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const options: CliOptions = { verbosity: 0 };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }
    if (arg === "--version") {
      return { kind: "version" };
    }

    if (/^-v+$/.test(arg)) {
      options.verbosity += arg.length - 1;
      continue;
    }
    if (arg === "--verbose") {
      options.verbosity += 1;
      continue;
    }

    const equalsIndex = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = equalsIndex > 0 ? arg.slice(0, equalsIndex) : arg;
    const canonical = VALUE_FLAGS.get(name);
    if (canonical) {
      const value = equalsIndex > 0 ? arg.slice(equalsIndex + 1) : argv[i + 1];
      if (value === undefined || (equalsIndex < 0 && value.startsWith("-") && value !== "-")) {
        throw new UsageError(`${name} requires a value`);
      }
      if (equalsIndex < 0) {
        i++;
      }
      applyValueFlag(options, canonical, value);
      continue;
    }

    switch (arg) {
      case "--no-resume":
        options.resume = false;
        continue;
      case "--resume":
        options.resume = true;
        continue;
      case "--overwrite":
        options.overwrite = true;
        continue;
      case "--dedupe":
        options.dedupe = true;
        continue;
      case "-r":
      case "--rm-cache-dir":
        options.clearCache = true;
        continue;
      case "--keep-work":
        options.keepWork = true;
        continue;
      case "--json":
        options.json = true;
        continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    throw new UsageError(`Unexpected argument: ${arg}`);
  }

  const { inputList } = options;
  if (!inputList) {
    throw new UsageError("Missing required option: -i/--input-list");
  }
  return { kind: "run", options: { ...options, inputList } };
}
