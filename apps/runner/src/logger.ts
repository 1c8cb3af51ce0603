// Structured log output

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  jobIndex?: number;
  stage?: string;
  metadata?: Record<string, unknown>;
}

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  component: string;
  jobIndex?: number;
  stage?: string;
  minLevel?: LogLevel;
  jsonOutput?: boolean;
  // Defaults to the console
  write?: LogWriter;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

// 0 -> warn, -v -> info, -vv -> debug
export function verbosityToLogLevel(verbosity: number): LogLevel {
  if (verbosity >= 2) {
    return "debug";
  }
  if (verbosity === 1) {
    return "info";
  }
  return "warn";
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = {
      minLevel: "info",
      jsonOutput: process.env.LOG_FORMAT === "json",
      ...config,
    };
  }

  // Child logger carrying extra context
  child(context: Partial<LoggerConfig>): Logger {
    return new Logger({
      ...this.config,
      ...context,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel ?? "info"];
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...(this.config.jobIndex !== undefined && { jobIndex: this.config.jobIndex }),
      ...(this.config.stage ? { stage: this.config.stage } : {}),
      ...(metadata ? { metadata } : {}),
    };

    const write = this.config.write ?? writeToConsole;
    if (this.config.jsonOutput) {
      write(level, JSON.stringify(entry));
      return;
    }
    const metaStr = metadata ? ` ${JSON.stringify(metadata)}` : "";
    write(level, `${this.formatPrefix(entry)} ${message}${metaStr}`);
  }

  private formatPrefix(entry: LogEntry): string {
    const time = entry.timestamp.split("T")[1]?.slice(0, 8) ?? "";
    const level = entry.level.toUpperCase().padEnd(5);
    const job = entry.jobIndex !== undefined ? `[#${entry.jobIndex + 1}]` : "";
    const stage = entry.stage ? `[${entry.stage}]` : "";
    return `${time} ${level} [${entry.component}]${job}${stage}`;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log("debug", message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log("info", message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log("warn", message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log("error", message, metadata);
  }

  stepStart(step: string, description: string): void {
    this.info(`[${step}] ${description}`, { step, event: "step_start" });
  }

  stepComplete(step: string, durationMs: number): void {
    this.info(`[${step}] Completed in ${durationMs}ms`, {
      step,
      event: "step_complete",
      durationMs,
    });
  }

  stepSkipped(step: string, reason: string): void {
    this.info(`[${step}] Skipped (${reason})`, { step, event: "step_skipped", reason });
  }

  stepFailed(step: string, error: string): void {
    this.error(`[${step}] Failed: ${error}`, {
      step,
      event: "step_failed",
      error,
    });
  }

  jobStart(label: string): void {
    this.info(`Starting job: ${label}`, { event: "job_start" });
  }

  jobFinished(status: string, durationMs: number): void {
    const message = `Job ${status} in ${durationMs}ms`;
    const metadata = { event: "job_finished", status, durationMs };
    if (status === "failed") {
      this.warn(message, metadata);
      return;
    }
    this.info(message, metadata);
  }

  retry(attempt: number, maxAttempts: number, reason: string, delayMs: number): void {
    this.warn(`Retrying (${attempt}/${maxAttempts}) in ${delayMs}ms: ${reason}`, {
      event: "retry",
      attempt,
      maxAttempts,
      reason,
      delayMs,
    });
  }
}

export function createRunLogger(options: {
  verbosity: number;
  env?: NodeJS.ProcessEnv;
}): Logger {
  const env = options.env ?? process.env;
  const envLevel = env.LOG_LEVEL?.trim().toLowerCase();
  return new Logger({
    component: "trackpress",
    minLevel: isLogLevel(envLevel) ? envLevel : verbosityToLogLevel(options.verbosity),
    jsonOutput: env.LOG_FORMAT === "json",
  });
}
