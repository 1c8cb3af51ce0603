import { spawn } from "node:child_process";
import type { ToolStream } from "../types";

export interface ToolRunOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs: number;
  signal?: AbortSignal;
  // Delay between SIGTERM and SIGKILL
  killGraceMs?: number;
  onLine?: (line: string, stream: ToolStream) => void;
}

export interface ToolRunResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: string;
}

const DEFAULT_KILL_GRACE_MS = 2000;
const MAX_CAPTURED_CHARS = 256 * 1024;

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURED_CHARS ? next.slice(next.length - MAX_CAPTURED_CHARS) : next;
}

function quoteArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
}

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

// Splits a chunked stream into lines; yt-dlp and ffmpeg use \r for in-place progress.
export function createLineSplitter(onLine: (line: string) => void): {
  push: (chunk: string) => void;
  flush: () => void;
} {
  let pending = "";
  return {
    push(chunk: string) {
      pending += chunk;
      while (true) {
        const match = /\r\n|\n|\r/.exec(pending);
        if (!match) {
          break;
        }
        const line = pending.slice(0, match.index);
        pending = pending.slice(match.index + match[0].length);
        if (line.trim()) {
          onLine(line);
        }
      }
    },
    flush() {
      if (pending.trim()) {
        onLine(pending);
      }
      pending = "";
    },
  };
}

export async function runTool(options: ToolRunOptions): Promise<ToolRunResult> {
  const startTime = Date.now();
  if (options.signal?.aborted) {
    return {
      exitCode: -1,
      signal: null,
      stdout: "",
      stderr: "",
      durationMs: 0,
      timedOut: false,
      aborted: true,
    };
  }

  const useProcessGroup = process.platform !== "win32";
  const childProcess = spawn(options.command, options.args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    detached: useProcessGroup,
    stdio: ["ignore", "pipe", "pipe"],
  });

  let timedOut = false;
  let aborted = false;
  let killTimer: NodeJS.Timeout | undefined;

  const terminate = (signal: NodeJS.Signals): void => {
    const pid = childProcess.pid;
    if (!pid) {
      try {
        childProcess.kill(signal);
      } catch {
        // Already gone
      }
      return;
    }
    if (useProcessGroup) {
      try {
        process.kill(-pid, signal);
        return;
      } catch {
        // Fall back to the direct PID below.
      }
    }
    try {
      process.kill(pid, signal);
    } catch {
      // Already gone
    }
  };

  const stop = (): void => {
    terminate("SIGTERM");
    killTimer = setTimeout(
      () => terminate("SIGKILL"),
      options.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
    );
  };

  const timeout = setTimeout(() => {
    timedOut = true;
    stop();
  }, options.timeoutMs);

  const onAbort = (): void => {
    aborted = true;
    stop();
  };
  options.signal?.addEventListener("abort", onAbort, { once: true });

  let stdout = "";
  let stderr = "";
  const stdoutLines = createLineSplitter((line) => options.onLine?.(line, "stdout"));
  const stderrLines = createLineSplitter((line) => options.onLine?.(line, "stderr"));

  childProcess.stdout.on("data", (data: Buffer) => {
    const chunk = data.toString();
    stdout = appendCapped(stdout, chunk);
    stdoutLines.push(chunk);
  });
  childProcess.stderr.on("data", (data: Buffer) => {
    const chunk = data.toString();
    stderr = appendCapped(stderr, chunk);
    stderrLines.push(chunk);
  });

  return new Promise((resolve) => {
    let settled = false;
    const finish = (result: Omit<ToolRunResult, "durationMs" | "timedOut" | "aborted">): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeout);
      if (killTimer) {
        clearTimeout(killTimer);
      }
      options.signal?.removeEventListener("abort", onAbort);
      stdoutLines.flush();
      stderrLines.flush();
      resolve({ ...result, durationMs: Date.now() - startTime, timedOut, aborted });
    };

    childProcess.on("close", (code, signal) => {
      finish({ exitCode: code ?? -1, signal, stdout, stderr });
    });

    childProcess.on("error", (error) => {
      finish({
        exitCode: -1,
        signal: null,
        stdout,
        stderr,
        spawnError: error.message,
      });
    });
  });
}
