import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { join } from "node:path";

type WriteCallback = (error?: Error | null) => void;
type StreamWrite = typeof process.stdout.write;

function teeWrite(original: StreamWrite, stream: WriteStream): StreamWrite {
  return ((
    chunk: string | Uint8Array,
    encoding?: BufferEncoding | WriteCallback,
    callback?: WriteCallback,
  ): boolean => {
    stream.write(chunk);
    if (typeof encoding === "function") {
      return original(chunk, encoding);
    }
    return original(chunk, encoding, callback);
  }) as StreamWrite;
}

export interface ProcessLoggingOptions {
  label?: string;
  logDir: string;
}

// Tees stdout/stderr into <logDir>/<logName>.log. Returns the log path, or undefined when
// the directory cannot be created.
export function setupProcessLogging(
  logName: string,
  options: ProcessLoggingOptions,
): string | undefined {
  const logDir = options.logDir;

  try {
    mkdirSync(logDir, { recursive: true });
  } catch (error) {
    console.error(`[Logger] Failed to create log dir: ${logDir}`, error);
    return;
  }

  const logPath = join(logDir, `${logName}.log`);
  const stream = createWriteStream(logPath, { flags: "a" });
  stream.on("error", (error) => {
    console.error(`[Logger] Log file write failed: ${logPath}`, error);
  });

  process.stdout.write = teeWrite(process.stdout.write.bind(process.stdout), stream);
  process.stderr.write = teeWrite(process.stderr.write.bind(process.stderr), stream);

  process.on("exit", () => {
    stream.end();
  });

  const label = options.label ?? "Process";
  console.log(`[Logger] ${label} logs are written to ${logPath}`);
  return logPath;
}
