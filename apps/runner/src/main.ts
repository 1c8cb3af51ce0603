import "dotenv/config";
import { readFile } from "node:fs/promises";
import { ZodError } from "zod";
import { buildRunLogName, isRunSuccessful } from "@trackpress/core";
import { setupProcessLogging } from "@trackpress/core/process-logging";
import { assertExecutablesAvailable } from "@trackpress/tools";
import { parseCliArgs, UsageError, USAGE_TEXT } from "./cli";
import { assertDirectoryExists, resolveRunnerConfig } from "./config";
import { createRunLogger } from "./logger";
import { formatRunReport } from "./report";
import { runJobList } from "./run";
import { installCancellationHandlers } from "./signals";

const EXIT_USAGE = 2;

async function readVersion(): Promise<string> {
  const raw = await readFile(new URL("../package.json", import.meta.url), "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
    return String(parsed.version);
  }
  return "unknown";
}

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(USAGE_TEXT);
    return 0;
  }
  if (command.kind === "version") {
    console.log(await readVersion());
    return 0;
  }

  const config = resolveRunnerConfig(command.options);
  await assertDirectoryExists(config.outputDir, "Output folder");

  setupProcessLogging(buildRunLogName("trackpress"), {
    label: "trackpress",
    logDir: config.logDir,
  });
  const logger = createRunLogger({ verbosity: config.verbosity });
  await assertExecutablesAvailable();

  const controller = new AbortController();
  const uninstall = installCancellationHandlers(controller, logger);
  try {
    const report = await runJobList(config, logger, { signal: controller.signal });
    console.log(config.json ? JSON.stringify(report, null, 2) : formatRunReport(report));
    return isRunSuccessful(report) ? 0 : 1;
  } finally {
    uninstall();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError || error instanceof ZodError) {
      console.error(error instanceof UsageError ? error.message : `Invalid configuration: ${error.message}`);
      console.error("Run with --help for usage.");
      process.exitCode = EXIT_USAGE;
      return;
    }
    console.error("trackpress failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
