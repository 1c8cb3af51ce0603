import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { ToolError, type EnvSource } from "@trackpress/core";
import { REQUIRED_TOOLS, TOOL_EXECUTABLES, resolveToolCommand, type ToolName } from "./executables";

export interface PreflightResult {
  tool: ToolName;
  command: string;
  resolvedPath: string | null;
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return false;
    }
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function findExecutable(
  command: string,
  env: EnvSource = process.env,
): Promise<string | null> {
  if (command.includes("/") || command.includes("\\")) {
    return (await isExecutableFile(command)) ? command : null;
  }
  const searchPath = env.PATH ?? env.Path ?? "";
  const extensions =
    process.platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")] : [""];
  for (const dir of searchPath.split(delimiter)) {
    if (!dir) {
      continue;
    }
    for (const extension of extensions) {
      const candidate = join(dir, `${command}${extension}`);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

export async function checkExecutables(
  tools: ToolName[] = REQUIRED_TOOLS,
  env: EnvSource = process.env,
): Promise<PreflightResult[]> {
  return Promise.all(
    tools.map(async (tool) => {
      const command = resolveToolCommand(tool, undefined, env);
      return { tool, command, resolvedPath: await findExecutable(command, env) };
    }),
  );
}

export function formatMissingExecutables(results: PreflightResult[]): string | null {
  const missing = results.filter((result) => result.resolvedPath === null);
  if (missing.length === 0) {
    return null;
  }
  const names = missing
    .map((result) => `${result.command} (set ${TOOL_EXECUTABLES[result.tool].envKey})`)
    .join(", ");
  return `Required executables not found: ${names}`;
}

export async function assertExecutablesAvailable(
  tools: ToolName[] = REQUIRED_TOOLS,
  env: EnvSource = process.env,
): Promise<PreflightResult[]> {
  const results = await checkExecutables(tools, env);
  const message = formatMissingExecutables(results);
  if (message) {
    throw new ToolError(message);
  }
  return results;
}
