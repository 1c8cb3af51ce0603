import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([key, entry]) => [key, normalize(entry)]),
    );
  }
  return value;
}

// JSON with sorted keys, so equal params always hash the same.
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value)) ?? "null";
}

export function computeStageFingerprint(
  stageId: string,
  params: Record<string, unknown>,
  inputDigests: string[],
): string {
  return createHash("sha256")
    .update(stableStringify({ stage: stageId, params, inputs: inputDigests }))
    .digest("hex");
}

export async function digestFile(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

// Size and content digest of an input file, or "missing".
export async function digestInputFile(path: string): Promise<string> {
  try {
    const info = await stat(path);
    return `${info.size}:${await digestFile(path)}`;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "missing";
    }
    throw error;
  }
}
