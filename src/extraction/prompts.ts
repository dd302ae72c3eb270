import { readFile } from "node:fs/promises";
import { ConfigError, describeError } from "./errors.js";
import { resolveFromCwd } from "./config.js";
import { logger } from "./logger.js";

async function readIfPresent(file: string): Promise<Buffer | null> {
  try {
    return await readFile(file);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

function decode(data: Buffer, label: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch (err) {
    logger.warn(`Some characters in ${label} couldn't be decoded and were dropped`, {
      error: describeError(err),
    });
    return new TextDecoder("utf-8").decode(data).replace(/\uFFFD/g, "");
  }
}

/** First existing file among `candidates`. Missing everywhere is a ConfigError. */
export async function loadPrompt(candidates: readonly string[]): Promise<string> {
  for (const candidate of candidates) {
    const file = resolveFromCwd(candidate);
    const data = await readIfPresent(file);
    if (data) {
      logger.info("Loaded prompt", { file });
      return decode(data, "prompt");
    }
  }
  throw new ConfigError(`Required prompt file not found. Tried: ${candidates.join(", ")}`, {
    candidates: [...candidates],
  });
}

export async function loadMergePrompt(file: string): Promise<string | null> {
  const data = await readIfPresent(resolveFromCwd(file));
  if (!data) {
    logger.warn("Merge prompt file not found; using built-in merge prompt", { file });
    return null;
  }
  logger.info("Loaded merge prompt", { file });
  return decode(data, "merge prompt");
}
