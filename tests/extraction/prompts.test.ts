import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { loadMergePrompt, loadPrompt } from "../../src/extraction/prompts.js";
import { ConfigError } from "../../src/extraction/errors.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "bid-prompts-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadPrompt", () => {
  it("reads the first candidate that exists", async () => {
    const second = path.join(dir, "second.txt");
    await writeFile(second, "Find instrumentation jobs.");
    await expect(loadPrompt([path.join(dir, "first.txt"), second])).resolves.toBe(
      "Find instrumentation jobs.",
    );
  });

  it("drops bytes that are not valid UTF-8", async () => {
    const file = path.join(dir, "prompt.txt");
    await writeFile(file, Buffer.from([0x48, 0x69, 0xff, 0x21]));
    await expect(loadPrompt([file])).resolves.toBe("Hi!");
  });

  it("keeps replacement characters written in a valid UTF-8 file", async () => {
    const file = path.join(dir, "prompt.txt");
    await writeFile(file, "Unknown glyphs show as \uFFFD in scans.", "utf8");
    await expect(loadPrompt([file])).resolves.toBe("Unknown glyphs show as \uFFFD in scans.");
  });

  it("fails with a ConfigError when no candidate exists", async () => {
    await expect(loadPrompt([path.join(dir, "missing.txt")])).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("loadMergePrompt", () => {
  it("returns null when the file is missing", async () => {
    await expect(loadMergePrompt(path.join(dir, "merge.txt"))).resolves.toBeNull();
  });

  it("returns the file contents when present", async () => {
    const file = path.join(dir, "merge.txt");
    await writeFile(file, "Merge these.");
    await expect(loadMergePrompt(file)).resolves.toBe("Merge these.");
  });
});
