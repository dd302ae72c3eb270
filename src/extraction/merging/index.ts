import { KeyMerger } from "./key-merger.js";
import { ModelMerger } from "./model-merger.js";
import type { MergerDeps, MergerFactory, ResultMerger } from "./types.js";

const registry = new Map<string, MergerFactory>();

export function registerMergeStrategy(name: string, factory: MergerFactory): void {
  registry.set(name, factory);
}

export function createMerger(name: string, deps: MergerDeps): ResultMerger {
  const factory = registry.get(name);
  if (!factory) {
    throw new Error(`Unknown merge strategy: ${name}`);
  }
  return factory(deps);
}

// Register defaults
registerMergeStrategy("key", () => new KeyMerger());
registerMergeStrategy("model", (deps) => new ModelMerger(deps));

export { KeyMerger, mergeByKey, mergeKey } from "./key-merger.js";
export { ModelMerger, buildMergePrompt, FALLBACK_MERGE_PROMPT } from "./model-merger.js";
export type { MergerDeps, ResultMerger } from "./types.js";
