import type { Opportunity, TextCompletionService } from "../types.js";

export interface ResultMerger {
  readonly name: string;
  merge(results: Opportunity[][]): Promise<Opportunity[]>;
}

export interface MergerDeps {
  completion: TextCompletionService;
  mergePrompt: string | null;
}

export type MergerFactory = (deps: MergerDeps) => ResultMerger;
