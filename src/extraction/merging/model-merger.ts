import { describeError } from "../errors.js";
import { logger } from "../logger.js";
import { OPPORTUNITIES_KEY, parseOpportunities } from "../opportunity-parser.js";
import type { Opportunity, TextCompletionService } from "../types.js";
import type { MergerDeps, ResultMerger } from "./types.js";

export const FALLBACK_MERGE_PROMPT =
  "Combine and consolidate the following analysis results into a single comprehensive " +
  `JSON response with the same structure: {"${OPPORTUNITIES_KEY}": [...]}. ` +
  "Merge entries that describe the same job, keeping the highest match_confidence " +
  "and every non-empty detail. Return only JSON.";

export function buildMergePrompt(mergePrompt: string | null, candidates: Opportunity[]): string {
  const payload = JSON.stringify({ [OPPORTUNITIES_KEY]: candidates }, null, 2);
  return `${mergePrompt ?? FALLBACK_MERGE_PROMPT}\n\n--- BEGIN CANDIDATES ---\n${payload}\n--- END CANDIDATES ---`;
}

/**
 * Hands the reduction to the model. Any failure, or an answer with no
 * opportunities, returns the unmerged candidates instead.
 */
export class ModelMerger implements ResultMerger {
  readonly name = "model";
  private readonly completion: TextCompletionService;
  private readonly mergePrompt: string | null;

  constructor(deps: MergerDeps) {
    this.completion = deps.completion;
    this.mergePrompt = deps.mergePrompt;
  }

  async merge(results: Opportunity[][]): Promise<Opportunity[]> {
    const candidates = results.flat();
    if (candidates.length <= 1) return candidates;

    logger.info("Merging candidates with model", { candidates: candidates.length });
    let response: string;
    try {
      response = await this.completion.complete(buildMergePrompt(this.mergePrompt, candidates));
    } catch (err) {
      logger.warn("Model merge failed; keeping unmerged list", { error: describeError(err) });
      return candidates;
    }

    const parsed = parseOpportunities(response);
    if (parsed.kind === "empty") {
      logger.warn("Model merge returned no usable JSON; keeping unmerged list", {
        reason: parsed.reason,
      });
      return candidates;
    }
    if (parsed.opportunities.length === 0) {
      logger.warn("Model merge returned an empty list; keeping unmerged list");
      return candidates;
    }

    logger.info("Model merge complete", {
      before: candidates.length,
      after: parsed.opportunities.length,
    });
    return parsed.opportunities;
  }
}
