import { OpportunitySchema } from "../opportunity-parser.js";
import type { Opportunity } from "../types.js";
import type { ResultMerger } from "./types.js";

const DESCRIPTION_PREFIX = 120;
const FIELDS = OpportunitySchema.keyof().options;

function fold(value: string | null): string {
  return (value ?? "").trim().toLowerCase();
}

/**
 * Identity for deduplication: job code, the first 120 characters of the raw
 * description, and location, each folded (trimmed, lower-cased) after slicing.
 */
export function mergeKey(opp: Opportunity): string {
  return JSON.stringify([
    fold(opp.job_code),
    fold((opp.job_description ?? "").slice(0, DESCRIPTION_PREFIX)),
    fold(opp.project_location),
  ]);
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

function maxConfidence(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function fillBlank<K extends keyof Opportunity>(out: Opportunity, incoming: Opportunity, field: K): void {
  if (isBlank(out[field]) && !isBlank(incoming[field])) {
    out[field] = incoming[field];
  }
}

function absorb(target: Opportunity, incoming: Opportunity): Opportunity {
  const out: Opportunity = { ...target };
  for (const field of FIELDS) {
    if (field !== "match_confidence") fillBlank(out, incoming, field);
  }
  out.match_confidence = maxConfidence(target.match_confidence, incoming.match_confidence);
  return out;
}

/**
 * Deterministic dedupe by (job code, description prefix, location). The
 * survivor keeps the highest confidence and the first non-blank value of every
 * other field. Output follows first-seen order.
 */
export function mergeByKey(results: Opportunity[][]): Opportunity[] {
  const groups = new Map<string, Opportunity>();
  for (const list of results) {
    for (const opp of list) {
      const key = mergeKey(opp);
      const existing = groups.get(key);
      groups.set(key, existing ? absorb(existing, opp) : { ...opp });
    }
  }
  return [...groups.values()];
}

export class KeyMerger implements ResultMerger {
  readonly name = "key";

  async merge(results: Opportunity[][]): Promise<Opportunity[]> {
    const flat = results.flat();
    if (flat.length <= 1) return flat;
    return mergeByKey([flat]);
  }
}
