import { z } from "zod";

/** Text field as the model sends it: strings kept, numbers stringified, anything else null. */
const looseText = z
  .unknown()
  .transform((v): string | null => {
    if (typeof v === "string") return v;
    if (typeof v === "number" && Number.isFinite(v)) return String(v);
    return null;
  });

const looseNumber = z
  .unknown()
  .transform((v): number | null => {
    const n =
      typeof v === "number"
        ? v
        : typeof v === "string" && v.trim() !== ""
          ? Number(v.trim().replace(/%$/, ""))
          : Number.NaN;
    return Number.isFinite(n) ? n : null;
  });

export const OpportunitySchema = z.object({
  job_code: looseText,
  job_description: looseText,
  job_summary: looseText,
  job_size: looseText,
  monitoring_frequency: looseText,
  match_confidence: looseNumber,
  contract_value_range: looseText,
  submission_deadline: looseText,
  licensing_requirements: looseText,
  insurance_requirements: looseText,
  equipment_needed: looseText,
  compliance_standards: looseText,
  reporting_requirements: looseText,
  technical_complexity: looseText,
  project_location: looseText,
  contract_duration: looseText,
  project_type: looseText,
});

export type Opportunity = z.infer<typeof OpportunitySchema>;

export type ParseResult =
  | { kind: "ok"; opportunities: Opportunity[] }
  | { kind: "empty"; reason: string };

export const OPPORTUNITIES_KEY = "instrumentation_opportunities";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls the JSON payload out of a model reply: a fenced code block if there
 * is one, otherwise the outermost object or array span.
 */
export function extractJsonText(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenced?.[1]) return fenced[1];

  const trimmed = text.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) return trimmed;

  const objStart = text.indexOf("{");
  const objEnd = text.lastIndexOf("}");
  if (objStart !== -1 && objEnd > objStart) return text.slice(objStart, objEnd + 1);

  const arrStart = text.indexOf("[");
  const arrEnd = text.lastIndexOf("]");
  if (arrStart !== -1 && arrEnd > arrStart) return text.slice(arrStart, arrEnd + 1);

  return null;
}

export function toOpportunities(items: unknown[]): Opportunity[] {
  return items.filter(isRecord).map((item) => OpportunitySchema.parse(item));
}

export function parseOpportunities(text: string | null | undefined): ParseResult {
  if (!text || !text.trim()) return { kind: "empty", reason: "empty response" };

  const jsonText = extractJsonText(text);
  if (jsonText === null) return { kind: "empty", reason: "no JSON found in response" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { kind: "empty", reason: `invalid JSON: ${msg}` };
  }

  let items: unknown;
  if (Array.isArray(parsed)) {
    items = parsed;
  } else if (isRecord(parsed)) {
    items = parsed[OPPORTUNITIES_KEY];
  }

  if (!Array.isArray(items)) {
    return { kind: "empty", reason: `missing "${OPPORTUNITIES_KEY}" list` };
  }

  return { kind: "ok", opportunities: toOpportunities(items) };
}

/** Opportunities from a parse result; the empty variant yields none. */
export function opportunitiesOf(result: ParseResult): Opportunity[] {
  return result.kind === "ok" ? result.opportunities : [];
}
