import type { Opportunity } from "./opportunity-parser.js";
import {
  JOB_SIZES,
  TECHNICAL_COMPLEXITIES,
  type ContractValueRange,
  type JobSize,
  type OpportunityRow,
  type TechnicalComplexity,
} from "./types.js";

export const NOT_SPECIFIED = "Not specified";

const JOB_CODE_MAX = 10;
const SHORT_TEXT_MAX = 255;

export function clampInt(value: unknown, lo = 0, hi = 100): number | null {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(n)) return null;
  return Math.max(lo, Math.min(Math.trunc(n), hi));
}

export function truncate(value: string, max: number): string {
  return value.length <= max ? value : value.slice(0, max);
}

function stripOrNull(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const s = value.trim();
  return s ? s : null;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  const v = stripOrNull(value)?.toLowerCase();
  if (!v) return fallback;
  return allowed.find((a) => a.toLowerCase() === v) ?? fallback;
}

export function normalizeJobSize(value: unknown): JobSize {
  return oneOf(value, JOB_SIZES, "small");
}

export function normalizeTechnicalComplexity(value: unknown): TechnicalComplexity {
  return oneOf(value, TECHNICAL_COMPLEXITIES, NOT_SPECIFIED);
}

/**
 * Maps the model's free-text value band onto the fixed column values. Checks
 * run in order; the first that matches wins.
 */
export function normalizeContractValueRange(value: unknown): ContractValueRange {
  const s = stripOrNull(value)?.toLowerCase();
  if (!s || s.includes("not specified")) return NOT_SPECIFIED;
  if (s.includes("small")) return "small (<$500K)";
  if (s.includes("medium")) return "medium ($500K-$5M)";
  if (s.includes("large") && !s.includes(">$")) return "medium ($500K-$5M)";
  if (s.includes("mega")) {
    return s.includes("50m") || s.includes(">$50") ? "mega (>$50M)" : "large ($5M-$50M)";
  }
  if (s.includes("5m")) return "large ($5M-$50M)";
  return NOT_SPECIFIED;
}

function shortText(value: unknown): string {
  return truncate(stripOrNull(value) ?? NOT_SPECIFIED, SHORT_TEXT_MAX);
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

/** Never throws; every field falls back to a column-safe default. */
export function toRow(projectId: number, opp: Partial<Opportunity>): OpportunityRow {
  const jobCode = stripOrNull(opp.job_code);

  return {
    projectId,
    jobCode: truncate(jobCode ?? String(projectId), JOB_CODE_MAX),
    jobDescription: text(opp.job_description),
    jobSummary: text(opp.job_summary),
    jobSize: normalizeJobSize(opp.job_size),
    projectType: stripOrNull(opp.project_type) ?? "General",
    frequency: shortText(opp.monitoring_frequency),
    matchConfidence: clampInt(opp.match_confidence, 0, 100),
    contractValueRange: normalizeContractValueRange(opp.contract_value_range),
    submissionDeadline: shortText(opp.submission_deadline),
    licensingRequirements: stripOrNull(opp.licensing_requirements),
    technicalComplexity: normalizeTechnicalComplexity(opp.technical_complexity),
    projectLocation: shortText(opp.project_location),
    contractDuration: shortText(opp.contract_duration),
    insuranceRequirements: stripOrNull(opp.insurance_requirements),
    equipmentSpecifications: stripOrNull(opp.equipment_needed),
    complianceStandards: stripOrNull(opp.compliance_standards),
    reportingRequirements: stripOrNull(opp.reporting_requirements),
  };
}
