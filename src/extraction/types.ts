import type { Opportunity } from "./opportunity-parser.js";

export type { Opportunity } from "./opportunity-parser.js";

/** A page-aligned slice of a source PDF, serialized on its own. */
export interface DocumentChunk {
  index: number;
  /** 0-based, inclusive. */
  startPage: number;
  /** 0-based, exclusive. */
  endPage: number;
  bytes: Uint8Array;
}

export interface TextSegment {
  text: string;
  /** Offsets into the chunk text, end exclusive. */
  start: number;
  end: number;
  /** 1-based. */
  ordinal: number;
  total: number;
}

export interface SegmentationResult {
  segments: TextSegment[];
  /** True when the segment cap was hit before the text ran out. */
  truncated: boolean;
  droppedChars: number;
}

export interface ChunkReport {
  chunk: number;
  pages: [number, number];
  textLength: number;
  segments: number;
  truncated: boolean;
  droppedChars: number;
  opportunities: number;
}

export interface ExtractionResult {
  instrumentation_opportunities: Opportunity[];
  chunks: ChunkReport[];
}

export interface CompletionOptions {
  maxOutputTokens: number;
  reasoningEffort?: "minimal" | "low" | "medium" | "high";
  verbosity?: "low" | "medium" | "high";
}

export interface TextCompletionService {
  complete(prompt: string, options?: Partial<CompletionOptions>): Promise<string>;
}

export interface BlobStore {
  get(bucket: string, key: string): Promise<Uint8Array>;
  put(bucket: string, key: string, bytes: Uint8Array, contentType: string): Promise<string>;
}

export const JOB_SIZES = ["small", "medium", "big", "very big"] as const;
export type JobSize = (typeof JOB_SIZES)[number];

export const TECHNICAL_COMPLEXITIES = [
  "low",
  "medium",
  "high",
  "specialized",
  "Not specified",
] as const;
export type TechnicalComplexity = (typeof TECHNICAL_COMPLEXITIES)[number];

export const CONTRACT_VALUE_RANGES = [
  "small (<$500K)",
  "medium ($500K-$5M)",
  "large ($5M-$50M)",
  "mega (>$50M)",
  "Not specified",
] as const;
export type ContractValueRange = (typeof CONTRACT_VALUE_RANGES)[number];

/** One row of the opportunities table. */
export interface OpportunityRow {
  projectId: number;
  jobCode: string;
  jobDescription: string;
  jobSummary: string;
  jobSize: JobSize;
  projectType: string;
  frequency: string;
  matchConfidence: number | null;
  contractValueRange: ContractValueRange;
  submissionDeadline: string;
  licensingRequirements: string | null;
  technicalComplexity: TechnicalComplexity;
  projectLocation: string;
  contractDuration: string;
  insuranceRequirements: string | null;
  equipmentSpecifications: string | null;
  complianceStandards: string | null;
  reportingRequirements: string | null;
}

export interface BidDocument {
  id: number;
  projectId: number;
  documentType: string | null;
  displayName: string | null;
  s3Path: string | null;
}

export interface OpportunityRepository {
  existingProjectKeys(): Promise<Set<number>>;
  fetchBidDocuments(limit: number, offset: number): Promise<BidDocument[]>;
  insertOpportunity(row: OpportunityRow): Promise<boolean>;
  close(): Promise<void>;
}
