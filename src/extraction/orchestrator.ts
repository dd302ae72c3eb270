import { EXTRACTION_DEFAULTS } from "./config.js";
import { CompletionError, describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { ResultMerger } from "./merging/index.js";
import { opportunitiesOf, parseOpportunities } from "./opportunity-parser.js";
import { extractChunkText } from "./pdf-extractor.js";
import { splitPdf } from "./pdf-splitter.js";
import { linearBackoffWithJitter, withRetry, type Sleep } from "./retry.js";
import { segmentText } from "./sentence-segmenter.js";
import type {
  ChunkReport,
  DocumentChunk,
  ExtractionResult,
  Opportunity,
  TextCompletionService,
} from "./types.js";

export interface ExtractionSettings {
  maxChunkBytes: number;
  /** Chunk text up to this length goes to the model in one call. */
  maxCallChars: number;
  segmentMinChars: number;
  segmentOverlapChars: number;
  segmentBacktrackChars: number;
  maxSegments: number;
  completionAttempts: number;
}

export const DEFAULT_EXTRACTION_SETTINGS: ExtractionSettings = {
  maxChunkBytes: EXTRACTION_DEFAULTS.maxChunkBytes,
  maxCallChars: EXTRACTION_DEFAULTS.maxCallChars,
  segmentMinChars: EXTRACTION_DEFAULTS.segmentMinChars,
  segmentOverlapChars: EXTRACTION_DEFAULTS.segmentOverlapChars,
  segmentBacktrackChars: EXTRACTION_DEFAULTS.segmentBacktrackChars,
  maxSegments: EXTRACTION_DEFAULTS.maxSegments,
  completionAttempts: EXTRACTION_DEFAULTS.completionAttempts,
};

export interface OrchestratorDeps {
  completion: TextCompletionService;
  merger: ResultMerger;
  settings?: Partial<ExtractionSettings>;
  split?: (bytes: Uint8Array, maxChunkBytes: number) => Promise<DocumentChunk[]>;
  extractText?: (chunk: DocumentChunk) => Promise<string>;
  backoff?: (attempt: number) => number;
  sleep?: Sleep;
}

export function buildPrompt(prompt: string, text: string, header?: string): string {
  const headerPart = header ? `\n\n[${header}]` : "";
  return `${prompt}${headerPart}\n\n--- BEGIN FILE CONTENT ---\n${text}\n--- END FILE CONTENT ---`;
}

/**
 * Runs one source document through split → extract → segment → model → merge.
 * Holds no per-document state, so a single instance serves a whole batch.
 */
export class ExtractionOrchestrator {
  readonly settings: ExtractionSettings;
  private readonly completion: TextCompletionService;
  private readonly merger: ResultMerger;
  private readonly split: (bytes: Uint8Array, maxChunkBytes: number) => Promise<DocumentChunk[]>;
  private readonly extractText: (chunk: DocumentChunk) => Promise<string>;
  private readonly backoff: (attempt: number) => number;
  private readonly sleep: Sleep | undefined;

  constructor(deps: OrchestratorDeps) {
    this.settings = { ...DEFAULT_EXTRACTION_SETTINGS, ...deps.settings };
    this.completion = deps.completion;
    this.merger = deps.merger;
    this.split = deps.split ?? splitPdf;
    this.extractText = deps.extractText ?? extractChunkText;
    this.backoff = deps.backoff ?? linearBackoffWithJitter();
    this.sleep = deps.sleep;
  }

  async process(documentBytes: Uint8Array, prompt: string): Promise<ExtractionResult> {
    logger.info("Processing document", { bytes: documentBytes.byteLength });
    const chunks = await this.split(documentBytes, this.settings.maxChunkBytes);

    const chunkResults: Opportunity[][] = [];
    const reports: ChunkReport[] = [];

    for (const chunk of chunks) {
      const { opportunities, report } = await this.processChunk(chunk, chunks.length, prompt);
      chunkResults.push(opportunities);
      reports.push(report);
    }

    let final: Opportunity[];
    if (chunkResults.length === 1) {
      final = chunkResults[0] ?? [];
    } else {
      logger.info("Combining chunk results", { chunks: chunkResults.length, strategy: this.merger.name });
      final = await this.merger.merge(chunkResults);
    }

    logger.info("Document processed", { chunks: chunks.length, opportunities: final.length });
    return { instrumentation_opportunities: final, chunks: reports };
  }

  private async processChunk(
    chunk: DocumentChunk,
    totalChunks: number,
    prompt: string,
  ): Promise<{ opportunities: Opportunity[]; report: ChunkReport }> {
    const chunkNo = chunk.index + 1;
    const text = await this.extractText(chunk);
    const report: ChunkReport = {
      chunk: chunkNo,
      pages: [chunk.startPage + 1, chunk.endPage],
      textLength: text.length,
      segments: 1,
      truncated: false,
      droppedChars: 0,
      opportunities: 0,
    };

    if (text.length <= this.settings.maxCallChars) {
      logger.info("Sending chunk to model", { chunk: chunkNo, totalChunks, chars: text.length });
      const response = await this.callModel(buildPrompt(prompt, text), `chunk ${chunkNo}/${totalChunks}`);
      const opportunities = this.parse(response, `chunk ${chunkNo}/${totalChunks}`);
      report.opportunities = opportunities.length;
      return { opportunities, report };
    }

    const { segments, truncated, droppedChars } = segmentText(text, {
      maxChars: this.settings.maxCallChars,
      minChars: this.settings.segmentMinChars,
      overlapChars: this.settings.segmentOverlapChars,
      maxSegments: this.settings.maxSegments,
      backtrackChars: this.settings.segmentBacktrackChars,
    });
    report.segments = segments.length;
    report.truncated = truncated;
    report.droppedChars = droppedChars;
    logger.info("Chunk text segmented", { chunk: chunkNo, chars: text.length, segments: segments.length });

    const segmentResults: Opportunity[][] = [];
    for (const segment of segments) {
      const label = `segment ${segment.ordinal}/${segment.total} for chunk ${chunkNo}/${totalChunks}`;
      const response = await this.callModel(buildPrompt(prompt, segment.text, label), label);
      segmentResults.push(this.parse(response, label));
    }

    const opportunities = await this.merger.merge(segmentResults);
    report.opportunities = opportunities.length;
    return { opportunities, report };
  }

  private callModel(fullPrompt: string, label: string): Promise<string> {
    return withRetry(() => this.completion.complete(fullPrompt), {
      attempts: this.settings.completionAttempts,
      backoff: this.backoff,
      sleep: this.sleep,
      shouldRetry: (err) => !(err instanceof CompletionError) || err.retryable,
      onRetry: (err, attempt, delayMs) => {
        logger.warn("Completion call failed; retrying", {
          call: label,
          attempt,
          attempts: this.settings.completionAttempts,
          delayMs: Math.round(delayMs),
          error: describeError(err),
        });
      },
    });
  }

  private parse(response: string, label: string): Opportunity[] {
    const result = parseOpportunities(response);
    if (result.kind === "empty") {
      logger.warn("No opportunities parsed from model response", { call: label, reason: result.reason });
    }
    return opportunitiesOf(result);
  }
}
