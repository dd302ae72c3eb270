import { BATCH_DEFAULTS } from "../extraction/config.js";
import { CancellationToken } from "../extraction/cancellation.js";
import { describeError } from "../extraction/errors.js";
import { logger } from "../extraction/logger.js";
import {
  linearBackoffWithJitter,
  randomBetween,
  sleep as realSleep,
  withRetry,
  type Sleep,
} from "../extraction/retry.js";
import { toRow } from "../extraction/row-mapper.js";
import type {
  BidDocument,
  BlobStore,
  ExtractionResult,
  Opportunity,
  OpportunityRepository,
} from "../extraction/types.js";
import { isValidS3Path, resolveS3Path } from "../storage/s3-path.js";

export interface DocumentExtractor {
  process(documentBytes: Uint8Array, prompt: string): Promise<ExtractionResult>;
}

export interface BatchSettings {
  batchSize: number;
  startOffset: number;
  docRetryAttempts: number;
  retryWaitMs: number;
  cooldownMinMs: number;
  cooldownMaxMs: number;
  burstPauseEvery: number;
  burstPauseMs: number;
  defaultBucket: string;
  defaultPrefix: string;
}

export const DEFAULT_BATCH_SETTINGS: BatchSettings = {
  batchSize: BATCH_DEFAULTS.batchSize,
  startOffset: BATCH_DEFAULTS.startOffset,
  docRetryAttempts: BATCH_DEFAULTS.docRetryAttempts,
  retryWaitMs: BATCH_DEFAULTS.retryWaitSeconds * 1000,
  cooldownMinMs: BATCH_DEFAULTS.cooldownMinSeconds * 1000,
  cooldownMaxMs: BATCH_DEFAULTS.cooldownMaxSeconds * 1000,
  burstPauseEvery: BATCH_DEFAULTS.burstPauseEvery,
  burstPauseMs: BATCH_DEFAULTS.burstPauseSeconds * 1000,
  defaultBucket: BATCH_DEFAULTS.defaultBucket,
  defaultPrefix: BATCH_DEFAULTS.defaultPrefix,
};

export interface ProcessorDeps {
  repository: OpportunityRepository;
  blobStore: BlobStore;
  extractor: DocumentExtractor;
  prompt: string;
  settings?: Partial<BatchSettings>;
  cancellation?: CancellationToken;
  sleep?: Sleep;
  random?: () => number;
}

export interface RunOptions {
  offset?: number;
  batchSize?: number;
  maxProjects?: number;
}

export interface RunSummary {
  batches: number;
  processedProjects: number;
  insertedOpportunities: number;
  failedInserts: number;
  /** Documents that failed on the initial pass. */
  failedDocuments: number;
  recoveredOnRetry: number;
  skippedDocuments: number;
  cancelled: boolean;
}

/**
 * Pages through bid documents and turns each unprocessed one into
 * opportunity rows. One document at a time; pacing sleeps between documents
 * keep the completion service under its rate limits.
 */
export class BidDocumentProcessor {
  private readonly settings: BatchSettings;
  private readonly cancellation: CancellationToken;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private lastBurstPauseAt = 0;

  constructor(private readonly deps: ProcessorDeps) {
    this.settings = { ...DEFAULT_BATCH_SETTINGS, ...deps.settings };
    this.cancellation = deps.cancellation ?? new CancellationToken();
    this.sleep = deps.sleep ?? realSleep;
    this.random = deps.random ?? Math.random;
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const batchSize = options.batchSize ?? this.settings.batchSize;
    const maxProjects = options.maxProjects;
    let offset = options.offset ?? this.settings.startOffset;
    this.lastBurstPauseAt = 0;

    const summary: RunSummary = {
      batches: 0,
      processedProjects: 0,
      insertedOpportunities: 0,
      failedInserts: 0,
      failedDocuments: 0,
      recoveredOnRetry: 0,
      skippedDocuments: 0,
      cancelled: false,
    };
    const limitReached = () =>
      maxProjects !== undefined && summary.processedProjects >= maxProjects;

    while (!this.cancellation.cancelled && !limitReached()) {
      const docs = await this.deps.repository.fetchBidDocuments(batchSize, offset);
      if (docs.length === 0) {
        logger.info("No more documents to process");
        break;
      }

      summary.batches++;
      const batchNo = summary.batches;
      logger.info("Processing batch", { batch: batchNo, documents: docs.length, offset });

      const existing = await this.existingProjectKeys();
      const fresh = docs.filter((d) => isValidS3Path(d.s3Path) && !existing.has(d.projectId));
      summary.skippedDocuments += docs.length - fresh.length;

      if (fresh.length === 0) {
        logger.info("All documents in batch already processed", { batch: batchNo });
        offset += batchSize;
        continue;
      }

      const failed: BidDocument[] = [];
      for (const doc of fresh) {
        if (this.cancellation.cancelled || limitReached()) break;
        await this.maybeBurstPause(summary.processedProjects);

        try {
          const opportunities = await this.extractWithRetry(doc);
          await this.store(doc, opportunities, summary);
          summary.processedProjects++;
          await this.cooldown();
        } catch (err) {
          summary.failedDocuments++;
          failed.push(doc);
          logger.error("Error processing document", {
            projectId: doc.projectId,
            documentId: doc.id,
            error: describeError(err),
          });
        }
      }

      if (failed.length > 0 && !this.cancellation.cancelled && !limitReached()) {
        await this.retryPass(failed, summary, limitReached);
      }

      offset += batchSize;
    }

    if (limitReached()) logger.info("Reached max projects; stopping", { maxProjects });
    summary.cancelled = this.cancellation.cancelled;
    if (summary.cancelled) {
      logger.info("Stopped on request", { reason: this.cancellation.reason });
    }

    logger.info("Run complete", { ...summary });
    return summary;
  }

  private async retryPass(
    failed: BidDocument[],
    summary: RunSummary,
    limitReached: () => boolean,
  ): Promise<void> {
    logger.info("Retrying failed documents after cooldown", {
      documents: failed.length,
      waitMs: this.settings.retryWaitMs,
    });
    await this.sleep(this.settings.retryWaitMs);

    for (const doc of failed) {
      if (this.cancellation.cancelled || limitReached()) break;
      try {
        const opportunities = await this.extractWithRetry(doc);
        await this.store(doc, opportunities, summary);
        summary.processedProjects++;
        summary.recoveredOnRetry++;
        await this.cooldown();
      } catch (err) {
        logger.error("Final retry failed", {
          projectId: doc.projectId,
          documentId: doc.id,
          error: describeError(err),
        });
      }
    }
  }

  private async existingProjectKeys(): Promise<Set<number>> {
    try {
      return await this.deps.repository.existingProjectKeys();
    } catch (err) {
      logger.warn("Could not load processed projects; treating all as new", {
        error: describeError(err),
      });
      return new Set();
    }
  }

  private extractWithRetry(doc: BidDocument): Promise<Opportunity[]> {
    return withRetry(
      async () => {
        const location = resolveS3Path(doc.s3Path ?? "", {
          bucket: this.settings.defaultBucket,
          prefix: this.settings.defaultPrefix,
        });
        const bytes = await this.deps.blobStore.get(location.bucket, location.key);
        const result = await this.deps.extractor.process(bytes, this.deps.prompt);
        return result.instrumentation_opportunities;
      },
      {
        attempts: this.settings.docRetryAttempts,
        backoff: linearBackoffWithJitter(5_000, 1_500, this.random),
        sleep: this.sleep,
        onRetry: (err, attempt) => {
          logger.warn("Document attempt failed", {
            projectId: doc.projectId,
            attempt,
            attempts: this.settings.docRetryAttempts,
            error: describeError(err),
          });
        },
      },
    );
  }

  private async store(doc: BidDocument, opportunities: Opportunity[], summary: RunSummary): Promise<void> {
    let inserted = 0;
    for (const opp of opportunities) {
      const row = toRow(doc.projectId, opp);
      if (await this.deps.repository.insertOpportunity(row)) {
        inserted++;
      } else {
        summary.failedInserts++;
      }
    }
    summary.insertedOpportunities += inserted;

    if (inserted === 0) {
      logger.info("No opportunities inserted for project", { projectId: doc.projectId });
    } else {
      logger.info("Inserted opportunities", { projectId: doc.projectId, inserted });
    }
  }

  private async maybeBurstPause(processed: number): Promise<void> {
    const every = this.settings.burstPauseEvery;
    if (every <= 0 || processed === 0 || processed % every !== 0) return;
    if (processed === this.lastBurstPauseAt) return;
    this.lastBurstPauseAt = processed;
    logger.info("Burst pause", { afterProjects: processed, pauseMs: this.settings.burstPauseMs });
    await this.sleep(this.settings.burstPauseMs);
  }

  private async cooldown(): Promise<void> {
    const ms = randomBetween(this.settings.cooldownMinMs, this.settings.cooldownMaxMs, this.random);
    logger.info("Cooling down", { ms });
    await this.sleep(ms);
  }
}
