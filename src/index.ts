#!/usr/bin/env node
import "dotenv/config";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { BidDocumentProcessor } from "./batch/bid-document-processor.js";
import { CancellationToken } from "./extraction/cancellation.js";
import { ChatCompletionService } from "./extraction/completion-service.js";
import { loadConfig, requireSetting, type AppConfig } from "./extraction/config.js";
import { ConfigError, describeError } from "./extraction/errors.js";
import { configureLogger, logger } from "./extraction/logger.js";
import { createMerger } from "./extraction/merging/index.js";
import { ExtractionOrchestrator } from "./extraction/orchestrator.js";
import { loadMergePrompt, loadPrompt } from "./extraction/prompts.js";
import { createS3Client, S3BlobStore } from "./storage/blob-store.js";
import { PostgresOpportunityRepository } from "./storage/repository.js";
import { resolveS3Path } from "./storage/s3-path.js";

// ── Wiring ──────────────────────────────────────────────────────────────────
async function buildOrchestrator(config: AppConfig): Promise<ExtractionOrchestrator> {
  const completion = new ChatCompletionService({
    apiUrl: config.completion.apiUrl,
    apiKey: requireSetting(config.completion.apiKey, "COMPLETION_API_KEY"),
    model: config.completion.model,
    maxOutputTokens: config.completion.maxOutputTokens,
    timeoutMs: config.completion.timeoutMs,
    reasoningEffort: config.completion.reasoningEffort,
    verbosity: config.completion.verbosity,
  });

  const mergePrompt =
    config.extraction.mergeStrategy === "model"
      ? await loadMergePrompt(config.prompts.mergePromptFile)
      : null;

  return new ExtractionOrchestrator({
    completion,
    merger: createMerger(config.extraction.mergeStrategy, { completion, mergePrompt }),
    settings: config.extraction,
  });
}

function createBlobStore(config: AppConfig): S3BlobStore {
  return new S3BlobStore(
    createS3Client({ region: config.storage.region, endpoint: config.storage.endpoint }),
  );
}

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function setup(): AppConfig {
  const config = loadConfig();
  configureLogger({ level: config.logLevel, file: config.logFile });
  return config;
}

// ── Commands ────────────────────────────────────────────────────────────────
async function runBatch(opts: { offset?: number; batchSize?: number; maxProjects?: number }): Promise<void> {
  const config = setup();
  const prompt = await loadPrompt(config.prompts.promptFiles);
  const orchestrator = await buildOrchestrator(config);
  const repository = PostgresOpportunityRepository.fromUrl(
    requireSetting(config.databaseUrl, "DATABASE_URL"),
  );

  const cancellation = new CancellationToken();
  const onSignal = (signal: NodeJS.Signals) => {
    if (cancellation.cancelled) return;
    logger.info("Received stop signal; finishing current document then exiting", { signal });
    cancellation.cancel(signal);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const processor = new BidDocumentProcessor({
    repository,
    blobStore: createBlobStore(config),
    extractor: orchestrator,
    prompt,
    cancellation,
    settings: {
      ...config.batch,
      defaultBucket: config.storage.defaultBucket,
      defaultPrefix: config.storage.defaultPrefix,
    },
  });

  try {
    await processor.run(opts);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await repository.close();
  }
}

async function extractLocal(file: string, opts: { prompt?: string }): Promise<void> {
  const config = setup();
  const prompt = await loadPrompt(opts.prompt ? [opts.prompt] : config.prompts.promptFiles);
  const orchestrator = await buildOrchestrator(config);

  const bytes = await readFile(file);
  logger.info("Processing local file", { file });
  const result = await orchestrator.process(new Uint8Array(bytes), prompt);
  process.stdout.write(JSON.stringify(result, null, 2) + "\n");
}

async function uploadLocal(file: string, opts: { bucket?: string; key?: string }): Promise<void> {
  const config = setup();
  const location = resolveS3Path(opts.key ?? path.basename(file), {
    bucket: opts.bucket ?? config.storage.defaultBucket,
    prefix: opts.key ? "" : config.storage.defaultPrefix,
  });
  const bytes = await readFile(file);
  const stored = await createBlobStore(config).put(
    location.bucket,
    location.key,
    new Uint8Array(bytes),
    "application/pdf",
  );
  process.stdout.write(stored + "\n");
}

// ── CLI ─────────────────────────────────────────────────────────────────────
const program = new Command()
  .name("bid-extract")
  .description("Extract instrumentation opportunities from bid documents");

program
  .command("run")
  .description("Process stored bid documents in batches")
  .option("--offset <n>", "starting offset into bid_documents", parseCount)
  .option("--batch-size <n>", "documents per page", parseCount)
  .option("--max-projects <n>", "stop after processing this many projects", parseCount)
  .action(runBatch);

program
  .command("extract")
  .description("Run extraction on a local PDF and print the result as JSON")
  .argument("<file>", "path to a PDF")
  .option("--prompt <path>", "prompt file to use instead of the configured one")
  .action(extractLocal);

program
  .command("upload")
  .description("Put a local PDF into object storage")
  .argument("<file>", "path to a PDF")
  .option("--bucket <name>", "target bucket")
  .option("--key <key>", "object key (defaults to the file name under the default prefix)")
  .action(uploadLocal);

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error(`Configuration error: ${err.message}`);
  } else {
    logger.error(`Fatal: ${describeError(err)}`, err instanceof Error ? { stack: err.stack } : {});
  }
  process.exitCode = 1;
});
