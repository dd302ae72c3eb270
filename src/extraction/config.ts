import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const MIB = 1024 * 1024;

export const EXTRACTION_DEFAULTS = {
  maxChunkBytes: 25 * MIB,

  maxCallChars: 60_000,
  segmentMinChars: 1_500,
  segmentOverlapChars: 400,
  segmentBacktrackChars: 1_200,
  maxSegments: 50,

  completionAttempts: 2,
  completionModel: "gpt-5-mini",
  completionApiUrl: "https://api.openai.com/v1/chat/completions",
  completionMaxTokens: 8_000,
  completionTimeoutSeconds: 300,

  mergeStrategy: "key",
  promptFiles: ["prompts/bid_spec_prompt.txt", "prompts/bid_spec_prompt.tx"],
  mergePromptFile: "prompts/spec_merge_prompt.txt",
} as const;

export const BATCH_DEFAULTS = {
  batchSize: 100,
  startOffset: 0,
  docRetryAttempts: 2,
  retryWaitSeconds: 60,
  cooldownMinSeconds: 3,
  cooldownMaxSeconds: 8,
  burstPauseEvery: 15,
  burstPauseSeconds: 20,
  defaultBucket: "bid-documents",
  defaultPrefix: "all/",
} as const;

const int = (fallback: number) =>
  z.coerce.number().int().default(fallback);

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  LOG_FILE: optionalText,

  PDF_MAX_CHARS: positiveInt(EXTRACTION_DEFAULTS.maxCallChars),
  MAX_CHUNK_MB: z.coerce.number().positive().default(EXTRACTION_DEFAULTS.maxChunkBytes / MIB),
  SEGMENT_MIN_CHARS: int(EXTRACTION_DEFAULTS.segmentMinChars).pipe(z.number().nonnegative()),
  SEGMENT_OVERLAP_CHARS: int(EXTRACTION_DEFAULTS.segmentOverlapChars).pipe(z.number().nonnegative()),
  SEGMENT_BACKTRACK_CHARS: int(EXTRACTION_DEFAULTS.segmentBacktrackChars).pipe(z.number().nonnegative()),
  MAX_SEGMENTS: positiveInt(EXTRACTION_DEFAULTS.maxSegments),
  COMPLETION_ATTEMPTS: positiveInt(EXTRACTION_DEFAULTS.completionAttempts),
  MERGE_STRATEGY: z.enum(["key", "model"]).default(EXTRACTION_DEFAULTS.mergeStrategy),

  COMPLETION_API_KEY: optionalText,
  COMPLETION_API_URL: z.string().url().default(EXTRACTION_DEFAULTS.completionApiUrl),
  COMPLETION_MODEL: z.string().min(1).default(EXTRACTION_DEFAULTS.completionModel),
  COMPLETION_MAX_TOKENS: positiveInt(EXTRACTION_DEFAULTS.completionMaxTokens),
  COMPLETION_TIMEOUT_SECONDS: positiveInt(EXTRACTION_DEFAULTS.completionTimeoutSeconds),
  COMPLETION_REASONING_EFFORT: z.enum(["minimal", "low", "medium", "high"]).optional(),
  COMPLETION_VERBOSITY: z.enum(["low", "medium", "high"]).optional(),
  PROMPT_FILE: optionalText,
  MERGE_PROMPT_FILE: optionalText,

  DATABASE_URL: optionalText,
  AWS_REGION: z.string().default("us-east-1"),
  S3_ENDPOINT: optionalText,
  DEFAULT_S3_BUCKET: z.string().min(1).default(BATCH_DEFAULTS.defaultBucket),
  DEFAULT_S3_PREFIX: z.string().default(BATCH_DEFAULTS.defaultPrefix),

  BATCH_SIZE: positiveInt(BATCH_DEFAULTS.batchSize),
  START_OFFSET: int(BATCH_DEFAULTS.startOffset).pipe(z.number().nonnegative()),
  DOC_RETRY_ATTEMPTS: positiveInt(BATCH_DEFAULTS.docRetryAttempts),
  RETRY_WAIT: int(BATCH_DEFAULTS.retryWaitSeconds).pipe(z.number().nonnegative()),
  COOLDOWN_MIN: int(BATCH_DEFAULTS.cooldownMinSeconds),
  COOLDOWN_MAX: int(BATCH_DEFAULTS.cooldownMaxSeconds),
  BURST_PAUSE_EVERY: int(BATCH_DEFAULTS.burstPauseEvery).pipe(z.number().nonnegative()),
  BURST_PAUSE_SECONDS: int(BATCH_DEFAULTS.burstPauseSeconds).pipe(z.number().nonnegative()),
});

export type MergeStrategyName = z.infer<typeof envSchema>["MERGE_STRATEGY"];

export interface AppConfig {
  logLevel: "error" | "warn" | "info" | "debug";
  logFile?: string;
  extraction: {
    maxChunkBytes: number;
    maxCallChars: number;
    segmentMinChars: number;
    segmentOverlapChars: number;
    segmentBacktrackChars: number;
    maxSegments: number;
    completionAttempts: number;
    mergeStrategy: MergeStrategyName;
  };
  completion: {
    apiKey?: string;
    apiUrl: string;
    model: string;
    maxOutputTokens: number;
    /** Deadline for one completion request, body included. */
    timeoutMs: number;
    reasoningEffort?: "minimal" | "low" | "medium" | "high";
    verbosity?: "low" | "medium" | "high";
  };
  prompts: {
    promptFiles: string[];
    mergePromptFile: string;
  };
  storage: {
    region: string;
    endpoint?: string;
    defaultBucket: string;
    defaultPrefix: string;
  };
  databaseUrl?: string;
  batch: {
    batchSize: number;
    startOffset: number;
    docRetryAttempts: number;
    retryWaitMs: number;
    cooldownMinMs: number;
    cooldownMaxMs: number;
    burstPauseEvery: number;
    burstPauseMs: number;
  };
}

/**
 * Validates the environment and folds it into the nested config the rest of
 * the code reads. Every problem is reported in a single ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigError(`Environment validation failed:\n${problems.join("\n")}`, {
      variables: result.error.issues.map((issue) => issue.path.join(".")),
    });
  }

  const e = result.data;
  const cooldownMin = Math.max(0, e.COOLDOWN_MIN);
  const cooldownMax = Math.max(cooldownMin, e.COOLDOWN_MAX);

  return {
    logLevel: e.LOG_LEVEL,
    logFile: e.LOG_FILE,
    extraction: {
      maxChunkBytes: Math.floor(e.MAX_CHUNK_MB * MIB),
      maxCallChars: e.PDF_MAX_CHARS,
      segmentMinChars: e.SEGMENT_MIN_CHARS,
      segmentOverlapChars: e.SEGMENT_OVERLAP_CHARS,
      segmentBacktrackChars: e.SEGMENT_BACKTRACK_CHARS,
      maxSegments: e.MAX_SEGMENTS,
      completionAttempts: e.COMPLETION_ATTEMPTS,
      mergeStrategy: e.MERGE_STRATEGY,
    },
    completion: {
      apiKey: e.COMPLETION_API_KEY,
      apiUrl: e.COMPLETION_API_URL,
      model: e.COMPLETION_MODEL,
      maxOutputTokens: e.COMPLETION_MAX_TOKENS,
      timeoutMs: e.COMPLETION_TIMEOUT_SECONDS * 1000,
      reasoningEffort: e.COMPLETION_REASONING_EFFORT,
      verbosity: e.COMPLETION_VERBOSITY,
    },
    prompts: {
      promptFiles: e.PROMPT_FILE
        ? [e.PROMPT_FILE, ...EXTRACTION_DEFAULTS.promptFiles]
        : [...EXTRACTION_DEFAULTS.promptFiles],
      mergePromptFile: e.MERGE_PROMPT_FILE ?? EXTRACTION_DEFAULTS.mergePromptFile,
    },
    storage: {
      region: e.AWS_REGION,
      endpoint: e.S3_ENDPOINT,
      defaultBucket: e.DEFAULT_S3_BUCKET,
      defaultPrefix: e.DEFAULT_S3_PREFIX,
    },
    databaseUrl: e.DATABASE_URL,
    batch: {
      batchSize: e.BATCH_SIZE,
      startOffset: e.START_OFFSET,
      docRetryAttempts: e.DOC_RETRY_ATTEMPTS,
      retryWaitMs: e.RETRY_WAIT * 1000,
      cooldownMinMs: cooldownMin * 1000,
      cooldownMaxMs: cooldownMax * 1000,
      burstPauseEvery: e.BURST_PAUSE_EVERY,
      burstPauseMs: e.BURST_PAUSE_SECONDS * 1000,
    },
  };
}

/** Throws unless the named credential is present. */
export function requireSetting<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new ConfigError(`${name} environment variable is required.`, { variable: name });
  }
  return value;
}

export function resolveFromCwd(file: string): string {
  return path.isAbsolute(file) ? file : path.resolve(file);
}
