export type ErrorContext = Record<string, unknown>;

/**
 * Base class for every failure the pipeline raises on purpose. `code` is a
 * stable identifier for logs; `context` carries the identifiers needed to
 * find the failing unit of work again.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Missing credentials or prompt files. Fatal at startup. */
export class ConfigError extends PipelineError {
  readonly code = "CONFIG_ERROR";
}

/** Object storage read or write failed. */
export class StorageError extends PipelineError {
  readonly code = "STORAGE_ERROR";
}

/** Persistence call failed after the reconnect-and-retry. */
export class PersistenceError extends PipelineError {
  readonly code = "PERSISTENCE_ERROR";
}

export class CompletionError extends PipelineError {
  readonly code = "COMPLETION_ERROR";
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    message: string,
    details: { status?: number | null; retryable: boolean; context?: ErrorContext; cause?: unknown },
  ) {
    super(message, details.context, { cause: details.cause });
    this.status = details.status ?? null;
    this.retryable = details.retryable;
  }

  static isRetryableStatus(status: number): boolean {
    return status === 408 || status === 429 || status >= 500;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
