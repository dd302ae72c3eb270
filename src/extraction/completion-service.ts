import { CompletionError, describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { CompletionOptions, TextCompletionService } from "./types.js";

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

export interface ChatCompletionSettings extends CompletionOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
}

type FetchFn = typeof fetch;

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/**
 * OpenAI-compatible chat completions over fetch. One user message per call;
 * the response text is returned as-is.
 */
export class ChatCompletionService implements TextCompletionService {
  constructor(
    private readonly settings: ChatCompletionSettings,
    private readonly fetchImpl: FetchFn = fetch,
  ) {}

  async complete(prompt: string, options: Partial<CompletionOptions> = {}): Promise<string> {
    const maxOutputTokens = options.maxOutputTokens ?? this.settings.maxOutputTokens;
    const reasoningEffort = options.reasoningEffort ?? this.settings.reasoningEffort;
    const verbosity = options.verbosity ?? this.settings.verbosity;

    logger.info("Sending completion request", {
      model: this.settings.model,
      promptChars: prompt.length,
    });

    let res: Response;
    try {
      res = await this.fetchImpl(this.settings.apiUrl, {
        method: "POST",
        signal: AbortSignal.timeout(this.settings.timeoutMs),
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.settings.model,
          messages: [{ role: "user", content: prompt }],
          max_completion_tokens: maxOutputTokens,
          ...(reasoningEffort ? { reasoning_effort: reasoningEffort } : {}),
          ...(verbosity ? { verbosity } : {}),
        }),
      });
    } catch (err) {
      if (isAbort(err)) throw this.timedOut(err);
      throw new CompletionError(`Completion request failed: ${describeError(err)}`, {
        retryable: true,
        cause: err,
      });
    }

    if (!res.ok) {
      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        throw isAbort(err) ? this.timedOut(err) : err;
      }
      throw new CompletionError(`Completion API error (${res.status}): ${text.slice(0, 500)}`, {
        status: res.status,
        retryable: CompletionError.isRetryableStatus(res.status),
      });
    }

    let json: ChatCompletionResponse;
    try {
      json = (await res.json()) as ChatCompletionResponse;
    } catch (err) {
      if (isAbort(err)) throw this.timedOut(err);
      throw new CompletionError(`Completion response was not JSON: ${describeError(err)}`, {
        status: res.status,
        retryable: true,
        cause: err,
      });
    }

    const choice = json.choices?.[0];
    if (!choice) {
      throw new CompletionError("Completion response had no choices", {
        status: res.status,
        retryable: true,
      });
    }

    const content = choice.message?.content ?? "";
    logger.info("Received completion", {
      chars: content.length,
      finishReason: choice.finish_reason ?? null,
      ...(json.usage ? { usage: json.usage } : {}),
    });
    if (!content.trim()) {
      logger.warn("Completion content was empty", { finishReason: choice.finish_reason ?? null });
    }
    return content;
  }

  private timedOut(cause: unknown): CompletionError {
    return new CompletionError(`Completion request timed out after ${this.settings.timeoutMs}ms`, {
      retryable: true,
      cause,
    });
  }
}
