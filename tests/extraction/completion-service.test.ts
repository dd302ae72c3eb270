import { describe, it, expect } from "vitest";
import { ChatCompletionService, type ChatCompletionSettings } from "../../src/extraction/completion-service.js";
import { CompletionError } from "../../src/extraction/errors.js";

const settings: ChatCompletionSettings = {
  apiUrl: "https://completions.test/v1/chat/completions",
  apiKey: "test-secret",
  model: "test-model",
  maxOutputTokens: 8_000,
  timeoutMs: 30_000,
};

interface Captured {
  url: string;
  init: RequestInit | undefined;
}

function fakeFetch(respond: () => Response | Promise<Response>, captured: Captured[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), init });
    return respond();
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function completionError(promise: Promise<unknown>): Promise<CompletionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CompletionError) return err;
    throw err;
  }
  throw new Error("expected a CompletionError");
}

describe("ChatCompletionService", () => {
  it("posts one user message and returns the content", async () => {
    const captured: Captured[] = [];
    const service = new ChatCompletionService(
      { ...settings, reasoningEffort: "low" },
      fakeFetch(() => jsonResponse({ choices: [{ message: { content: "{}" }, finish_reason: "stop" }] }), captured),
    );

    await expect(service.complete("Find jobs.")).resolves.toBe("{}");

    expect(captured).toHaveLength(1);
    expect(captured[0]?.url).toBe(settings.apiUrl);
    expect(captured[0]?.init?.method).toBe("POST");
    expect(captured[0]?.init?.signal).toBeInstanceOf(AbortSignal);
    expect(captured[0]?.init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(String(captured[0]?.init?.body))).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Find jobs." }],
      max_completion_tokens: 8_000,
      reasoning_effort: "low",
    });
  });

  it("lets per-call options override the defaults", async () => {
    const captured: Captured[] = [];
    const service = new ChatCompletionService(
      settings,
      fakeFetch(() => jsonResponse({ choices: [{ message: { content: "ok" } }] }), captured),
    );
    await service.complete("p", { maxOutputTokens: 100, verbosity: "low" });
    expect(JSON.parse(String(captured[0]?.init?.body))).toMatchObject({
      max_completion_tokens: 100,
      verbosity: "low",
    });
  });

  it("returns an empty string for null content", async () => {
    const service = new ChatCompletionService(
      settings,
      fakeFetch(() => jsonResponse({ choices: [{ message: { content: null }, finish_reason: "length" }] })),
    );
    await expect(service.complete("p")).resolves.toBe("");
  });

  it("marks rate limits and server errors as retryable", async () => {
    const service = new ChatCompletionService(settings, fakeFetch(() => new Response("slow down", { status: 429 })));
    const err = await completionError(service.complete("p"));
    expect(err.message).toBe("Completion API error (429): slow down");
    expect(err.status).toBe(429);
    expect(err.retryable).toBe(true);
  });

  it("marks client errors as not retryable", async () => {
    const service = new ChatCompletionService(settings, fakeFetch(() => new Response("bad key", { status: 401 })));
    const err = await completionError(service.complete("p"));
    expect(err.status).toBe(401);
    expect(err.retryable).toBe(false);
  });

  it("wraps network failures as retryable", async () => {
    const service = new ChatCompletionService(
      settings,
      fakeFetch(() => {
        throw new TypeError("fetch failed");
      }),
    );
    const err = await completionError(service.complete("p"));
    expect(err.message).toBe("Completion request failed: fetch failed");
    expect(err.status).toBeNull();
    expect(err.retryable).toBe(true);
  });

  it("treats a response without choices as retryable", async () => {
    const service = new ChatCompletionService(settings, fakeFetch(() => jsonResponse({ choices: [] })));
    const err = await completionError(service.complete("p"));
    expect(err.message).toBe("Completion response had no choices");
    expect(err.retryable).toBe(true);
  });

  it("treats a body that is not JSON as retryable", async () => {
    const service = new ChatCompletionService(settings, fakeFetch(() => new Response("<html>", { status: 200 })));
    const err = await completionError(service.complete("p"));
    expect(err.retryable).toBe(true);
    expect(err.message.startsWith("Completion response was not JSON: ")).toBe(true);
  });

  it("aborts a stalled request and reports it as a retryable timeout", async () => {
    const stalled: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener("abort", () => reject(signal.reason));
      });
    const service = new ChatCompletionService({ ...settings, timeoutMs: 20 }, stalled);

    const err = await completionError(service.complete("p"));

    expect(err.message).toBe("Completion request timed out after 20ms");
    expect(err.retryable).toBe(true);
    expect(err.status).toBeNull();
  });
});
