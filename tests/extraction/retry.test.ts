import { describe, it, expect, vi } from "vitest";
import { linearBackoffWithJitter, randomBetween, withRetry } from "../../src/extraction/retry.js";

describe("withRetry", () => {
  it("returns the first successful attempt", async () => {
    const sleeps: number[] = [];
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return "ok";
    });
    const result = await withRetry(fn, {
      attempts: 3,
      backoff: (attempt) => attempt * 100,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it("rethrows the last error once attempts run out", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error(`fail ${calls}`);
        },
        { attempts: 2, backoff: () => 0, sleep: async () => {} },
      ),
    ).rejects.toThrow("fail 2");
    expect(calls).toBe(2);
  });

  it("stops early when shouldRetry declines", async () => {
    const onRetry = vi.fn();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error("fatal");
        },
        { attempts: 5, shouldRetry: () => false, onRetry, sleep: async () => {} },
      ),
    ).rejects.toThrow("fatal");
    expect(calls).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it("reports each retry with its delay", async () => {
    const onRetry = vi.fn();
    await withRetry(
      async (attempt) => {
        if (attempt === 1) throw new Error("once");
        return attempt;
      },
      { attempts: 2, backoff: () => 42, onRetry, sleep: async () => {} },
    );
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
    expect(onRetry.mock.calls[0]?.[2]).toBe(42);
  });

  it("runs at least once when attempts is below one", async () => {
    await expect(withRetry(async () => "ran", { attempts: 0 })).resolves.toBe("ran");
  });
});

describe("linearBackoffWithJitter", () => {
  it("grows by the base per attempt and adds scaled jitter", () => {
    const backoff = linearBackoffWithJitter(5_000, 1_500, () => 0.5);
    expect(backoff(1)).toBe(5_750);
    expect(backoff(2)).toBe(10_750);
  });
});

describe("randomBetween", () => {
  it("picks whole seconds when both bounds are whole seconds", () => {
    expect(randomBetween(3_000, 8_000, () => 0)).toBe(3_000);
    expect(randomBetween(3_000, 8_000, () => 0.999)).toBe(8_000);
    expect(randomBetween(3_000, 8_000, () => 0.5)).toBe(6_000);
  });

  it("interpolates otherwise", () => {
    expect(randomBetween(100, 300, () => 0.25)).toBe(150);
  });

  it("tolerates swapped bounds", () => {
    expect(randomBetween(8_000, 3_000, () => 0)).toBe(3_000);
  });
});
