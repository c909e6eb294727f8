import { describe, it, expect, vi } from "vitest";
import {
  backoffDelay,
  getRetryAfterMs,
  isTransientError,
  resolveRetryConfig,
  retryAsync,
  RETRY_DEFAULTS,
  toRetryConfig,
  type Clock,
} from "./retry.js";

function fakeClock(): { clock: Clock; sleeps: number[] } {
  const sleeps: number[] = [];
  let now = Date.parse("2026-01-01T00:00:00.000Z");
  return {
    sleeps,
    clock: {
      now: () => now,
      sleep: async (ms) => {
        sleeps.push(ms);
        now += ms;
      },
    },
  };
}

const throttled = () => Object.assign(new Error("Rate exceeded"), { name: "ThrottlingException" });

describe("retryAsync", () => {
  it("retries with exponential backoff until the call succeeds", async () => {
    const { clock, sleeps } = fakeClock();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockResolvedValue("ok");

    const result = await retryAsync(fn, { attempts: 4, minDelayMs: 100, maxDelayMs: 1000, jitter: 0, clock });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([100, 200]);
  });

  it("throws the last error once attempts are exhausted", async () => {
    const { clock, sleeps } = fakeClock();
    let calls = 0;
    const fn = vi.fn(async () => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    });

    await expect(retryAsync(fn, { attempts: 3, minDelayMs: 100, maxDelayMs: 1000, jitter: 0, clock })).rejects.toThrow(
      "failure 3",
    );
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it("caps the delay at maxDelayMs", async () => {
    const { clock, sleeps } = fakeClock();
    const fn = vi.fn(async () => {
      throw throttled();
    });

    await expect(retryAsync(fn, { attempts: 5, minDelayMs: 100, maxDelayMs: 250, jitter: 0, clock })).rejects.toThrow();
    expect(sleeps).toEqual([100, 200, 250, 250]);
  });

  it("stops immediately when shouldRetry rejects the error", async () => {
    const { clock, sleeps } = fakeClock();
    const fn = vi.fn(async () => {
      throw new Error("AccessDenied");
    });

    await expect(retryAsync(fn, { attempts: 4, clock, shouldRetry: () => false })).rejects.toThrow("AccessDenied");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it("honors a server-provided retry-after delay", async () => {
    const { clock, sleeps } = fakeClock();
    const fn = vi.fn<(attempt: number) => Promise<number>>().mockRejectedValueOnce(throttled()).mockResolvedValue(1);

    await retryAsync(fn, {
      attempts: 2,
      minDelayMs: 100,
      maxDelayMs: 10_000,
      jitter: 0,
      clock,
      retryAfterMs: () => 5000,
    });
    expect(sleeps).toEqual([5000]);
  });

  it("reports each retry through onRetry", async () => {
    const { clock } = fakeClock();
    const onRetry = vi.fn();
    const fn = vi.fn<(attempt: number) => Promise<number>>().mockRejectedValueOnce(throttled()).mockResolvedValue(1);

    await retryAsync(fn, { attempts: 3, minDelayMs: 50, maxDelayMs: 1000, jitter: 0, clock, label: "fetch", onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, maxAttempts: 3, delayMs: 50, label: "fetch" });
  });
});

describe("retry configuration", () => {
  it("counts retries after the first attempt", () => {
    expect(toRetryConfig({ maxRetries: 3, minDelayMs: 200, maxDelayMs: 30_000 }).attempts).toBe(4);
    expect(toRetryConfig({ maxRetries: 0, minDelayMs: 0, maxDelayMs: 0 }).attempts).toBe(1);
  });

  it("clamps out-of-range overrides", () => {
    expect(resolveRetryConfig(RETRY_DEFAULTS, { attempts: 0, minDelayMs: 500, maxDelayMs: 100, jitter: 3 })).toEqual({
      attempts: 1,
      minDelayMs: 500,
      maxDelayMs: 500,
      jitter: 1,
    });
  });

  it("doubles the backoff per attempt", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, 200, 1000))).toEqual([200, 400, 800, 1000]);
  });
});

describe("transient error classification", () => {
  it("treats throttling and 5xx responses as transient", () => {
    expect(isTransientError(throttled())).toBe(true);
    expect(isTransientError({ $metadata: { httpStatusCode: 503 } })).toBe(true);
    expect(isTransientError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe(true);
  });

  it("treats access errors as terminal", () => {
    expect(isTransientError(Object.assign(new Error("not authorized"), { name: "AccessDenied" }))).toBe(false);
    expect(isTransientError(undefined)).toBe(false);
  });

  it("reads retry-after from throttled responses only", () => {
    const response = { $response: { headers: { "retry-after": "3" } } };
    expect(getRetryAfterMs({ $metadata: { httpStatusCode: 429 }, ...response })).toBe(3000);
    expect(getRetryAfterMs({ $metadata: { httpStatusCode: 400 }, ...response })).toBeUndefined();
  });
});
