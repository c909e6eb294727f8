/**
 * Retry Runner
 *
 * Bounded retry with exponential backoff for provider calls. Time is taken
 * from an injectable `Clock`, so tests can run backoff schedules without
 * real delays.
 */

import { formatErrorMessage } from "./errors.js";

// =============================================================================
// Clock
// =============================================================================

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export function isoNow(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

export type RetryOptions = RetryConfig & {
  label?: string;
  clock?: Clock;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  retryAfterMs?: (err: unknown) => number | undefined;
  onRetry?: (info: RetryInfo) => void;
};

export const RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 4,
  minDelayMs: 200,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

/** Config files speak in retries after the first attempt. */
export type BackoffSettings = {
  maxRetries: number;
  minDelayMs: number;
  maxDelayMs: number;
  jitter?: number;
};

export function toRetryConfig(settings: BackoffSettings): RetryConfig {
  return {
    attempts: settings.maxRetries + 1,
    minDelayMs: settings.minDelayMs,
    maxDelayMs: settings.maxDelayMs,
    jitter: settings.jitter,
  };
}

export function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig,
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/** Delay before retry number `attempt` (1-based), before jitter. */
export function backoffDelay(attempt: number, minDelayMs: number, maxDelayMs: number): number {
  return Math.min(minDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

// =============================================================================
// Runner
// =============================================================================

export async function retryAsync<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts: maxAttempts, minDelayMs, maxDelayMs, jitter } = resolveRetryConfig(RETRY_DEFAULTS, options);
  const clock = options.clock ?? systemClock;
  const shouldRetry = options.shouldRetry ?? (() => true);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) break;

      const retryAfterMs = options.retryAfterMs?.(err);
      const hasRetryAfter = typeof retryAfterMs === "number" && Number.isFinite(retryAfterMs);
      const baseDelay = hasRetryAfter ? Math.max(retryAfterMs, minDelayMs) : backoffDelay(attempt, minDelayMs, maxDelayMs);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry?.({ attempt, maxAttempts, delayMs: delay, err, label: options.label });
      await clock.sleep(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

// =============================================================================
// Transient error classification
// =============================================================================

/**
 * Pattern matching throttling and transient errors
 */
const TRANSIENT_PATTERN =
  /throttl|rate exceeded|503|504|timeout|timed out|unreachable|ECONNRESET|ETIMEDOUT|ECONNREFUSED|TooManyRequestsException|ServiceUnavailable|RequestLimitExceeded|SlowDown/i;

/**
 * Error codes that should always be retried
 */
const TRANSIENT_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "ServiceFailure",
  "InternalError",
  "InternalServiceError",
  "InternalServerError",
  "SlowDown",
  "EC2ThrottledException",
  "RequestThrottled",
  "RequestTimeout",
  "PriorRequestNotComplete",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
]);

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

function httpStatusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

/**
 * Extract retry-after delay from an SDK v3 error response
 */
export function getRetryAfterMs(err: unknown): number | undefined {
  const status = httpStatusOf(err);
  if (status !== 429 && status !== 503) return undefined;
  if (!err || typeof err !== "object" || !("$response" in err)) return undefined;
  const response = err.$response;
  if (!response || typeof response !== "object" || !("headers" in response)) return undefined;
  const headers = response.headers;
  if (!headers || typeof headers !== "object" || !("retry-after" in headers)) return undefined;
  const retryAfter = headers["retry-after"];
  if (typeof retryAfter !== "string") return undefined;
  const seconds = Number.parseInt(retryAfter, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Determine whether a provider error is worth retrying
 */
export function isTransientError(err: unknown): boolean {
  if (!err) return false;

  const code = extractErrorCode(err);
  if (code && TRANSIENT_CODES.has(code)) return true;

  if (err instanceof Error && TRANSIENT_CODES.has(err.name)) return true;

  const statusCode = httpStatusOf(err);
  if (statusCode === 429 || statusCode === 500 || statusCode === 502 || statusCode === 503 || statusCode === 504) {
    return true;
  }

  return TRANSIENT_PATTERN.test(formatErrorMessage(err));
}
