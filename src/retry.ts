/**
 * Scope Audit — Retry Utilities
 *
 * Exponential backoff with jitter for directory calls. Only transient failures
 * (timeouts, throttling, 5xx) are retried; everything else surfaces immediately.
 */

import type { AuditRetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<AuditRetryOptions>;

export const AUDIT_RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Error codes that are safe to retry.
 */
export const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "RequestTimeout",
  "ServiceUnavailable",
  "InternalServerError",
  "ServerBusy",
  "TooManyRequests",
  "OperationTimedOut",
  "GatewayTimeout",
  "ServiceTimeout",
  "RetryableError",
  "ThrottlingException",
  "RequestRateTooLarge",
]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "server busy",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "econnreset",
  "etimedout",
  "network error",
  "fetch failed",
];

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Determine whether a directory error is safe to retry.
 */
export function shouldRetryAuditError(error: unknown): boolean {
  if (error === null || typeof error !== "object") return false;
  if (error instanceof Error && error.name === "TransientRemoteError") return true;
  if (
    error instanceof Error &&
    (error.name === "PermanentRemoteError" || error.name === "ConfigurationError" || error.name === "AbortError")
  ) {
    return false;
  }

  const code = readField(error, "code") ?? readField(error, "Code");
  if (typeof code === "string" && RETRYABLE_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = readField(error, "statusCode") ?? readField(error, "status");
  if (typeof statusCode === "number") {
    if (statusCode === 429) return true;
    if (statusCode >= 500 && statusCode < 600) return true;
  }

  const message = readField(error, "message");
  if (typeof message === "string") {
    const lower = message.toLowerCase();
    for (const pattern of RETRYABLE_MESSAGE_PATTERNS) {
      if (lower.includes(pattern)) return true;
    }
  }

  return false;
}

/**
 * Extract the Retry-After header value from an error response (in ms).
 */
export function getRetryAfterMs(error: unknown): number | null {
  if (error === null || typeof error !== "object") return null;

  const headers = readField(error, "headers");
  if (headers === null || typeof headers !== "object") return null;

  const retryAfter = readField(headers, "retry-after") ?? readField(headers, "Retry-After");
  if (typeof retryAfter !== "string" && typeof retryAfter !== "number") return null;

  // Could be seconds (integer) or HTTP date
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(retryAfter);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

/**
 * Backoff delay for a failed attempt (1-based).
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

export function resolveRetryConfig(options?: AuditRetryOptions): RetryConfig {
  return {
    maxAttempts: options?.maxAttempts ?? AUDIT_RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? AUDIT_RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? AUDIT_RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? AUDIT_RETRY_DEFAULTS.jitterFactor,
  };
}

// =============================================================================
// Retry Execution
// =============================================================================

export function createAbortError(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && reason.name === "AbortError") return reason;
  const error = new Error(reason instanceof Error ? reason.message : "The operation was aborted");
  error.name = "AbortError";
  return error;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a directory call with retry logic. Aborting the signal stops further
 * attempts and rejects with an AbortError.
 */
export async function withAuditRetry<T>(
  fn: () => Promise<T>,
  options?: AuditRetryOptions,
  signal?: AbortSignal,
): Promise<T> {
  const config = resolveRetryConfig(options);

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (signal?.aborted) throw createAbortError(signal);
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryAuditError(error)) break;

      const retryAfterMs = getRetryAfterMs(error);
      const delayMs = retryAfterMs !== null
        ? Math.min(retryAfterMs, config.maxDelayMs)
        : computeBackoffDelay(attempt, config);

      await sleep(delayMs, signal);
    }
  }

  throw lastError;
}
