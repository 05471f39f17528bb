/**
 * Robust Utility Functions for Provider Orchestration
 *
 * Provides utilities for:
 * - AbortController helpers for request timeouts
 * - Exponential backoff calculation
 * - Classifying HTTP statuses as transient or permanent
 *
 * @module robustUtils
 */

// ============================================================
// TIMEOUT UTILITIES
// ============================================================

/**
 * Creates an AbortController with automatic timeout.
 * Useful for fetch operations that need cancellation support.
 *
 * @example
 * const { signal, cleanup } = createTimeoutAbortController(30000);
 * try {
 *   await fetch(url, { signal });
 * } finally {
 *   cleanup();
 * }
 */
export function createTimeoutAbortController(ms: number): {
  controller: AbortController;
  signal: AbortSignal;
  cleanup: () => void;
} {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    const error = new Error(`Request timed out after ${ms}ms`);
    error.name = 'TimeoutError';
    controller.abort(error);
  }, ms);

  return {
    controller,
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timeoutId);
    },
  };
}

// ============================================================
// RETRY UTILITIES
// ============================================================

const MAX_BACKOFF_MS = 5 * 60 * 1000;

/**
 * Delay before retry number `attempt` (1-based), doubling each time and
 * capped at `maxMs`.
 */
export function computeBackoffMs(
  attempt: number,
  baseMs: number,
  maxMs: number = MAX_BACKOFF_MS
): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}

/**
 * Whether an HTTP status from a provider is worth retrying.
 * Rate limits, request timeouts and server errors are; other 4xx are not.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
