/**
 * Retry with exponential backoff.
 *
 * Generic retry utility for transient RPC failures. Used by the anchor
 * publisher and the confirmation watcher.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

import { CircuitOpenError } from "./circuit-breaker.js";

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 5 */
  readonly maxAttempts: number;
  /** Base delay in ms before first retry. Default: 1000 */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries. Default: 30000 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 200 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 200,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Called before each backoff sleep.
 */
export type RetryListener = (attempt: number, err: unknown, delayMs: number) => void;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Compute the delay before the next retry attempt.
 *
 * @param attempt - Zero-based attempt index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Execute a function with retry on failure.
 *
 * @param shouldRetry - Predicate to determine if an error is retryable (default: all errors)
 * @param sleepFn - Sleep function (injectable for testing)
 * @param onRetry - Invoked before each backoff sleep
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
  onRetry?: RetryListener,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      // Last attempt: no sleep, fall through to throw
      if (attempt < config.maxAttempts - 1) {
        const delay = computeDelay(attempt, config);
        onRetry?.(attempt + 1, err, delay);
        await sleepFn(delay);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}

/**
 * Default RPC retry predicate.
 *
 * Returns true for transient/network errors that may succeed on retry.
 * Returns false for permanent errors (reverts, bad signer, open breaker).
 */
export function isRetryableRpcError(err: unknown): boolean {
  if (err instanceof CircuitOpenError) return false;
  if (!(err instanceof Error)) return true;

  const msg = err.message.toLowerCase();

  const permanentPatterns = [
    "execution reverted",
    "insufficient funds",
    "invalid private key",
    "nonce too low",
    "invalid params",
  ];

  for (const pattern of permanentPatterns) {
    if (msg.includes(pattern)) return false;
  }

  return true;
}
