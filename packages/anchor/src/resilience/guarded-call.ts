/**
 * One external call under the full resilience policy:
 * retry( breaker( timeout( fn ) ) ).
 */

import { CircuitBreaker } from "./circuit-breaker.js";
import {
  DEFAULT_RETRY_CONFIG,
  isRetryableRpcError,
  sleep,
  withRetry,
  type RetryConfig,
  type RetryListener,
} from "./retry.js";
import { withTimeout } from "./timeout.js";

export interface CallPolicy {
  readonly retry: RetryConfig;
  readonly breaker: CircuitBreaker;
  readonly timeoutMs: number;
  readonly sleep: (ms: number) => Promise<void>;
}

export function createCallPolicy(overrides: Partial<CallPolicy> = {}): CallPolicy {
  return {
    retry: overrides.retry ?? DEFAULT_RETRY_CONFIG,
    breaker: overrides.breaker ?? new CircuitBreaker(),
    timeoutMs: overrides.timeoutMs ?? 30_000,
    sleep: overrides.sleep ?? sleep,
  };
}

export function guardedCall<T>(
  label: string,
  fn: () => Promise<T>,
  policy: CallPolicy,
  onRetry?: RetryListener,
): Promise<T> {
  return withRetry(
    () => policy.breaker.execute(() => withTimeout(fn(), policy.timeoutMs, label)),
    policy.retry,
    isRetryableRpcError,
    policy.sleep,
    onRetry,
  );
}
