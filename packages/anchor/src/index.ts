/**
 * @resonance/anchor — Publishes Merkle roots to an external registry.
 *
 * @packageDocumentation
 */

// Types
export type {
  AnchorReceipt,
  RegistryClient,
  EvmRegistryConfig,
  AnchorState,
  AnchorStateStore,
  AnchorOutcome,
  AnchorActivity,
  AnchorStatus,
  AnchorErrorCode,
} from "./types.js";
export { AnchorError } from "./types.js";

// Publisher
export { AnchorPublisher } from "./publisher.js";
export type { AnchorPublisherOptions } from "./publisher.js";
export { FileAnchorStateStore, InMemoryAnchorStateStore } from "./anchor-state.js";

// Registry
export { EvmRegistryClient, REGISTRY_ABI } from "./registry-client.js";
export { resolveChain } from "./chains.js";

// Resilience
export {
  withRetry,
  computeDelay,
  isRetryableRpcError,
  sleep,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./resilience/retry.js";
export type { RetryConfig, RetryListener } from "./resilience/retry.js";
export { CircuitBreaker, CircuitOpenError } from "./resilience/circuit-breaker.js";
export type { CircuitBreakerConfig, CircuitState } from "./resilience/circuit-breaker.js";
export { withTimeout, TimeoutError } from "./resilience/timeout.js";
export { createCallPolicy, guardedCall } from "./resilience/guarded-call.js";
export type { CallPolicy } from "./resilience/guarded-call.js";
