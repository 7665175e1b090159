/**
 * Circuit Breaker
 *
 * Stops calling an unhealthy RPC endpoint for a cool-down period.
 *
 * States:
 * - CLOSED: Normal operation, requests flow through
 * - OPEN: Endpoint unhealthy, requests fail fast
 * - HALF_OPEN: Testing if the endpoint recovered
 */

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening (default: 5) */
  readonly failureThreshold: number;
  /** Successes in HALF_OPEN needed to close (default: 1) */
  readonly successThreshold: number;
  /** Time in ms before OPEN moves to HALF_OPEN (default: 30000) */
  readonly resetTimeoutMs: number;
  /** Clock (default: Date.now) */
  readonly now: () => number;
  readonly onStateChange?: (from: CircuitState, to: CircuitState, reason: string) => void;
}

/**
 * Error thrown when the breaker rejects a call without attempting it.
 */
export class CircuitOpenError extends Error {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super(message);
    this.name = "CircuitOpenError";
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * ```ts
 * const breaker = new CircuitBreaker({ failureThreshold: 5 });
 * const head = await breaker.execute(() => client.getBlockNumber());
 * ```
 */
export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private consecutiveFailures = 0;
  private successCount = 0;
  private lastStateChangeAt: number;

  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      successThreshold: config.successThreshold ?? 1,
      resetTimeoutMs: config.resetTimeoutMs ?? 30000,
      now: config.now ?? Date.now,
      ...(config.onStateChange !== undefined && { onStateChange: config.onStateChange }),
    };
    this.lastStateChangeAt = this.config.now();
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitOpenError(
        `Circuit breaker is ${this.state}`,
        this.getTimeUntilRetry(),
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  canExecute(): boolean {
    if (
      this.state === "OPEN" &&
      this.config.now() - this.lastStateChangeAt >= this.config.resetTimeoutMs
    ) {
      this.transitionTo("HALF_OPEN", "Reset timeout elapsed");
    }
    return this.state !== "OPEN";
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Time until an OPEN breaker admits a trial call (0 otherwise).
   */
  getTimeUntilRetry(): number {
    if (this.state !== "OPEN") {
      return 0;
    }
    const elapsed = this.config.now() - this.lastStateChangeAt;
    return Math.max(0, this.config.resetTimeoutMs - elapsed);
  }

  reset(): void {
    this.transitionTo("CLOSED", "Manual reset");
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state === "HALF_OPEN") {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.transitionTo("CLOSED", "Success threshold reached");
      }
    }
  }

  private recordFailure(): void {
    this.consecutiveFailures++;

    if (this.state === "HALF_OPEN") {
      this.transitionTo("OPEN", "Failure during recovery test");
    } else if (
      this.state === "CLOSED" &&
      this.consecutiveFailures >= this.config.failureThreshold
    ) {
      this.transitionTo(
        "OPEN",
        `Failure threshold reached (${this.consecutiveFailures} failures)`,
      );
    }
  }

  private transitionTo(next: CircuitState, reason: string): void {
    const previous = this.state;
    this.state = next;
    this.lastStateChangeAt = this.config.now();
    this.successCount = 0;
    if (next === "CLOSED") {
      this.consecutiveFailures = 0;
    }
    if (previous !== next) {
      this.config.onStateChange?.(previous, next, reason);
    }
  }
}
