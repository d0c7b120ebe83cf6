export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  readonly failureThreshold: number;
  readonly cooldownMs: number;
  readonly nowMs?: () => number;
}

export interface CircuitBreakerStats {
  readonly state: CircuitState;
  readonly consecutiveFailures: number;
  readonly lastFailureAt: number | null;
}

/**
 * Counts consecutive failures. At the threshold the circuit opens for
 * `cooldownMs`; afterwards one trial is let through (half-open). A success
 * closes it, a failure reopens it for another full cool-down.
 */
export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly nowMs: () => number;
  private consecutiveFailures = 0;
  private lastFailureAt: number | null = null;

  constructor(options: CircuitBreakerOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new Error("CIRCUIT_BREAKER_CONFIG_ERROR failureThreshold must be an integer >= 1");
    }
    this.failureThreshold = options.failureThreshold;
    this.cooldownMs = options.cooldownMs;
    this.nowMs = options.nowMs ?? Date.now;
  }

  get state(): CircuitState {
    if (this.consecutiveFailures < this.failureThreshold || this.lastFailureAt === null) {
      return "closed";
    }
    return this.nowMs() - this.lastFailureAt >= this.cooldownMs ? "half_open" : "open";
  }

  allowAttempt(): boolean {
    return this.state !== "open";
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.lastFailureAt = null;
  }

  recordFailure(): void {
    this.consecutiveFailures += 1;
    this.lastFailureAt = this.nowMs();
  }

  stats(): CircuitBreakerStats {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
    };
  }
}
