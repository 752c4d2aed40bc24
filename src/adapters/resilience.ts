/**
 * Adapter Resilience Patterns
 * ===========================
 *
 * Circuit breaker and retry/backoff for inference calls.
 * Transient failures are retried a bounded number of times; a service that
 * keeps failing opens the circuit so later chunks fail fast.
 */

import { InferenceError } from './model.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Circuit breaker state.
 */
export type CircuitState = 'closed' | 'open' | 'half-open';

/**
 * Circuit breaker configuration.
 */
export interface CircuitBreakerConfig {
  /**
   * Number of failures before opening circuit.
   */
  failureThreshold: number;

  /**
   * Time in ms before attempting recovery.
   */
  resetTimeout: number;

  /**
   * Number of successes in half-open to close circuit.
   */
  successThreshold: number;

  /**
   * Time window for counting failures (ms).
   */
  failureWindow: number;
}

/**
 * Circuit breaker statistics.
 */
export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  recentFailures: number;
  recoveryAt?: number;
}

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /**
   * Maximum attempts, including the first one.
   */
  maxAttempts: number;

  /**
   * Initial delay in ms.
   */
  initialDelay: number;

  /**
   * Maximum delay in ms.
   */
  maxDelay: number;

  /**
   * Backoff multiplier.
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1).
   */
  jitter: number;

  /**
   * Which errors to retry.
   */
  retryOn: (error: Error) => boolean;

  /**
   * Called before each wait.
   */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Retry statistics.
 */
export interface RetryStats {
  totalAttempts: number;
  firstTrySuccesses: number;
  retrySuccesses: number;
  exhaustedFailures: number;
}

// =============================================================================
// Circuit Breaker
// =============================================================================

/**
 * Circuit breaker implementation.
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private state: CircuitState = 'closed';
  private failures: number[] = [];
  private successes = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private recoveryAt: number | null = null;

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      resetTimeout: config.resetTimeout ?? 30000,
      successThreshold: config.successThreshold ?? 1,
      failureWindow: config.failureWindow ?? 60000,
    };
  }

  /**
   * Check if circuit allows requests.
   */
  canExecute(): boolean {
    return this.getState() !== 'open';
  }

  /**
   * Record a successful operation.
   */
  recordSuccess(): void {
    this.totalSuccesses++;

    if (this.state === 'half-open') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.state = 'closed';
        this.failures = [];
        this.recoveryAt = null;
      }
    }
  }

  /**
   * Record a failed operation.
   */
  recordFailure(): void {
    this.failures.push(this.now());
    this.totalFailures++;

    this.cleanupOldFailures();

    if (this.state === 'closed') {
      if (this.failures.length >= this.config.failureThreshold) {
        this.openCircuit();
      }
    } else if (this.state === 'half-open') {
      // Any failure in half-open reopens the circuit
      this.openCircuit();
    }
  }

  /**
   * Get current state, moving open → half-open once the reset timeout passed.
   */
  getState(): CircuitState {
    this.cleanupOldFailures();

    if (this.state === 'open' && this.recoveryAt !== null && this.now() >= this.recoveryAt) {
      this.state = 'half-open';
      this.successes = 0;
    }

    return this.state;
  }

  getStats(): CircuitBreakerStats {
    const stats: CircuitBreakerStats = {
      state: this.getState(),
      failures: this.totalFailures,
      successes: this.totalSuccesses,
      recentFailures: this.failures.length,
    };
    if (this.recoveryAt !== null) stats.recoveryAt = this.recoveryAt;
    return stats;
  }

  /**
   * Reset the circuit breaker.
   */
  reset(): void {
    this.state = 'closed';
    this.failures = [];
    this.successes = 0;
    this.recoveryAt = null;
  }

  private openCircuit(): void {
    this.state = 'open';
    this.recoveryAt = this.now() + this.config.resetTimeout;
  }

  private cleanupOldFailures(): void {
    const cutoff = this.now() - this.config.failureWindow;
    this.failures = this.failures.filter((t) => t > cutoff);
  }
}

// =============================================================================
// Retry with Backoff
// =============================================================================

/**
 * Retry only inference failures that declare themselves transient.
 */
export function isTransientInferenceError(error: Error): boolean {
  return error instanceof InferenceError && error.retryable;
}

/**
 * Retry executor with exponential backoff.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private stats: RetryStats = {
    totalAttempts: 0,
    firstTrySuccesses: 0,
    retrySuccesses: 0,
    exhaustedFailures: 0,
  };

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = {
      maxAttempts: Math.max(1, config.maxAttempts ?? 2),
      initialDelay: config.initialDelay ?? 500,
      maxDelay: config.maxDelay ?? 8000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitter: config.jitter ?? 0.1,
      retryOn: config.retryOn ?? isTransientInferenceError,
    };
    if (config.onRetry) this.config.onRetry = config.onRetry;
  }

  /**
   * Execute with retry.
   *
   * Non-retryable errors are rethrown as-is; exhausting the attempts throws
   * RetryExhaustedError carrying the last error.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
    let lastError: Error | undefined;
    let attempt = 0;

    while (attempt < this.config.maxAttempts) {
      attempt++;
      this.stats.totalAttempts++;

      try {
        const result = await fn(attempt);

        if (attempt === 1) {
          this.stats.firstTrySuccesses++;
        } else {
          this.stats.retrySuccesses++;
        }

        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.config.retryOn(lastError)) {
          throw lastError;
        }

        if (attempt >= this.config.maxAttempts) {
          break;
        }

        const delay = this.calculateDelay(attempt);
        this.config.onRetry?.(lastError, attempt, delay);
        await sleep(delay);
      }
    }

    this.stats.exhaustedFailures++;
    throw new RetryExhaustedError(
      `Exhausted ${this.config.maxAttempts} retry attempts`,
      attempt,
      lastError
    );
  }

  getStats(): RetryStats {
    return { ...this.stats };
  }

  /**
   * Calculate delay for attempt.
   */
  calculateDelay(attempt: number): number {
    let delay = this.config.initialDelay * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelay);

    const jitterRange = delay * this.config.jitter;
    delay += Math.random() * jitterRange * 2 - jitterRange;

    return Math.max(0, Math.round(delay));
  }
}

/**
 * Retry exhausted error.
 */
export class RetryExhaustedError extends Error {
  readonly lastError?: Error;

  constructor(message: string, readonly attempts: number, lastError?: Error) {
    super(message);
    this.name = 'RetryExhaustedError';
    if (lastError) this.lastError = lastError;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
