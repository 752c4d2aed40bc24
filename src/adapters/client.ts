/**
 * Model Client
 * ============
 *
 * The single suspension point of the generation pipeline. Sends one prompt
 * through an adapter with bounded retry, an optional circuit breaker and
 * latency metrics, and tags the output with its chunk and attempt.
 */

import type { ModelAdapter, TransformOptions } from './model.js';
import { InferenceError } from './model.js';
import {
  CircuitBreaker,
  RetryExecutor,
  RetryExhaustedError,
  type RetryConfig,
} from './resilience.js';
import { MetricsCollector, createMetricsCollector } from '../infra/metrics.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Verbatim model output for one prompt.
 */
export interface RawModelOutput {
  text: string;
  chunk_index: number;
  /**
   * 1-based attempt number of the owning chunk.
   */
  attempt: number;
  model_version: string;
  latency_ms: number;
  tokens_input: number;
  tokens_output: number;
}

/**
 * Per-call options: model parameters plus provenance tags.
 */
export interface InvokeOptions extends TransformOptions {
  chunk_index: number;
  attempt: number;
}

/**
 * Options for ModelClient.
 */
export interface ModelClientOptions {
  /**
   * Transport retry policy. Defaults to 2 attempts with exponential backoff,
   * retrying only transient InferenceErrors.
   */
  retry?: Partial<RetryConfig>;

  /**
   * Breaker shared by every call of this client. Omit to disable.
   */
  circuit_breaker?: CircuitBreaker;

  /**
   * Metrics collector.
   */
  metrics?: MetricsCollector;
}

// =============================================================================
// Implementation
// =============================================================================

export class ModelClient {
  private readonly retry: RetryExecutor;
  private readonly circuit: CircuitBreaker | undefined;
  private readonly metrics: MetricsCollector;

  constructor(
    readonly adapter: ModelAdapter,
    options: ModelClientOptions = {}
  ) {
    this.metrics = options.metrics ?? createMetricsCollector('model-client');
    this.circuit = options.circuit_breaker;
    this.retry = new RetryExecutor({
      ...options.retry,
      onRetry: (error, attempt, delayMs) => {
        this.metrics.increment('inference_retries');
        this.metrics.warn('Transient inference failure, retrying', {
          adapter: this.adapter.adapter_id,
          attempt,
          delay_ms: delayMs,
          error: error.message,
        });
        options.retry?.onRetry?.(error, attempt, delayMs);
      },
    });
  }

  /**
   * Invoke the model once for a chunk attempt.
   *
   * @throws InferenceError once retries are exhausted or on a non-retryable failure
   */
  async invoke(prompt: string, options: InvokeOptions): Promise<RawModelOutput> {
    if (this.circuit && !this.circuit.canExecute()) {
      this.metrics.increment('inference_circuit_rejections');
      const stats = this.circuit.getStats();
      throw new InferenceError(
        'INFERENCE_UNAVAILABLE',
        `Inference service at ${this.adapter.endpoint} is failing; circuit breaker is open`,
        false,
        stats.recoveryAt !== undefined ? { recovery_at: stats.recoveryAt } : {}
      );
    }

    const transformOptions: TransformOptions = {
      model: options.model,
      temperature: options.temperature,
      timeout_ms: options.timeout_ms,
    };
    const endTimer = this.metrics.startTimer('inference_latency_ms', { model: options.model });

    try {
      const result = await this.retry.execute(() =>
        this.adapter.transform(prompt, transformOptions)
      );
      endTimer();
      this.circuit?.recordSuccess();
      this.metrics.increment('inference_calls', 1, { outcome: 'ok' });

      return {
        text: result.content,
        chunk_index: options.chunk_index,
        attempt: options.attempt,
        model_version: result.model_version,
        latency_ms: result.latency_ms,
        tokens_input: result.tokens_input,
        tokens_output: result.tokens_output,
      };
    } catch (error) {
      endTimer();
      const failure = toInferenceError(error);
      if (failure.retryable) {
        this.circuit?.recordFailure();
      }
      this.metrics.increment('inference_calls', 1, { outcome: failure.code });
      this.metrics.warn('Inference call failed', {
        adapter: this.adapter.adapter_id,
        chunk_index: options.chunk_index,
        attempt: options.attempt,
        code: failure.code,
        error: failure.message,
      });
      throw failure;
    }
  }
}

/**
 * Unwrap retry exhaustion and coerce unknown failures into the taxonomy.
 */
function toInferenceError(error: unknown): InferenceError {
  const inner = error instanceof RetryExhaustedError ? error.lastError : error;
  if (inner instanceof InferenceError) {
    return inner;
  }
  const message = inner instanceof Error ? inner.message : String(inner);
  return new InferenceError('INFERENCE_ERROR', message, false);
}
