/**
 * Inference Adapter Interface
 * ===========================
 *
 * Defines the boundary between the generation pipeline and the locally hosted
 * inference service. Adapters translate one prompt into one HTTP call and map
 * every transport or status failure onto the `InferenceError` taxonomy.
 *
 * Design Principles:
 * - All methods return Promises (the only suspension point of the pipeline)
 * - Model, temperature and timeout are chosen per call, not per adapter
 * - No provider-specific types leak through the interface
 */

// =============================================================================
// Request Types
// =============================================================================

/**
 * Per-call parameters for a transform operation.
 */
export interface TransformOptions {
  /**
   * Model identifier understood by the inference service (e.g. "llama3.2").
   */
  model: string;

  /**
   * Sampling temperature (0.0 - 1.0).
   */
  temperature: number;

  /**
   * Hard deadline for the call in milliseconds.
   */
  timeout_ms: number;
}

// =============================================================================
// Result Types
// =============================================================================

/**
 * Result of a transform operation.
 */
export interface TransformResult {
  /**
   * Verbatim generated text.
   */
  content: string;

  /**
   * Number of prompt tokens evaluated (0 when the service does not report it).
   */
  tokens_input: number;

  /**
   * Number of tokens generated.
   */
  tokens_output: number;

  /**
   * Latency in milliseconds.
   */
  latency_ms: number;

  /**
   * Model version string reported by the service.
   */
  model_version: string;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error codes for inference failures.
 */
export type InferenceErrorCode =
  | 'INFERENCE_UNAVAILABLE' // Service unreachable (connection refused, DNS, circuit open)
  | 'INFERENCE_TIMEOUT'     // Call exceeded its deadline
  | 'INFERENCE_ERROR';      // Service answered with a non-success status

/**
 * Structured error from adapter operations.
 *
 * `retryable` is false only for model-side rejections (unknown model,
 * malformed request); transport failures and 429/5xx answers are retryable.
 */
export class InferenceError extends Error {
  constructor(
    public readonly code: InferenceErrorCode,
    message: string,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InferenceError';
  }
}

/**
 * Classify an HTTP status into an InferenceError.
 */
export function inferenceErrorFromStatus(
  status: number,
  message: string,
  details: Record<string, unknown> = {}
): InferenceError {
  const retryable = status === 408 || status === 429 || status >= 500;
  return new InferenceError('INFERENCE_ERROR', message, retryable, {
    status,
    ...details,
  });
}

// =============================================================================
// Model Adapter Interface
// =============================================================================

/**
 * Interface for inference adapters.
 *
 * Implementations:
 * - OllamaAdapter: Ollama `/api/generate`
 * - OpenAICompatibleAdapter: any `/v1/chat/completions` server on the local network
 * - MockModelAdapter: scripted responses for tests and dry runs
 */
export interface ModelAdapter {
  /**
   * Unique identifier for this adapter instance.
   * Format: `{type}_{hash8}` (e.g., `ollama_a1b2c3d4`)
   */
  readonly adapter_id: string;

  /**
   * Base URL of the inference service, or a pseudo URL for in-process adapters.
   */
  readonly endpoint: string;

  /**
   * Send one prompt and return the generated text.
   *
   * @throws InferenceError on failure
   */
  transform(prompt: string, options: TransformOptions): Promise<TransformResult>;

  /**
   * Check if the inference service answers.
   */
  isReady(): Promise<boolean>;

  /**
   * List models the service can serve (empty when unknown).
   */
  listModels(): Promise<string[]>;

  /**
   * Stop accepting calls.
   */
  shutdown(): Promise<void>;
}
