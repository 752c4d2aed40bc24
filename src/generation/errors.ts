/**
 * Request-level errors surfaced to the caller.
 *
 * Per-call inference failures are `InferenceError` (adapters/model.ts) and are
 * absorbed per chunk; only the codes below escalate out of a request.
 */

export type GenerationErrorCode =
  | 'INVALID_INPUT'     // Empty/oversized source or out-of-range parameters
  | 'GENERATION_FAILED' // Model consulted, zero questions produced
  | 'CANCELLED';        // Caller aborted between chunks

/**
 * Why a request produced nothing.
 */
export type GenerationFailureCause = 'all_chunks_failed' | 'no_valid_questions';

export class GenerationError extends Error {
  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

export function invalidInput(message: string, details?: Record<string, unknown>): GenerationError {
  return new GenerationError('INVALID_INPUT', message, details);
}
