/**
 * Generation State Machine
 * ========================
 *
 *   planning ──planned──▶ generating ──wave_completed──▶ generating
 *      │                     │    │
 *      │ plan_failed         │    ├─ count reached ──▶ completing ──truncated──▶ done
 *      ▼                     │    └─ chunks exhausted ─────────────────────────▶ done
 *   aborted ◀──cancelled─────┘                         (nothing accepted ▶ aborted)
 *
 * Everything here is pure so retry, skip and abort decisions can be tested
 * without a model.
 */

import type { CompletionReason } from './types.js';
import type { GenerationErrorCode, GenerationFailureCause } from './errors.js';

// =============================================================================
// Types
// =============================================================================

export type GenerationState =
  | { phase: 'planning' }
  | { phase: 'generating'; next_chunk: number; total_chunks: number }
  | { phase: 'completing'; completion: CompletionReason }
  | { phase: 'done'; completion: CompletionReason }
  | { phase: 'aborted'; code: GenerationErrorCode; cause?: GenerationFailureCause };

export type GenerationPhase = GenerationState['phase'];

export type GenerationEvent =
  | { type: 'planned'; chunk_count: number }
  | { type: 'plan_failed' }
  | {
      type: 'wave_completed';
      /** Index of the first chunk not yet started. */
      next_chunk: number;
      accepted: number;
      requested: number;
      /** Every chunk so far exhausted its inference retries. */
      all_chunks_failed: boolean;
    }
  | { type: 'cancelled' }
  | { type: 'truncated' };

export type ChunkFailureDecision = 'retry' | 'skip';

export class InvalidTransitionError extends Error {
  constructor(
    readonly state: GenerationState,
    readonly event: GenerationEvent
  ) {
    super(`Invalid transition: ${event.type} in phase ${state.phase}`);
    this.name = 'InvalidTransitionError';
  }
}

// =============================================================================
// Transitions
// =============================================================================

export const INITIAL_STATE: GenerationState = { phase: 'planning' };

export function isTerminal(state: GenerationState): boolean {
  return state.phase === 'done' || state.phase === 'aborted';
}

/**
 * Next state for an event.
 *
 * @throws InvalidTransitionError when the event cannot occur in the current phase
 */
export function transition(state: GenerationState, event: GenerationEvent): GenerationState {
  switch (state.phase) {
    case 'planning':
      if (event.type === 'planned') {
        return event.chunk_count > 0
          ? { phase: 'generating', next_chunk: 0, total_chunks: event.chunk_count }
          : { phase: 'aborted', code: 'INVALID_INPUT' };
      }
      if (event.type === 'plan_failed') {
        return { phase: 'aborted', code: 'INVALID_INPUT' };
      }
      break;

    case 'generating':
      if (event.type === 'cancelled') {
        return { phase: 'aborted', code: 'CANCELLED' };
      }
      if (event.type === 'wave_completed') {
        if (event.accepted >= event.requested) {
          return { phase: 'completing', completion: 'count_satisfied' };
        }
        if (event.next_chunk < state.total_chunks) {
          return { ...state, next_chunk: event.next_chunk };
        }
        if (event.accepted > 0) {
          return { phase: 'done', completion: 'chunks_exhausted' };
        }
        return {
          phase: 'aborted',
          code: 'GENERATION_FAILED',
          cause: event.all_chunks_failed ? 'all_chunks_failed' : 'no_valid_questions',
        };
      }
      break;

    case 'completing':
      if (event.type === 'truncated') {
        return { phase: 'done', completion: state.completion };
      }
      break;

    case 'done':
    case 'aborted':
      break;
  }

  throw new InvalidTransitionError(state, event);
}

// =============================================================================
// Decisions
// =============================================================================

/**
 * Retry or skip a chunk after an inference failure.
 *
 * @param failures - failures of this chunk so far, including the current one
 * @param limit - extra attempts allowed per chunk
 * @param retryable - whether the failure is worth another attempt
 */
export function decideChunkFailure(
  failures: number,
  limit: number,
  retryable: boolean = true
): ChunkFailureDecision {
  return retryable && failures <= limit ? 'retry' : 'skip';
}

/**
 * Questions to ask for from the next chunk: the remaining need spread over
 * the chunks left, clamped to [1, maxPerChunk].
 */
export function countHintFor(
  requested: number,
  accepted: number,
  chunksLeft: number,
  maxPerChunk: number
): number {
  const remaining = Math.max(requested - accepted, 1);
  const share = Math.ceil(remaining / Math.max(chunksLeft, 1));
  return Math.min(Math.max(share, 1), maxPerChunk);
}
