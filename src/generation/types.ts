/**
 * Generation Types
 * ================
 *
 * Records that flow through the pipeline, from source text to validated
 * questions. Data records use snake_case field names throughout.
 */

// =============================================================================
// Request
// =============================================================================

export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTIES: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export const MIN_REQUESTED_COUNT = 1;
export const MAX_REQUESTED_COUNT = 20;

/**
 * What the caller asks for.
 */
export interface GenerationRequest {
  source_text: string;
  /**
   * Integer in [1, 20].
   */
  requested_count: number;
  difficulty: Difficulty;
}

// =============================================================================
// Chunks
// =============================================================================

/**
 * Bounded slice of the source text.
 *
 * `[start_offset, end_offset)` spans are contiguous across all chunks of one
 * source and cover it exactly. `text` is the trimmed content inside the span.
 */
export interface Chunk {
  index: number;
  start_offset: number;
  end_offset: number;
  text: string;
}

// =============================================================================
// Questions
// =============================================================================

/**
 * Exactly four answer options.
 */
export type OptionSet = readonly [string, string, string, string];

/**
 * Question extracted from model output; not yet trusted.
 */
export interface QuestionCandidate {
  stem: string;
  options: OptionSet;
  /**
   * Zero-based index into options, in [0, 3].
   */
  correct_option_index: number;
  explanation: string;
}

/**
 * Candidate that passed structural checks and deduplication.
 */
export interface ValidatedQuestion extends QuestionCandidate {
  /**
   * Content id: `q_` + 16 hex chars of sha256(normalized stem).
   */
  id: string;
  chunk_index: number;
}

// =============================================================================
// Parsing
// =============================================================================

export type ParseStrategy = 'json' | 'fragments' | 'plain_text';

/**
 * Outcome of parsing one model response. Never an exception.
 */
export type ParseOutcome =
  | {
      kind: 'candidates';
      strategy: ParseStrategy;
      candidates: QuestionCandidate[];
      /** Records recognized but dropped as malformed. */
      dropped: number;
    }
  | {
      kind: 'empty';
      dropped: number;
    };

// =============================================================================
// Validation
// =============================================================================

export type RejectionReason = 'structure' | 'duplicate' | 'near_duplicate';

export type AcceptDecision =
  | { accepted: true; question: ValidatedQuestion }
  | { accepted: false; reason: RejectionReason; detail: string };

// =============================================================================
// Results
// =============================================================================

export type CompletionReason = 'count_satisfied' | 'chunks_exhausted';

export interface GenerationStats {
  chunks_planned: number;
  chunks_processed: number;
  chunks_skipped: number;
  model_calls: number;
  reprompts: number;
  candidates_parsed: number;
  candidates_dropped_by_parser: number;
  rejections: Record<RejectionReason, number>;
  questions_accepted: number;
  questions_returned: number;
  completion: CompletionReason;
}

/**
 * Successful result: possibly fewer questions than requested, never more.
 */
export interface GenerationResult {
  questions: ValidatedQuestion[];
  stats: GenerationStats;
}
