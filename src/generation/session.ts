/**
 * Generation Session
 * ==================
 *
 * Per-request accumulator owned by one orchestrator run: the planned chunks,
 * accepted questions in acceptance order, per-chunk failure counters and the
 * counters behind GenerationStats. Never shared between requests.
 */

import type {
  Chunk,
  CompletionReason,
  GenerationRequest,
  GenerationStats,
  ParseStrategy,
  QuestionCandidate,
  RejectionReason,
  ValidatedQuestion,
} from './types.js';
import type { InferenceError } from '../adapters/model.js';
import type { GenerationError } from './errors.js';
import { acceptCandidate, type AcceptOptions } from './validator.js';

/**
 * What processing one chunk produced, before merging into the session.
 */
export type ChunkOutcome =
  | {
      status: 'parsed';
      chunk_index: number;
      model_calls: number;
      reprompts: number;
      strategy: ParseStrategy | null;
      candidates: QuestionCandidate[];
      dropped: number;
    }
  | {
      status: 'skipped';
      chunk_index: number;
      model_calls: number;
      reprompts: number;
      error: InferenceError;
    };

export class GenerationSession {
  chunks: Chunk[] = [];
  plan_error: GenerationError | undefined;

  private readonly accepted: ValidatedQuestion[] = [];
  private readonly failures: Map<number, number> = new Map();
  private readonly rejections: Record<RejectionReason, number> = {
    structure: 0,
    duplicate: 0,
    near_duplicate: 0,
  };
  private chunksProcessed = 0;
  private chunksSkipped = 0;
  private modelCalls = 0;
  private reprompts = 0;
  private candidatesParsed = 0;
  private candidatesDropped = 0;
  private acceptedTotal = 0;

  constructor(readonly request: GenerationRequest) {}

  get acceptedCount(): number {
    return this.accepted.length;
  }

  get questions(): readonly ValidatedQuestion[] {
    return this.accepted;
  }

  /**
   * Count an inference failure of a chunk; returns its failures so far.
   */
  recordFailure(chunkIndex: number): number {
    const failures = (this.failures.get(chunkIndex) ?? 0) + 1;
    this.failures.set(chunkIndex, failures);
    return failures;
  }

  failuresOf(chunkIndex: number): number {
    return this.failures.get(chunkIndex) ?? 0;
  }

  /**
   * True when chunks were processed and every one of them was skipped.
   */
  get allChunksFailed(): boolean {
    return this.chunksProcessed > 0 && this.chunksSkipped === this.chunksProcessed;
  }

  /**
   * Fold a chunk outcome into the session, validating its candidates
   * against everything accepted so far.
   */
  merge(outcome: ChunkOutcome, options: Omit<AcceptOptions, 'chunk_index'> = {}): ValidatedQuestion[] {
    this.chunksProcessed++;
    this.modelCalls += outcome.model_calls;
    this.reprompts += outcome.reprompts;

    if (outcome.status === 'skipped') {
      this.chunksSkipped++;
      return [];
    }

    this.candidatesParsed += outcome.candidates.length;
    this.candidatesDropped += outcome.dropped;

    const added: ValidatedQuestion[] = [];
    for (const candidate of outcome.candidates) {
      const decision = acceptCandidate(candidate, this.accepted, {
        ...options,
        chunk_index: outcome.chunk_index,
      });
      if (decision.accepted) {
        this.accepted.push(decision.question);
        added.push(decision.question);
      } else {
        this.rejections[decision.reason]++;
      }
    }
    this.acceptedTotal += added.length;
    return added;
  }

  /**
   * Drop questions beyond `count`, keeping acceptance order.
   */
  truncate(count: number): void {
    if (this.accepted.length > count) {
      this.accepted.length = count;
    }
  }

  /**
   * Counters so far, without a terminal reason.
   */
  snapshot(): Omit<GenerationStats, 'completion'> {
    return {
      chunks_planned: this.chunks.length,
      chunks_processed: this.chunksProcessed,
      chunks_skipped: this.chunksSkipped,
      model_calls: this.modelCalls,
      reprompts: this.reprompts,
      candidates_parsed: this.candidatesParsed,
      candidates_dropped_by_parser: this.candidatesDropped,
      rejections: { ...this.rejections },
      questions_accepted: this.acceptedTotal,
      questions_returned: this.accepted.length,
    };
  }

  stats(completion: CompletionReason): GenerationStats {
    return { ...this.snapshot(), completion };
  }
}
