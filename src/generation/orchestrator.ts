/**
 * Generation Orchestrator
 * =======================
 *
 * Runs one request through the pipeline:
 *
 *   plan → (prompt → invoke → parse) per chunk → validate → truncate
 *
 * Control flow is the state machine in state_machine.ts. Chunks run in waves
 * of `concurrency`; each wave is merged into the session in chunk-index
 * order before the stop condition is checked. Cancellation is checked before
 * each wave starts; calls already in flight are left to finish or time out.
 */

import type { Chunk, GenerationRequest, GenerationResult } from './types.js';
import { GenerationError, invalidInput } from './errors.js';
import { planChunks } from './chunk_planner.js';
import { buildPrompt } from './prompt_builder.js';
import { parseResponse } from './response_parser.js';
import { GenerationSession, type ChunkOutcome } from './session.js';
import { validateGenerationRequest } from './request.js';
import {
  INITIAL_STATE,
  countHintFor,
  decideChunkFailure,
  isTerminal,
  transition,
  type GenerationEvent,
  type GenerationState,
} from './state_machine.js';
import { ModelClient } from '../adapters/client.js';
import { InferenceError, type ModelAdapter } from '../adapters/model.js';
import { createAdapter } from '../adapters/factory.js';
import { CircuitBreaker } from '../adapters/resilience.js';
import { MAX_CONCURRENCY, type GenerationConfig } from '../config/index.js';
import { MetricsCollector, createMetricsCollector } from '../infra/metrics.js';

// =============================================================================
// Types
// =============================================================================

export interface GenerateOptions {
  /**
   * Aborts the request between chunks.
   */
  signal?: AbortSignal;
}

export interface GenerationOrchestratorDeps {
  /**
   * Adapter to use instead of one built from config.provider.
   */
  adapter?: ModelAdapter;
  metrics?: MetricsCollector;
}

// =============================================================================
// Implementation
// =============================================================================

export class GenerationOrchestrator {
  private readonly metrics: MetricsCollector;

  constructor(
    private readonly client: ModelClient,
    readonly config: GenerationConfig,
    metrics?: MetricsCollector
  ) {
    this.metrics = metrics ?? createMetricsCollector('orchestrator');
  }

  /**
   * Generate validated questions for a request.
   *
   * @throws GenerationError INVALID_INPUT, GENERATION_FAILED or CANCELLED
   */
  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
    validateGenerationRequest(request, this.config.max_source_chars);

    const endTimer = this.metrics.startTimer('generation_duration_ms');
    const session = new GenerationSession(request);
    let state: GenerationState = INITIAL_STATE;

    this.metrics.info('Generation started', {
      source_chars: request.source_text.length,
      requested_count: request.requested_count,
      difficulty: request.difficulty,
    });

    while (!isTerminal(state)) {
      switch (state.phase) {
        case 'planning':
          state = transition(state, this.plan(session));
          break;
        case 'generating':
          state = transition(state, await this.runWave(state.next_chunk, session, options.signal));
          break;
        case 'completing':
          session.truncate(request.requested_count);
          state = transition(state, { type: 'truncated' });
          break;
      }
    }

    endTimer();

    if (state.phase === 'aborted') {
      const error = this.abortError(state, session);
      this.metrics.increment('generations', 1, { outcome: error.code });
      this.metrics.warn('Generation aborted', { code: error.code, ...error.details });
      throw error;
    }

    const stats = session.stats(state.phase === 'done' ? state.completion : 'chunks_exhausted');
    this.metrics.increment('generations', 1, { outcome: stats.completion });
    this.metrics.info('Generation finished', {
      completion: stats.completion,
      questions_returned: stats.questions_returned,
      chunks_processed: stats.chunks_processed,
      chunks_skipped: stats.chunks_skipped,
    });

    return { questions: [...session.questions], stats };
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  private plan(session: GenerationSession): GenerationEvent {
    try {
      session.chunks = planChunks(session.request.source_text, this.config.max_chunk_chars);
    } catch (error) {
      if (error instanceof GenerationError) {
        session.plan_error = error;
        return { type: 'plan_failed' };
      }
      throw error;
    }
    this.metrics.debug('Chunks planned', { chunk_count: session.chunks.length });
    return { type: 'planned', chunk_count: session.chunks.length };
  }

  private async runWave(
    start: number,
    session: GenerationSession,
    signal: AbortSignal | undefined
  ): Promise<GenerationEvent> {
    if (signal?.aborted) {
      return { type: 'cancelled' };
    }

    const { requested_count } = session.request;
    const width = Math.min(this.config.concurrency, MAX_CONCURRENCY);
    const wave = session.chunks.slice(start, start + width);
    const hint = countHintFor(
      requested_count,
      session.acceptedCount,
      session.chunks.length - start,
      this.config.max_questions_per_chunk
    );

    const firstPass = await Promise.all(wave.map((chunk) => this.processChunk(chunk, hint, session)));

    // Only chunks ahead of the first one that yielded candidates re-prompt
    const firstYield = firstPass.findIndex((o) => o.status === 'parsed' && o.candidates.length > 0);
    const outcomes = await Promise.all(
      firstPass.map((outcome, i) => {
        const chunk = wave[i];
        const eligible =
          this.config.reprompt_on_empty &&
          session.acceptedCount === 0 &&
          (firstYield === -1 || i < firstYield);
        return chunk && eligible && outcome.status === 'parsed' && outcome.candidates.length === 0
          ? this.reprompt(chunk, hint, session, outcome)
          : outcome;
      })
    );

    for (const outcome of outcomes) {
      const added = session.merge(outcome, {
        similarity_threshold: this.config.similarity_threshold,
        metrics: this.metrics,
      });
      this.metrics.increment('chunks', 1, { status: outcome.status });
      this.metrics.increment('questions_accepted', added.length);
    }

    return {
      type: 'wave_completed',
      next_chunk: start + wave.length,
      accepted: session.acceptedCount,
      requested: requested_count,
      all_chunks_failed: session.allChunksFailed,
    };
  }

  /**
   * Prompt, invoke and parse one chunk, retrying failed calls up to the
   * per-chunk limit.
   */
  private async processChunk(
    chunk: Chunk,
    hint: number,
    session: GenerationSession,
    strict = false,
    first_attempt = 1
  ): Promise<ChunkOutcome> {
    const prompt = buildPrompt(chunk, session.request.difficulty, hint, { strict });
    let model_calls = 0;

    for (let attempt = first_attempt; ; attempt++) {
      model_calls++;

      let text: string;
      try {
        const output = await this.client.invoke(prompt, {
          model: this.config.model,
          temperature: this.config.temperature,
          timeout_ms: this.config.timeout_ms,
          chunk_index: chunk.index,
          attempt,
        });
        text = output.text;
      } catch (error) {
        if (!(error instanceof InferenceError)) throw error;

        const failures = session.recordFailure(chunk.index);
        const decision = decideChunkFailure(failures, this.config.chunk_retry_limit, error.retryable);
        this.metrics.warn(decision === 'retry' ? 'Chunk failed, retrying' : 'Chunk failed, skipping', {
          chunk_index: chunk.index,
          failures,
          code: error.code,
        });
        if (decision === 'retry') continue;
        return { status: 'skipped', chunk_index: chunk.index, model_calls, reprompts: 0, error };
      }

      const parsed = parseResponse(text);
      return {
        status: 'parsed',
        chunk_index: chunk.index,
        model_calls,
        reprompts: 0,
        strategy: parsed.kind === 'candidates' ? parsed.strategy : null,
        candidates: parsed.kind === 'candidates' ? parsed.candidates : [],
        dropped: parsed.dropped,
      };
    }
  }

  /**
   * Ask once more with the strict output instruction after nothing parsed.
   */
  private async reprompt(
    chunk: Chunk,
    hint: number,
    session: GenerationSession,
    first: Extract<ChunkOutcome, { status: 'parsed' }>
  ): Promise<ChunkOutcome> {
    this.metrics.debug('Nothing parsed, re-prompting with strict output instruction', {
      chunk_index: chunk.index,
    });

    const second = await this.processChunk(chunk, hint, session, true, first.model_calls + 1);
    const model_calls = first.model_calls + second.model_calls;
    return second.status === 'parsed'
      ? { ...second, model_calls, reprompts: 1, dropped: first.dropped + second.dropped }
      : { ...second, model_calls, reprompts: 1 };
  }

  private abortError(
    state: Extract<GenerationState, { phase: 'aborted' }>,
    session: GenerationSession
  ): GenerationError {
    switch (state.code) {
      case 'INVALID_INPUT':
        return session.plan_error ?? invalidInput('No chunks could be planned from the source text');
      case 'CANCELLED':
        return new GenerationError('CANCELLED', 'Generation cancelled', {
          questions_accepted: session.acceptedCount,
          chunks_processed: session.snapshot().chunks_processed,
        });
      case 'GENERATION_FAILED':
        return new GenerationError(
          'GENERATION_FAILED',
          state.cause === 'all_chunks_failed'
            ? 'Inference failed for every chunk'
            : 'The model produced no valid questions',
          { cause: state.cause, ...session.snapshot() }
        );
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Wire an orchestrator from configuration: adapter, retry policy and
 * circuit breaker.
 */
export function createGenerationOrchestrator(
  config: GenerationConfig,
  deps: GenerationOrchestratorDeps = {}
): GenerationOrchestrator {
  const metrics = deps.metrics ?? createMetricsCollector('generation');
  const adapter =
    deps.adapter ??
    createAdapter({ provider: config.provider, base_url: config.base_url, api_key: config.api_key });

  const circuit_breaker =
    config.circuit_failure_threshold > 0
      ? new CircuitBreaker({ failureThreshold: config.circuit_failure_threshold })
      : undefined;

  const client = new ModelClient(adapter, {
    retry: {
      maxAttempts: config.transport_retry_attempts,
      initialDelay: config.retry_initial_delay_ms,
    },
    circuit_breaker,
    metrics,
  });

  return new GenerationOrchestrator(client, config, metrics);
}
