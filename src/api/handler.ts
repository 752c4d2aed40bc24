/**
 * API Handler
 * ===========
 *
 * Transport-agnostic request handling for the question generator. Takes an
 * untrusted JSON payload, returns a status code and a response body; any
 * HTTP framework can mount these functions.
 *
 *   POST generate  { text, n_questions = 5, difficulty = "medium" }
 *     200 { mcqs: [{ question, options, answer, explanation }] }
 *     400 invalid input, 500 no valid questions, 503 inference unavailable
 *
 *   GET  describe  { status, inference_url, model, provider, ready, models }
 */

import { GenerationError } from '../generation/errors.js';
import { isDifficulty } from '../generation/request.js';
import type { GenerateOptions, GenerationOrchestrator } from '../generation/orchestrator.js';
import {
  MAX_REQUESTED_COUNT,
  MIN_REQUESTED_COUNT,
  type GenerationRequest,
  type ValidatedQuestion,
} from '../generation/types.js';
import { InferenceError, type ModelAdapter } from '../adapters/model.js';
import type { GenerationConfig } from '../config/index.js';
import { createMetricsCollector, type MetricsCollector } from '../infra/metrics.js';

// =============================================================================
// Types
// =============================================================================

export interface McqPayload {
  question: string;
  options: string[];
  /**
   * Zero-based index of the correct option.
   */
  answer: number;
  explanation: string;
}

export interface GenerateResponseBody {
  mcqs: McqPayload[];
}

export interface ErrorBody {
  code: string;
  detail: string;
}

export interface ApiResponse<T> {
  status: number;
  body: T;
}

export interface ServiceDescription {
  status: 'running' | 'degraded';
  inference_url: string;
  provider: string;
  model: string;
  ready: boolean;
  models: string[];
}

export const DEFAULT_QUESTION_COUNT = 5;
export const DEFAULT_DIFFICULTY = 'medium';

/**
 * Status for cancelled requests (client closed request).
 */
export const STATUS_CANCELLED = 499;

// =============================================================================
// Payload
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function badRequest(detail: string): ApiResponse<ErrorBody> {
  return { status: 400, body: { code: 'INVALID_INPUT', detail } };
}

/**
 * Check an untrusted payload and apply defaults. The source size limit is
 * enforced later by the orchestrator.
 */
export function parseGeneratePayload(
  body: unknown
): { ok: true; request: GenerationRequest } | { ok: false; response: ApiResponse<ErrorBody> } {
  if (!isRecord(body)) {
    return { ok: false, response: badRequest('Request body must be a JSON object') };
  }

  const { text, n_questions = DEFAULT_QUESTION_COUNT, difficulty = DEFAULT_DIFFICULTY } = body;

  if (typeof text !== 'string') {
    return { ok: false, response: badRequest('text must be a string') };
  }
  if (text.trim().length === 0) {
    return { ok: false, response: badRequest('Text cannot be empty') };
  }
  if (
    typeof n_questions !== 'number' ||
    !Number.isInteger(n_questions) ||
    n_questions < MIN_REQUESTED_COUNT ||
    n_questions > MAX_REQUESTED_COUNT
  ) {
    return { ok: false, response: badRequest('Number of questions must be between 1 and 20') };
  }
  if (!isDifficulty(difficulty)) {
    return { ok: false, response: badRequest('Difficulty must be easy, medium, or hard') };
  }

  return { ok: true, request: { source_text: text, requested_count: n_questions, difficulty } };
}

export function toMcqPayload(question: ValidatedQuestion): McqPayload {
  return {
    question: question.stem,
    options: [...question.options],
    answer: question.correct_option_index,
    explanation: question.explanation,
  };
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Map a request-level failure to a status and body.
 */
export function errorResponse(error: GenerationError): ApiResponse<ErrorBody> {
  switch (error.code) {
    case 'INVALID_INPUT':
      return { status: 400, body: { code: error.code, detail: error.message } };
    case 'CANCELLED':
      return { status: STATUS_CANCELLED, body: { code: error.code, detail: error.message } };
    case 'GENERATION_FAILED':
      if (error.details.cause === 'all_chunks_failed') {
        return {
          status: 503,
          body: {
            code: 'INFERENCE_UNAVAILABLE',
            detail: 'Inference service unavailable. Make sure the model server is running.',
          },
        };
      }
      return {
        status: 500,
        body: {
          code: error.code,
          detail: 'Failed to generate valid MCQs. Check the model or try different text.',
        },
      };
  }
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * Handle a generate request.
 */
export async function handleGenerateRequest(
  orchestrator: GenerationOrchestrator,
  body: unknown,
  options: GenerateOptions & { metrics?: MetricsCollector } = {}
): Promise<ApiResponse<GenerateResponseBody | ErrorBody>> {
  const metrics = options.metrics ?? createMetricsCollector('api');
  const parsed = parseGeneratePayload(body);
  if (!parsed.ok) {
    metrics.increment('api_requests', 1, { status: String(parsed.response.status) });
    return parsed.response;
  }

  try {
    const result = await orchestrator.generate(parsed.request, options);
    metrics.increment('api_requests', 1, { status: '200' });
    return { status: 200, body: { mcqs: result.questions.map(toMcqPayload) } };
  } catch (error) {
    if (!(error instanceof GenerationError)) {
      metrics.error('Unexpected failure while generating', {
        error: error instanceof Error ? error.message : String(error),
      });
      metrics.increment('api_requests', 1, { status: '500' });
      return { status: 500, body: { code: 'INTERNAL_ERROR', detail: 'Internal error' } };
    }
    const response = errorResponse(error);
    metrics.increment('api_requests', 1, { status: String(response.status) });
    return response;
  }
}

/**
 * Describe the service: configured inference endpoint, model and the models
 * the server reports.
 */
export async function describeService(
  config: GenerationConfig,
  adapter: ModelAdapter,
  metrics: MetricsCollector = createMetricsCollector('api')
): Promise<ApiResponse<ServiceDescription>> {
  const ready = await adapter.isReady();
  let models: string[] = [];

  if (ready) {
    try {
      models = await adapter.listModels();
    } catch (error) {
      if (!(error instanceof InferenceError)) throw error;
      metrics.warn('Could not list models', { code: error.code, error: error.message });
    }
  }

  return {
    status: 200,
    body: {
      status: ready ? 'running' : 'degraded',
      inference_url: adapter.endpoint,
      provider: config.provider,
      model: config.model,
      ready,
      models,
    },
  };
}
