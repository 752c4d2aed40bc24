/**
 * MCQ Pipeline
 * ============
 *
 * Turns study material into validated multiple-choice questions by driving
 * a locally hosted language model.
 *
 * @example
 * ```ts
 * import { createGenerationOrchestrator, loadConfig } from 'mcq-pipeline';
 *
 * const orchestrator = createGenerationOrchestrator(loadConfig());
 * const { questions } = await orchestrator.generate({
 *   source_text: notes,
 *   requested_count: 5,
 *   difficulty: 'medium',
 * });
 * ```
 */

export * from './generation/index.js';
export * from './adapters/index.js';
export * from './config/index.js';
export * from './extract/index.js';
export * from './infra/index.js';
export {
  handleGenerateRequest,
  describeService,
  parseGeneratePayload,
  errorResponse,
  toMcqPayload,
  type ApiResponse,
  type ErrorBody,
  type GenerateResponseBody,
  type McqPayload,
  type ServiceDescription,
} from './api/handler.js';
