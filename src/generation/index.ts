/**
 * Generation Pipeline
 * ===================
 *
 * Source text in, validated multiple-choice questions out.
 */

export * from './types.js';
export * from './errors.js';
export { planChunks, joinChunkSpans } from './chunk_planner.js';
export {
  buildPrompt,
  buildStructuredPrompt,
  DIFFICULTY_GUIDANCE,
  OUTPUT_CONTRACT,
  STRICT_SUFFIX,
  type PromptOptions,
  type PromptSection,
} from './prompt_builder.js';
export { parseResponse, resolveAnswer, toCandidate } from './response_parser.js';
export {
  acceptCandidate,
  checkStructure,
  questionId,
  DEFAULT_SIMILARITY_THRESHOLD,
  type AcceptOptions,
} from './validator.js';
export { GenerationSession, type ChunkOutcome } from './session.js';
export {
  transition,
  decideChunkFailure,
  countHintFor,
  isTerminal,
  INITIAL_STATE,
  InvalidTransitionError,
  type GenerationState,
  type GenerationPhase,
  type GenerationEvent,
  type ChunkFailureDecision,
} from './state_machine.js';
export { validateGenerationRequest, isDifficulty } from './request.js';
export {
  GenerationOrchestrator,
  createGenerationOrchestrator,
  type GenerateOptions,
  type GenerationOrchestratorDeps,
} from './orchestrator.js';
