/**
 * Adapter Exports
 * ===============
 *
 * Re-export all adapter types and implementations.
 */

// Types and interface
export type {
  ModelAdapter,
  TransformOptions,
  TransformResult,
  InferenceErrorCode,
} from './model.js';

export { InferenceError, inferenceErrorFromStatus } from './model.js';

// Mock adapter
export type {
  MockResponse,
  MockHandler,
  MockDefaultBehavior,
  MockModelAdapterOptions,
  MockCall,
} from './mock.js';

export {
  MockModelAdapter,
  createEchoAdapter,
  createFixedAdapter,
  createHandlerAdapter,
} from './mock.js';

// Ollama adapter
export type { OllamaAdapterOptions } from './ollama.js';

export {
  OllamaAdapter,
  DEFAULT_OLLAMA_URL,
  createOllamaAdapter,
  isOllamaAvailable,
} from './ollama.js';

// OpenAI-compatible adapter
export type { OpenAICompatibleAdapterOptions } from './openai.js';

export {
  OpenAICompatibleAdapter,
  DEFAULT_OPENAI_COMPATIBLE_URL,
} from './openai.js';

// Factory
export type { AdapterProvider, AdapterFactoryOptions } from './factory.js';

export { createAdapter, isAdapterProvider, ADAPTER_PROVIDERS } from './factory.js';

// Resilience patterns
export type {
  CircuitState,
  CircuitBreakerConfig,
  CircuitBreakerStats,
  RetryConfig,
  RetryStats,
} from './resilience.js';

export {
  CircuitBreaker,
  RetryExecutor,
  RetryExhaustedError,
  isTransientInferenceError,
} from './resilience.js';

// Model client
export type { RawModelOutput, InvokeOptions, ModelClientOptions } from './client.js';

export { ModelClient } from './client.js';
