/**
 * Adapter Factory
 * ================
 *
 * Unified factory for creating inference adapters from configuration.
 */

import type { ModelAdapter } from './model.js';
import { createEchoAdapter } from './mock.js';
import { OllamaAdapter, type OllamaAdapterOptions } from './ollama.js';
import {
  OpenAICompatibleAdapter,
  type OpenAICompatibleAdapterOptions,
} from './openai.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Supported providers.
 */
export type AdapterProvider = 'ollama' | 'openai-compatible' | 'mock';

export const ADAPTER_PROVIDERS: readonly AdapterProvider[] = [
  'ollama',
  'openai-compatible',
  'mock',
];

/**
 * Options for creating an adapter.
 */
export interface AdapterFactoryOptions {
  /**
   * Provider to use.
   */
  provider: AdapterProvider;

  /**
   * Base URL of the inference service. Provider default when omitted.
   */
  base_url?: string;

  /**
   * API key for OpenAI-compatible servers that enforce one.
   */
  api_key?: string;
}

// =============================================================================
// Factory Implementation
// =============================================================================

/**
 * Create an inference adapter based on options.
 */
export function createAdapter(options: AdapterFactoryOptions): ModelAdapter {
  const { provider, base_url, api_key } = options;

  switch (provider) {
    case 'ollama': {
      const ollamaOpts: OllamaAdapterOptions = {};
      if (base_url !== undefined) ollamaOpts.base_url = base_url;
      return new OllamaAdapter(ollamaOpts);
    }

    case 'openai-compatible': {
      const openaiOpts: OpenAICompatibleAdapterOptions = {};
      if (base_url !== undefined) openaiOpts.base_url = base_url;
      if (api_key !== undefined) openaiOpts.api_key = api_key;
      return new OpenAICompatibleAdapter(openaiOpts);
    }

    case 'mock':
      return createEchoAdapter();
  }
}

/**
 * Type guard for provider names read from untrusted input.
 */
export function isAdapterProvider(value: string): value is AdapterProvider {
  return ADAPTER_PROVIDERS.some((provider) => provider === value);
}
