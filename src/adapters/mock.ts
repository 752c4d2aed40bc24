/**
 * Mock Model Adapter
 * ==================
 *
 * Returns pre-configured responses for deterministic testing and dry runs.
 * Does not make any network calls.
 *
 * Usage:
 * ```typescript
 * const adapter = new MockModelAdapter();
 * adapter.addSubstringMatch('photosynthesis', { content: '[{"question": ...}]' });
 * adapter.addSubstringMatch('mitochondria', { error: new InferenceError('INFERENCE_TIMEOUT', 'slow', true) });
 * ```
 */

import { createHash } from 'node:crypto';
import type {
  ModelAdapter,
  TransformOptions,
  TransformResult,
} from './model.js';
import { InferenceError } from './model.js';

// =============================================================================
// Mock Response Configuration
// =============================================================================

/**
 * Configuration for a mock response: either content or a failure.
 */
export type MockResponse =
  | {
      content: string;
      /** Simulated latency in ms (default: 0). */
      latency_ms?: number;
    }
  | {
      error: InferenceError;
      latency_ms?: number;
    };

/**
 * Computes a response from the prompt and the 0-based call number.
 */
export type MockHandler = (
  prompt: string,
  call: number,
  options: TransformOptions
) => MockResponse;

/**
 * Default response when no match is found.
 */
export type MockDefaultBehavior =
  | { type: 'error' }
  | { type: 'echo' }
  | { type: 'fixed'; content: string }
  | { type: 'handler'; handler: MockHandler };

/**
 * Options for MockModelAdapter.
 */
export interface MockModelAdapterOptions {
  /**
   * Pseudo endpoint to report (default: 'mock://local').
   */
  endpoint?: string;

  /**
   * How to handle unmatched prompts (default: 'error').
   */
  default_behavior?: MockDefaultBehavior;

  /**
   * Models reported by listModels (default: ['mock']).
   */
  models?: string[];
}

/**
 * A call observed by the mock.
 */
export interface MockCall {
  sequence: number;
  prompt: string;
  options: TransformOptions;
}

// =============================================================================
// Mock Model Adapter Implementation
// =============================================================================

/**
 * Mock model adapter for testing.
 *
 * Responses are resolved in this order:
 * 1. Queued one-shot responses (FIFO)
 * 2. Prompt substring match (first registered wins)
 * 3. Default behavior (error, echo, fixed or handler)
 */
export class MockModelAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly endpoint: string;

  private readonly queued: MockResponse[] = [];
  private readonly substringMatches: Map<string, MockResponse> = new Map();
  private readonly defaultBehavior: MockDefaultBehavior;
  private readonly models: string[];
  private readonly calls: MockCall[] = [];
  private ready = true;

  constructor(options: MockModelAdapterOptions = {}) {
    this.endpoint = options.endpoint ?? 'mock://local';
    this.adapter_id = `mock_${hashString(this.endpoint).slice(0, 8)}`;
    this.defaultBehavior = options.default_behavior ?? { type: 'error' };
    this.models = options.models ?? ['mock'];
  }

  /**
   * Queue a response consumed by the next unmatched-or-matched call.
   */
  enqueue(...responses: MockResponse[]): void {
    this.queued.push(...responses);
  }

  /**
   * Add a response that matches any prompt containing the substring.
   */
  addSubstringMatch(substring: string, response: MockResponse): void {
    this.substringMatches.set(substring, response);
  }

  /**
   * Clear all configured responses.
   */
  clearResponses(): void {
    this.queued.length = 0;
    this.substringMatches.clear();
  }

  /**
   * Calls observed so far, in call order.
   */
  getCalls(): readonly MockCall[] {
    return this.calls;
  }

  get callCount(): number {
    return this.calls.length;
  }

  async transform(prompt: string, options: TransformOptions): Promise<TransformResult> {
    if (!this.ready) {
      throw new InferenceError('INFERENCE_UNAVAILABLE', 'Adapter is not ready', false);
    }

    const sequence = this.calls.length;
    this.calls.push({ sequence, prompt, options });

    const response = this.resolve(prompt, sequence, options);

    if (response.latency_ms !== undefined && response.latency_ms > 0) {
      await new Promise((resolve) => setTimeout(resolve, response.latency_ms));
    }

    if ('error' in response) {
      throw response.error;
    }

    return {
      content: response.content,
      tokens_input: Math.ceil(prompt.length / 4),
      tokens_output: Math.ceil(response.content.length / 4),
      latency_ms: response.latency_ms ?? 0,
      model_version: `${options.model}-mock`,
    };
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }

  async listModels(): Promise<string[]> {
    return [...this.models];
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  /**
   * Reset the adapter to ready state (for testing).
   */
  reset(): void {
    this.ready = true;
    this.calls.length = 0;
  }

  private resolve(prompt: string, call: number, options: TransformOptions): MockResponse {
    const queued = this.queued.shift();
    if (queued) {
      return queued;
    }

    for (const [substring, resp] of this.substringMatches) {
      if (prompt.includes(substring)) {
        return resp;
      }
    }

    switch (this.defaultBehavior.type) {
      case 'error':
        throw new InferenceError(
          'INFERENCE_ERROR',
          `No mock response for prompt hash: ${hashString(prompt)}`,
          false,
          { prompt_preview: prompt.slice(0, 100) }
        );
      case 'echo':
        return { content: prompt };
      case 'fixed':
        return { content: this.defaultBehavior.content };
      case 'handler':
        return this.defaultBehavior.handler(prompt, call, options);
    }
  }
}

function hashString(s: string): string {
  return createHash('sha256').update(s, 'utf-8').digest('hex');
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a mock adapter that echoes prompts back.
 */
export function createEchoAdapter(options?: Omit<MockModelAdapterOptions, 'default_behavior'>): MockModelAdapter {
  return new MockModelAdapter({
    ...options,
    default_behavior: { type: 'echo' },
  });
}

/**
 * Create a mock adapter that returns a fixed response.
 */
export function createFixedAdapter(
  content: string,
  options?: Omit<MockModelAdapterOptions, 'default_behavior'>
): MockModelAdapter {
  return new MockModelAdapter({
    ...options,
    default_behavior: { type: 'fixed', content },
  });
}

/**
 * Create a mock adapter driven by a handler function.
 */
export function createHandlerAdapter(
  handler: MockHandler,
  options?: Omit<MockModelAdapterOptions, 'default_behavior'>
): MockModelAdapter {
  return new MockModelAdapter({
    ...options,
    default_behavior: { type: 'handler', handler },
  });
}
