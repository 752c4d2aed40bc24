/**
 * OpenAI-Compatible Adapter
 * =========================
 *
 * Adapter for local inference servers that speak the OpenAI chat completions
 * protocol (llama.cpp server, LM Studio, vLLM, Ollama's `/v1` endpoint).
 *
 * Security:
 * - API key from options or environment only (never hardcoded)
 * - Keys never logged or included in errors
 */

import OpenAI from 'openai';
import { createHash } from 'node:crypto';
import {
  type ModelAdapter,
  type TransformOptions,
  type TransformResult,
  InferenceError,
  inferenceErrorFromStatus,
} from './model.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for OpenAICompatibleAdapter.
 */
export interface OpenAICompatibleAdapterOptions {
  /**
   * Base URL including the `/v1` prefix.
   * @default process.env.OPENAI_BASE_URL ?? 'http://localhost:11434/v1'
   */
  base_url?: string;

  /**
   * API key. Local servers usually accept any value.
   * @default process.env.OPENAI_API_KEY ?? 'local'
   */
  api_key?: string;

  /**
   * Maximum tokens to generate per call.
   * @default 2048
   */
  max_tokens?: number;
}

export const DEFAULT_OPENAI_COMPATIBLE_URL = 'http://localhost:11434/v1';

// =============================================================================
// Implementation
// =============================================================================

/**
 * OpenAI-compatible adapter implementing ModelAdapter interface.
 */
export class OpenAICompatibleAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly endpoint: string;

  private readonly client: OpenAI;
  private readonly max_tokens: number;
  private ready: boolean = false;

  constructor(options: OpenAICompatibleAdapterOptions = {}) {
    this.endpoint = (
      options.base_url ??
      process.env.OPENAI_BASE_URL ??
      DEFAULT_OPENAI_COMPATIBLE_URL
    ).replace(/\/+$/, '');
    this.max_tokens = options.max_tokens ?? 2048;

    const hash = createHash('sha256')
      .update(`openai-compatible:${this.endpoint}`)
      .digest('hex')
      .slice(0, 8);
    this.adapter_id = `openai_${hash}`;

    // Retries are owned by the ModelClient, not the SDK
    this.client = new OpenAI({
      apiKey: options.api_key ?? process.env.OPENAI_API_KEY ?? 'local',
      baseURL: this.endpoint,
      maxRetries: 0,
    });

    this.ready = true;
  }

  async transform(
    prompt: string,
    options: TransformOptions
  ): Promise<TransformResult> {
    if (!this.ready) {
      throw new InferenceError(
        'INFERENCE_UNAVAILABLE',
        'Adapter not ready - was it shut down?',
        false
      );
    }

    const start_time = performance.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: options.model,
          max_tokens: this.max_tokens,
          temperature: options.temperature,
          stream: false,
          messages: [
            {
              role: 'user',
              content: prompt,
            },
          ],
        },
        { timeout: options.timeout_ms, maxRetries: 0 }
      );

      const latency_ms = Math.round(performance.now() - start_time);

      return {
        content: response.choices[0]?.message?.content ?? '',
        tokens_input: response.usage?.prompt_tokens ?? 0,
        tokens_output: response.usage?.completion_tokens ?? 0,
        latency_ms,
        model_version: response.model,
      };
    } catch (error) {
      throw this.mapError(error, options);
    }
  }

  async isReady(): Promise<boolean> {
    if (!this.ready) return false;
    try {
      await this.client.models.list({ timeout: 5000, maxRetries: 0 });
      return true;
    } catch {
      return false;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const page = await this.client.models.list({ timeout: 5000, maxRetries: 0 });
      return page.data.map((m) => m.id);
    } catch {
      return [];
    }
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  /**
   * Map SDK errors to InferenceError.
   */
  private mapError(error: unknown, options: TransformOptions): InferenceError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new InferenceError(
        'INFERENCE_TIMEOUT',
        `Request timed out after ${options.timeout_ms}ms`,
        true,
        { timeout_ms: options.timeout_ms }
      );
    }

    if (error instanceof OpenAI.APIConnectionError) {
      return new InferenceError(
        'INFERENCE_UNAVAILABLE',
        `Cannot connect to inference server at ${this.endpoint}`,
        true
      );
    }

    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      if (status === undefined) {
        return new InferenceError('INFERENCE_ERROR', error.message, false);
      }
      return inferenceErrorFromStatus(status, error.message);
    }

    if (error instanceof Error) {
      return new InferenceError('INFERENCE_ERROR', error.message, false);
    }

    return new InferenceError('INFERENCE_ERROR', String(error), false);
  }
}
