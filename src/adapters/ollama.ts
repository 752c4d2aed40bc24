/**
 * Ollama Adapter
 * ==============
 *
 * Local model adapter for Ollama.
 *
 * Ollama API: https://github.com/ollama/ollama/blob/main/docs/api.md
 *
 * No SDK required - uses native fetch.
 */

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
 * Options for OllamaAdapter.
 */
export interface OllamaAdapterOptions {
  /**
   * Base URL for Ollama API.
   * @default process.env.OLLAMA_BASE_URL ?? 'http://localhost:11434'
   */
  base_url?: string;

  /**
   * Number of tokens to predict.
   * @default 2048
   */
  num_predict?: number;

  /**
   * Timeout for health and model-list probes in milliseconds.
   * @default 5000
   */
  probe_timeout_ms?: number;
}

/**
 * Fields read from an Ollama `/api/generate` response.
 */
interface OllamaGenerateResponse {
  model?: string;
  response: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Narrow a decoded `/api/generate` body.
 *
 * @throws InferenceError when the body has no `response` text
 */
function readGenerateResponse(body: unknown): OllamaGenerateResponse {
  if (!isRecord(body) || typeof body.response !== 'string') {
    throw new InferenceError(
      'INFERENCE_ERROR',
      'Ollama returned a body without a response field',
      true
    );
  }
  const data: OllamaGenerateResponse = { response: body.response };
  if (typeof body.model === 'string') data.model = body.model;
  const prompt_eval_count = optionalNumber(body.prompt_eval_count);
  if (prompt_eval_count !== undefined) data.prompt_eval_count = prompt_eval_count;
  const eval_count = optionalNumber(body.eval_count);
  if (eval_count !== undefined) data.eval_count = eval_count;
  return data;
}

/**
 * Model names from a decoded `/api/tags` body.
 */
function readModelNames(body: unknown): string[] {
  if (!isRecord(body) || !Array.isArray(body.models)) return [];
  const names: string[] = [];
  for (const model of body.models) {
    if (isRecord(model) && typeof model.name === 'string') names.push(model.name);
  }
  return names;
}

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

// =============================================================================
// Implementation
// =============================================================================

/**
 * Ollama adapter implementing ModelAdapter interface.
 */
export class OllamaAdapter implements ModelAdapter {
  readonly adapter_id: string;
  readonly endpoint: string;

  private readonly num_predict: number;
  private readonly probe_timeout_ms: number;
  private ready: boolean = false;

  constructor(options: OllamaAdapterOptions = {}) {
    this.endpoint = (
      options.base_url ??
      process.env.OLLAMA_BASE_URL ??
      DEFAULT_OLLAMA_URL
    ).replace(/\/+$/, '');
    this.num_predict = options.num_predict ?? 2048;
    this.probe_timeout_ms = options.probe_timeout_ms ?? 5000;

    const hash = createHash('sha256')
      .update(`ollama:${this.endpoint}`)
      .digest('hex')
      .slice(0, 8);
    this.adapter_id = `ollama_${hash}`;

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
    const controller = new AbortController();
    const timeout_id = setTimeout(() => controller.abort(), options.timeout_ms);

    try {
      const response = await fetch(`${this.endpoint}/api/generate`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: options.model,
          prompt,
          stream: false,
          options: {
            temperature: options.temperature,
            num_predict: this.num_predict,
          },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error_text = await response.text();
        if (response.status === 404) {
          throw new InferenceError(
            'INFERENCE_ERROR',
            `Model '${options.model}' not found. Run: ollama pull ${options.model}`,
            false,
            { status: 404, body: error_text.slice(0, 200) }
          );
        }
        throw inferenceErrorFromStatus(
          response.status,
          `Ollama API error ${response.status}: ${error_text.slice(0, 200)}`
        );
      }

      const data = readGenerateResponse(await response.json());
      const latency_ms = Math.round(performance.now() - start_time);

      return {
        content: data.response,
        tokens_input: data.prompt_eval_count ?? 0,
        tokens_output: data.eval_count ?? 0,
        latency_ms,
        model_version: data.model ?? options.model,
      };
    } catch (error) {
      throw this.mapError(error, options);
    } finally {
      clearTimeout(timeout_id);
    }
  }

  async isReady(): Promise<boolean> {
    if (!this.ready) return false;

    try {
      const response = await fetch(`${this.endpoint}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(this.probe_timeout_ms),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async shutdown(): Promise<void> {
    this.ready = false;
  }

  /**
   * List available models on the Ollama server.
   */
  async listModels(): Promise<string[]> {
    try {
      const response = await fetch(`${this.endpoint}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(this.probe_timeout_ms),
      });

      if (!response.ok) {
        return [];
      }

      return readModelNames(await response.json());
    } catch {
      return [];
    }
  }

  /**
   * Map errors to InferenceError.
   */
  private mapError(error: unknown, options: TransformOptions): InferenceError {
    if (error instanceof InferenceError) {
      return error;
    }

    if (error instanceof Error) {
      const message = error.message;

      if (error.name === 'AbortError' || message.includes('aborted')) {
        return new InferenceError(
          'INFERENCE_TIMEOUT',
          `Ollama request timed out after ${options.timeout_ms}ms`,
          true,
          { timeout_ms: options.timeout_ms }
        );
      }

      const cause_code = errorCauseCode(error);
      if (
        message.includes('fetch failed') ||
        cause_code === 'ECONNREFUSED' ||
        cause_code === 'ENOTFOUND' ||
        cause_code === 'ECONNRESET'
      ) {
        return new InferenceError(
          'INFERENCE_UNAVAILABLE',
          `Cannot connect to Ollama at ${this.endpoint}. Is Ollama running?`,
          true,
          cause_code ? { cause: cause_code } : {}
        );
      }

      if (error instanceof SyntaxError) {
        return new InferenceError(
          'INFERENCE_ERROR',
          `Ollama returned an unreadable body: ${message}`,
          true
        );
      }

      return new InferenceError('INFERENCE_ERROR', message, false);
    }

    return new InferenceError('INFERENCE_ERROR', String(error), false);
  }
}

/**
 * Extract the system error code undici attaches as `cause`.
 */
function errorCauseCode(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const code: unknown = cause.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an Ollama adapter with default settings.
 */
export function createOllamaAdapter(base_url?: string): OllamaAdapter {
  return new OllamaAdapter(base_url !== undefined ? { base_url } : {});
}

/**
 * Check if Ollama is available.
 */
export async function isOllamaAvailable(
  base_url: string = DEFAULT_OLLAMA_URL
): Promise<boolean> {
  return new OllamaAdapter({ base_url, probe_timeout_ms: 2000 }).isReady();
}
