/**
 * Configuration
 * =============
 *
 * Every tunable of the pipeline lives here. Values come from DEFAULT_CONFIG,
 * then environment variables, then explicit overrides, and are validated once.
 *
 * Environment variables:
 *   MCQ_PROVIDER                  ollama | openai-compatible | mock
 *   MCQ_BASE_URL / OLLAMA_BASE_URL
 *   MCQ_API_KEY
 *   MCQ_MODEL                     e.g. llama3.2
 *   MCQ_TEMPERATURE               0.0 - 1.0
 *   MCQ_TIMEOUT_MS
 *   MCQ_MAX_SOURCE_CHARS
 *   MCQ_MAX_CHUNK_CHARS
 *   MCQ_MAX_QUESTIONS_PER_CHUNK
 *   MCQ_CHUNK_RETRY_LIMIT
 *   MCQ_TRANSPORT_RETRY_ATTEMPTS
 *   MCQ_CIRCUIT_FAILURE_THRESHOLD 0 disables the breaker
 *   MCQ_CONCURRENCY               1 - 3
 *   MCQ_SIMILARITY_THRESHOLD      0.0 - 1.0
 *   MCQ_REPROMPT_ON_EMPTY         true | false
 */

import { isAdapterProvider, type AdapterProvider } from '../adapters/factory.js';

// =============================================================================
// Types
// =============================================================================

export interface GenerationConfig {
  provider: AdapterProvider;
  /**
   * Inference service URL; provider default when omitted.
   */
  base_url?: string;
  api_key?: string;
  model: string;
  temperature: number;
  timeout_ms: number;
  /**
   * Upper bound on source text length, in characters.
   */
  max_source_chars: number;
  max_chunk_chars: number;
  max_questions_per_chunk: number;
  /**
   * Extra attempts for a chunk whose inference call failed, before skipping it.
   */
  chunk_retry_limit: number;
  /**
   * Transport attempts per model call (first try included).
   */
  transport_retry_attempts: number;
  retry_initial_delay_ms: number;
  circuit_failure_threshold: number;
  /**
   * Chunks in flight at once; capped at MAX_CONCURRENCY.
   */
  concurrency: number;
  /**
   * Token-overlap ratio at or above which two stems count as duplicates.
   */
  similarity_threshold: number;
  reprompt_on_empty: boolean;
}

type NumericKey = {
  [K in keyof GenerationConfig]-?: GenerationConfig[K] extends number ? K : never;
}[keyof GenerationConfig];

export const MAX_CONCURRENCY = 3;

export const DEFAULT_CONFIG: Readonly<GenerationConfig> = {
  provider: 'ollama',
  model: 'llama3.2',
  temperature: 0.3,
  timeout_ms: 120_000,
  max_source_chars: 200_000,
  max_chunk_chars: 3000,
  max_questions_per_chunk: 5,
  chunk_retry_limit: 1,
  transport_retry_attempts: 2,
  retry_initial_delay_ms: 500,
  circuit_failure_threshold: 5,
  concurrency: 1,
  similarity_threshold: 0.8,
  reprompt_on_empty: true,
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Validation
// =============================================================================

function requireInteger(config: GenerationConfig, key: NumericKey, min: number, max: number): void {
  const value = config[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${key} must be an integer in [${min}, ${max}], got ${String(value)}`, key);
  }
}

function requireRatio(config: GenerationConfig, key: NumericKey): void {
  const value = config[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigError(`${key} must be a number in [0, 1], got ${String(value)}`, key);
  }
}

/**
 * Validate a fully populated configuration.
 *
 * @throws ConfigError naming the first offending key
 */
export function validateConfig(config: GenerationConfig): GenerationConfig {
  if (!isAdapterProvider(config.provider)) {
    throw new ConfigError(`Unknown provider: ${String(config.provider)}`, 'provider');
  }
  if (config.model.trim().length === 0) {
    throw new ConfigError('model must be a non-empty string', 'model');
  }
  if (config.base_url !== undefined && !/^https?:\/\//.test(config.base_url)) {
    throw new ConfigError(`base_url must be an http(s) URL, got ${config.base_url}`, 'base_url');
  }

  requireRatio(config, 'temperature');
  requireRatio(config, 'similarity_threshold');
  requireInteger(config, 'timeout_ms', 1, 3_600_000);
  requireInteger(config, 'max_source_chars', 1, 10_000_000);
  requireInteger(config, 'max_chunk_chars', 50, 1_000_000);
  requireInteger(config, 'max_questions_per_chunk', 1, 20);
  requireInteger(config, 'chunk_retry_limit', 0, 5);
  requireInteger(config, 'transport_retry_attempts', 1, 5);
  requireInteger(config, 'retry_initial_delay_ms', 0, 60_000);
  requireInteger(config, 'circuit_failure_threshold', 0, 100);
  requireInteger(config, 'concurrency', 1, MAX_CONCURRENCY);

  return config;
}

/**
 * Merge overrides onto defaults and validate.
 */
export function resolveConfig(overrides: Partial<GenerationConfig> = {}): GenerationConfig {
  return validateConfig({ ...DEFAULT_CONFIG, ...overrides });
}

// =============================================================================
// Environment
// =============================================================================

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, key: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`, key);
  }
  return value;
}

function readBoolean(env: Env, name: string, key: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`, key);
}

/**
 * Read overrides from environment variables.
 */
export function configFromEnv(env: Env = process.env): Partial<GenerationConfig> {
  const config: Partial<GenerationConfig> = {};

  const provider = env.MCQ_PROVIDER?.trim();
  if (provider) {
    if (!isAdapterProvider(provider)) {
      throw new ConfigError(`MCQ_PROVIDER must be one of ollama, openai-compatible, mock; got "${provider}"`, 'provider');
    }
    config.provider = provider;
  }

  const base_url = env.MCQ_BASE_URL?.trim() || env.OLLAMA_BASE_URL?.trim();
  if (base_url) config.base_url = base_url;

  const api_key = env.MCQ_API_KEY?.trim();
  if (api_key) config.api_key = api_key;

  const model = env.MCQ_MODEL?.trim();
  if (model) config.model = model;

  const numeric: Array<[string, NumericKey]> = [
    ['MCQ_TEMPERATURE', 'temperature'],
    ['MCQ_TIMEOUT_MS', 'timeout_ms'],
    ['MCQ_MAX_SOURCE_CHARS', 'max_source_chars'],
    ['MCQ_MAX_CHUNK_CHARS', 'max_chunk_chars'],
    ['MCQ_MAX_QUESTIONS_PER_CHUNK', 'max_questions_per_chunk'],
    ['MCQ_CHUNK_RETRY_LIMIT', 'chunk_retry_limit'],
    ['MCQ_TRANSPORT_RETRY_ATTEMPTS', 'transport_retry_attempts'],
    ['MCQ_CIRCUIT_FAILURE_THRESHOLD', 'circuit_failure_threshold'],
    ['MCQ_CONCURRENCY', 'concurrency'],
    ['MCQ_SIMILARITY_THRESHOLD', 'similarity_threshold'],
  ];
  for (const [name, key] of numeric) {
    const value = readNumber(env, name, key);
    if (value !== undefined) config[key] = value;
  }

  const reprompt = readBoolean(env, 'MCQ_REPROMPT_ON_EMPTY', 'reprompt_on_empty');
  if (reprompt !== undefined) config.reprompt_on_empty = reprompt;

  return config;
}

/**
 * Defaults, then environment, then explicit overrides; validated.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Partial<GenerationConfig> = {}
): GenerationConfig {
  return resolveConfig({ ...configFromEnv(env), ...overrides });
}
