/**
 * MCQ Generate CLI
 * ================
 *
 * Generates multiple-choice questions from a text file or inline text and
 * prints them as JSON.
 *
 * Usage:
 *   mcq-generate <path/to/notes.txt> [options]
 *   mcq-generate --text "..." [options]
 *   mcq-generate --describe
 *
 * Exit codes:
 *   0 - Questions generated (possibly fewer than requested)
 *   1 - IO or usage error
 *   2 - Invalid input (empty text, bad parameters, bad configuration)
 *   3 - Generation failed or was cancelled
 *
 * Output (JSON):
 *   { "ok": true, "mcqs": [...], "stats": {...} }
 *   or
 *   { "ok": false, "code": "...", "message": "..." }
 */

import { resolve } from 'node:path';
import { loadConfig, ConfigError, type GenerationConfig } from '../config/index.js';
import { createAdapter, isAdapterProvider } from '../adapters/factory.js';
import type { ModelAdapter } from '../adapters/model.js';
import { createGenerationOrchestrator } from '../generation/orchestrator.js';
import { GenerationError } from '../generation/errors.js';
import { isDifficulty } from '../generation/request.js';
import type { Difficulty, GenerationResult } from '../generation/types.js';
import { PlainTextExtractor, generateFromDocument } from '../extract/index.js';
import { describeService, toMcqPayload } from '../api/handler.js';
import { createMetricsCollector, type LogSink } from '../infra/metrics.js';

// Exit codes
export const EXIT_OK = 0;
export const EXIT_IO_ERROR = 1;
export const EXIT_INVALID_INPUT = 2;
export const EXIT_GENERATION_FAILED = 3;

export const USAGE = `Usage: mcq-generate <path/to/file.txt> [options]
       mcq-generate --text "..." [options]
       mcq-generate --describe

Generates multiple-choice questions from study material using a local model.

Options:
  --text <text>              Use inline text instead of a file
  -n, --count <n>            Number of questions, 1-20 (default: 5)
  -d, --difficulty <level>   easy | medium | hard (default: medium)
  --model <name>             Model name (default: llama3.2)
  --provider <name>          ollama | openai-compatible | mock (default: ollama)
  --base-url <url>           Inference service URL
  --concurrency <n>          Chunks in flight at once, 1-3 (default: 1)
  --describe                 Print service status and available models
  --help, -h                 Show this help message

Exit codes:
  0 - Questions generated
  1 - IO or usage error
  2 - Invalid input
  3 - Generation failed`;

// =============================================================================
// Arguments
// =============================================================================

export interface CliArgs {
  mode: 'generate' | 'describe' | 'help';
  filePath?: string;
  text?: string;
  count: number;
  difficulty: Difficulty;
  overrides: Partial<GenerationConfig>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseInteger(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isInteger(value)) {
    throw new UsageError(`${flag} requires an integer`);
  }
  return value;
}

/**
 * Parse command line arguments.
 *
 * @throws UsageError for unknown options or missing values
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { mode: 'generate', count: 5, difficulty: 'medium', overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const value = (): string => {
      const next = args[++i];
      if (next === undefined) throw new UsageError(`${arg} requires a value`);
      return next;
    };

    if (arg === '--help' || arg === '-h') {
      parsed.mode = 'help';
    } else if (arg === '--describe') {
      parsed.mode = 'describe';
    } else if (arg === '--text') {
      parsed.text = value();
    } else if (arg === '--count' || arg === '-n') {
      parsed.count = parseInteger(arg, value());
    } else if (arg === '--difficulty' || arg === '-d') {
      const difficulty = value();
      if (!isDifficulty(difficulty)) {
        throw new UsageError(`${arg} must be easy, medium or hard`);
      }
      parsed.difficulty = difficulty;
    } else if (arg === '--model') {
      parsed.overrides.model = value();
    } else if (arg === '--provider') {
      const provider = value();
      if (!isAdapterProvider(provider)) {
        throw new UsageError(`Unknown provider: ${provider}`);
      }
      parsed.overrides.provider = provider;
    } else if (arg === '--base-url') {
      parsed.overrides.base_url = value();
    } else if (arg === '--concurrency') {
      parsed.overrides.concurrency = parseInteger(arg, value());
    } else if (!arg.startsWith('-')) {
      if (parsed.filePath !== undefined) {
        throw new UsageError(`Unexpected argument: ${arg}`);
      }
      parsed.filePath = resolve(arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (parsed.mode === 'generate' && parsed.filePath === undefined && parsed.text === undefined) {
    throw new UsageError('Provide a file path or --text');
  }
  if (parsed.filePath !== undefined && parsed.text !== undefined) {
    throw new UsageError('Provide either a file path or --text, not both');
  }

  return parsed;
}

// =============================================================================
// Run
// =============================================================================

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: Record<string, string | undefined>;
  /**
   * Adapter to use instead of one built from configuration.
   */
  adapter?: ModelAdapter;
  /**
   * Log sink; defaults to stderr so stdout stays machine-readable.
   */
  logSink?: LogSink;
  signal?: AbortSignal;
}

function failure(io: CliIO, code: string, message: string, exitCode: number): number {
  io.stdout(JSON.stringify({ ok: false, code, message }, null, 2));
  return exitCode;
}

function success(io: CliIO, result: GenerationResult): number {
  io.stdout(
    JSON.stringify({ ok: true, mcqs: result.questions.map(toMcqPayload), stats: result.stats }, null, 2)
  );
  return EXIT_OK;
}

/**
 * Run the CLI and return the exit code.
 */
export async function run(args: readonly string[], io: CliIO): Promise<number> {
  let parsed: CliArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(USAGE);
    return failure(io, 'USAGE', error.message, EXIT_IO_ERROR);
  }

  if (parsed.mode === 'help') {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  let config: GenerationConfig;
  try {
    config = loadConfig(io.env, parsed.overrides);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    return failure(io, 'CONFIG', error.message, EXIT_INVALID_INPUT);
  }

  const sink: LogSink =
    io.logSink ?? ((entry) => io.stderr(`[${entry.component}] ${entry.level}: ${entry.message}`));
  const metrics = createMetricsCollector('mcq-generate', { sink });
  const adapter =
    io.adapter ??
    createAdapter({ provider: config.provider, base_url: config.base_url, api_key: config.api_key });

  if (parsed.mode === 'describe') {
    const description = await describeService(config, adapter, metrics);
    io.stdout(JSON.stringify(description.body, null, 2));
    return EXIT_OK;
  }

  const orchestrator = createGenerationOrchestrator(config, { adapter, metrics });
  const options = io.signal ? { signal: io.signal } : {};

  try {
    const result =
      parsed.text !== undefined
        ? await orchestrator.generate(
            { source_text: parsed.text, requested_count: parsed.count, difficulty: parsed.difficulty },
            options
          )
        : await generateFromDocument(
            orchestrator,
            new PlainTextExtractor(),
            { kind: 'file', path: parsed.filePath ?? '' },
            { requested_count: parsed.count, difficulty: parsed.difficulty },
            options
          );
    return success(io, result);
  } catch (error) {
    if (!(error instanceof GenerationError)) throw error;
    const exitCode = error.code === 'INVALID_INPUT' ? EXIT_INVALID_INPUT : EXIT_GENERATION_FAILED;
    return failure(io, error.code, error.message, exitCode);
  }
}
