/**
 * Generate CLI Tests
 * ==================
 *
 * Runs the mcq-generate CLI in process with captured output.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  EXIT_GENERATION_FAILED,
  EXIT_INVALID_INPUT,
  EXIT_IO_ERROR,
  EXIT_OK,
  USAGE,
  run,
  type CliIO,
} from '../generate_cli.js';
import { MockModelAdapter, createFixedAdapter, createHandlerAdapter } from '../../adapters/mock.js';
import type { ModelAdapter } from '../../adapters/model.js';
import { THREE_PARAGRAPHS, questionsResponse, topicOf } from '../../tests/utils/questions.js';

// =============================================================================
// Helper: Run CLI
// =============================================================================

interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  output: unknown;
}

async function runCli(
  args: string[],
  options: { env?: Record<string, string>; adapter?: ModelAdapter } = {}
): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIO = {
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
    env: options.env ?? {},
    logSink: () => {},
  };
  if (options.adapter) io.adapter = options.adapter;

  const exitCode = await run(args, io);
  const text = stdout.join('\n');
  let output: unknown = undefined;
  try {
    output = JSON.parse(text);
  } catch {
    output = text;
  }
  return { stdout: text, stderr: stderr.join('\n'), exitCode, output };
}

// =============================================================================
// Tests
// =============================================================================

describe('mcq-generate CLI', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mcq-cli-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('usage', () => {
    it('prints help', async () => {
      const result = await runCli(['--help']);

      assert.equal(result.exitCode, EXIT_OK);
      assert.equal(result.stdout, USAGE);
    });

    const cases: Array<[string, string[], string]> = [
      ['no input', [], 'Provide a file path or --text'],
      ['an unknown option', ['--verbose'], 'Unknown option: --verbose'],
      ['a file and --text', ['notes.txt', '--text', 'x'], 'Provide either a file path or --text, not both'],
      ['two files', ['a.txt', 'b.txt'], 'Unexpected argument: b.txt'],
      ['a non-integer count', ['--text', 'x', '--count', 'five'], '--count requires an integer'],
      ['a missing value', ['--text'], '--text requires a value'],
      ['an unknown difficulty', ['--text', 'x', '-d', 'expert'], '-d must be easy, medium or hard'],
      ['an unknown provider', ['--text', 'x', '--provider', 'claude'], 'Unknown provider: claude'],
    ];

    for (const [label, args, message] of cases) {
      it(`rejects ${label}`, async () => {
        const result = await runCli(args);

        assert.equal(result.exitCode, EXIT_IO_ERROR);
        assert.deepEqual(result.output, { ok: false, code: 'USAGE', message });
        assert.equal(result.stderr, USAGE);
      });
    }
  });

  describe('generation', () => {
    it('runs a dry run against the echo provider', async () => {
      const result = await runCli(['--provider', 'mock', '--text', 'Cells divide by mitosis.']);

      assert.equal(result.exitCode, EXIT_OK);
      assert.deepEqual(result.output, {
        ok: true,
        mcqs: [
          {
            question: 'Question text here?',
            options: ['Option A', 'Option B', 'Option C', 'Option D'],
            answer: 0,
            explanation: 'Brief explanation of why this is correct',
          },
        ],
        stats: {
          chunks_planned: 1,
          chunks_processed: 1,
          chunks_skipped: 0,
          model_calls: 1,
          reprompts: 0,
          candidates_parsed: 1,
          candidates_dropped_by_parser: 0,
          rejections: { structure: 0, duplicate: 0, near_duplicate: 0 },
          questions_accepted: 1,
          questions_returned: 1,
          completion: 'chunks_exhausted',
        },
      });
    });

    it('generates from a file', async () => {
      const path = join(dir, 'notes.txt');
      await writeFile(path, THREE_PARAGRAPHS, 'utf-8');
      const adapter = createHandlerAdapter((prompt) => ({ content: questionsResponse(topicOf(prompt), 2) }));

      const result = await runCli([path, '-n', '3', '--difficulty', 'hard'], {
        env: { MCQ_MAX_CHUNK_CHARS: '60' },
        adapter,
      });

      assert.equal(result.exitCode, EXIT_OK);
      assert.equal(adapter.callCount, 2);
      assert.ok(adapter.getCalls()[0]?.prompt.includes('at hard difficulty level'));
      assert.match(result.stdout, /"question": "beta fact 1: which statement is true\?"/);
    });

    it('exits with invalid input for blank text', async () => {
      const result = await runCli(['--text', '   '], { adapter: new MockModelAdapter() });

      assert.equal(result.exitCode, EXIT_INVALID_INPUT);
      assert.deepEqual(result.output, { ok: false, code: 'INVALID_INPUT', message: 'Source text is empty' });
    });

    it('exits with invalid input for an unreadable file', async () => {
      const path = join(dir, 'missing.txt');

      const result = await runCli([path], { adapter: new MockModelAdapter() });

      assert.equal(result.exitCode, EXIT_INVALID_INPUT);
      assert.deepEqual(result.output, {
        ok: false,
        code: 'INVALID_INPUT',
        message: `Extraction failed: Cannot read document: ${path}`,
      });
    });

    it('exits with invalid input for bad configuration', async () => {
      const result = await runCli(['--text', 'x'], { env: { MCQ_CONCURRENCY: '7' } });

      assert.equal(result.exitCode, EXIT_INVALID_INPUT);
      assert.deepEqual(result.output, {
        ok: false,
        code: 'CONFIG',
        message: 'concurrency must be an integer in [1, 3], got 7',
      });
    });

    it('exits with generation failed when nothing usable comes back', async () => {
      const adapter = createFixedAdapter('Sorry, no questions.');

      const result = await runCli(['--text', 'Cells divide by mitosis.'], { adapter });

      assert.equal(result.exitCode, EXIT_GENERATION_FAILED);
      assert.deepEqual(result.output, {
        ok: false,
        code: 'GENERATION_FAILED',
        message: 'The model produced no valid questions',
      });
      assert.equal(adapter.callCount, 2);
    });
  });

  describe('describe', () => {
    it('prints the service description', async () => {
      const result = await runCli(['--describe'], { adapter: new MockModelAdapter({ models: ['llama3.2'] }) });

      assert.equal(result.exitCode, EXIT_OK);
      assert.deepEqual(result.output, {
        status: 'running',
        inference_url: 'mock://local',
        provider: 'ollama',
        model: 'llama3.2',
        ready: true,
        models: ['llama3.2'],
      });
    });
  });
});
