/**
 * API Handler Tests
 * =================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  STATUS_CANCELLED,
  describeService,
  handleGenerateRequest,
  parseGeneratePayload,
} from '../handler.js';
import { GenerationOrchestrator, createGenerationOrchestrator } from '../../generation/orchestrator.js';
import type { GenerationResult } from '../../generation/types.js';
import type { GenerationConfig } from '../../config/index.js';
import { ModelClient } from '../../adapters/client.js';
import { MockModelAdapter, createEchoAdapter, createHandlerAdapter, type MockHandler } from '../../adapters/mock.js';
import { InferenceError } from '../../adapters/model.js';
import {
  THREE_PARAGRAPHS,
  questionsResponse,
  quietMetrics,
  testConfig,
  topicOf,
} from '../../tests/utils/questions.js';

function setup(handler: MockHandler, overrides: Partial<GenerationConfig> = {}) {
  const adapter = createHandlerAdapter(handler);
  const metrics = quietMetrics('api');
  const orchestrator = createGenerationOrchestrator(testConfig(overrides), { adapter, metrics: quietMetrics() });
  return { adapter, metrics, orchestrator };
}

const twoPerChunk: MockHandler = (prompt) => ({ content: questionsResponse(topicOf(prompt), 2) });

// =============================================================================
// Payload
// =============================================================================

describe('parseGeneratePayload', () => {
  it('applies defaults', () => {
    assert.deepEqual(parseGeneratePayload({ text: 'Cells divide.' }), {
      ok: true,
      request: { source_text: 'Cells divide.', requested_count: 5, difficulty: 'medium' },
    });
  });

  const cases: Array<[string, unknown, string]> = [
    ['a non-object body', ['text'], 'Request body must be a JSON object'],
    ['null', null, 'Request body must be a JSON object'],
    ['a missing text', {}, 'text must be a string'],
    ['a numeric text', { text: 42 }, 'text must be a string'],
    ['a blank text', { text: '  \n' }, 'Text cannot be empty'],
    ['zero questions', { text: 'x', n_questions: 0 }, 'Number of questions must be between 1 and 20'],
    ['too many questions', { text: 'x', n_questions: 21 }, 'Number of questions must be between 1 and 20'],
    ['a string count', { text: 'x', n_questions: '5' }, 'Number of questions must be between 1 and 20'],
    ['an unknown difficulty', { text: 'x', difficulty: 'expert' }, 'Difficulty must be easy, medium, or hard'],
  ];

  for (const [label, body, detail] of cases) {
    it(`rejects ${label}`, () => {
      assert.deepEqual(parseGeneratePayload(body), {
        ok: false,
        response: { status: 400, body: { code: 'INVALID_INPUT', detail } },
      });
    });
  }
});

// =============================================================================
// Generate
// =============================================================================

describe('handleGenerateRequest', () => {
  it('returns questions with zero-based answers', async () => {
    const { metrics, orchestrator } = setup(twoPerChunk);

    const response = await handleGenerateRequest(
      orchestrator,
      { text: THREE_PARAGRAPHS, n_questions: 2, difficulty: 'easy' },
      { metrics }
    );

    assert.deepEqual(response, {
      status: 200,
      body: {
        mcqs: [
          {
            question: 'alpha fact 1: which statement is true?',
            options: ['alpha A1', 'alpha B1', 'alpha C1', 'alpha D1'],
            answer: 1,
            explanation: 'Stated in the alpha section.',
          },
          {
            question: 'alpha fact 2: which statement is true?',
            options: ['alpha A2', 'alpha B2', 'alpha C2', 'alpha D2'],
            answer: 2,
            explanation: 'Stated in the alpha section.',
          },
        ],
      },
    });
    assert.equal(metrics.getCounter('api_requests', { status: '200' }), 1);
  });

  it('does not consult the model for an invalid payload', async () => {
    const { adapter, metrics, orchestrator } = setup(twoPerChunk);

    const response = await handleGenerateRequest(orchestrator, { text: '' }, { metrics });

    assert.equal(response.status, 400);
    assert.equal(adapter.callCount, 0);
    assert.equal(metrics.getCounter('api_requests', { status: '400' }), 1);
  });

  it('reports oversize text as invalid input', async () => {
    const { orchestrator } = setup(twoPerChunk, { max_source_chars: 100 });

    const response = await handleGenerateRequest(orchestrator, { text: 'x'.repeat(101) });

    assert.deepEqual(response, {
      status: 400,
      body: { code: 'INVALID_INPUT', detail: 'Source text exceeds 100 characters' },
    });
  });

  it('reports an unreachable model server as 503', async () => {
    const { orchestrator } = setup(() => ({
      error: new InferenceError('INFERENCE_UNAVAILABLE', 'connection refused', true),
    }));

    const response = await handleGenerateRequest(orchestrator, { text: THREE_PARAGRAPHS });

    assert.deepEqual(response, {
      status: 503,
      body: {
        code: 'INFERENCE_UNAVAILABLE',
        detail: 'Inference service unavailable. Make sure the model server is running.',
      },
    });
  });

  it('reports unusable model output as 500', async () => {
    const { orchestrator } = setup(() => ({ content: 'No questions today.' }));

    const response = await handleGenerateRequest(orchestrator, { text: THREE_PARAGRAPHS });

    assert.deepEqual(response, {
      status: 500,
      body: {
        code: 'GENERATION_FAILED',
        detail: 'Failed to generate valid MCQs. Check the model or try different text.',
      },
    });
  });

  it('reports cancellation', async () => {
    const { orchestrator } = setup(twoPerChunk);
    const controller = new AbortController();
    controller.abort();

    const response = await handleGenerateRequest(
      orchestrator,
      { text: THREE_PARAGRAPHS },
      { signal: controller.signal }
    );

    assert.equal(response.status, STATUS_CANCELLED);
    assert.deepEqual(response.body, { code: 'CANCELLED', detail: 'Generation cancelled' });
  });

  it('hides unexpected failures behind an internal error', async () => {
    class ExplodingOrchestrator extends GenerationOrchestrator {
      async generate(): Promise<GenerationResult> {
        throw new Error('disk on fire');
      }
    }
    const metrics = quietMetrics('api');
    const orchestrator = new ExplodingOrchestrator(new ModelClient(createEchoAdapter()), testConfig());

    const response = await handleGenerateRequest(orchestrator, { text: 'Cells divide.' }, { metrics });

    assert.deepEqual(response, { status: 500, body: { code: 'INTERNAL_ERROR', detail: 'Internal error' } });
    assert.deepEqual(metrics.getLogs('error')[0]?.context, { error: 'disk on fire' });
  });
});

// =============================================================================
// Describe
// =============================================================================

describe('describeService', () => {
  it('lists models when the server is ready', async () => {
    const adapter = new MockModelAdapter({ models: ['llama3.2', 'mistral'] });

    const response = await describeService(testConfig(), adapter, quietMetrics());

    assert.deepEqual(response, {
      status: 200,
      body: {
        status: 'running',
        inference_url: 'mock://local',
        provider: 'mock',
        model: 'llama3.2',
        ready: true,
        models: ['llama3.2', 'mistral'],
      },
    });
  });

  it('reports a degraded service when the server is not ready', async () => {
    const adapter = new MockModelAdapter();
    await adapter.shutdown();

    const response = await describeService(testConfig(), adapter, quietMetrics());

    assert.equal(response.body.status, 'degraded');
    assert.equal(response.body.ready, false);
    assert.deepEqual(response.body.models, []);
  });

  it('still answers when models cannot be listed', async () => {
    class UnlistableAdapter extends MockModelAdapter {
      async listModels(): Promise<string[]> {
        throw new InferenceError('INFERENCE_ERROR', 'tags endpoint missing', false, { status: 404 });
      }
    }
    const metrics = quietMetrics();

    const response = await describeService(testConfig(), new UnlistableAdapter(), metrics);

    assert.equal(response.body.status, 'running');
    assert.deepEqual(response.body.models, []);
    assert.equal(metrics.getLogs('warn')[0]?.message, 'Could not list models');
  });
});
