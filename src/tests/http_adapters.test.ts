/**
 * HTTP Adapter Tests
 * ==================
 *
 * OllamaAdapter and OpenAICompatibleAdapter against an in-process server:
 * request shape, response mapping and the error taxonomy.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';

import { OllamaAdapter, createOllamaAdapter, isOllamaAvailable } from '../adapters/ollama.js';
import { OpenAICompatibleAdapter } from '../adapters/openai.js';
import { InferenceError, type TransformOptions } from '../adapters/model.js';
import { closedPortUrl, sendJson, startServer, type TestServer } from './utils/http.js';

const OPTIONS: TransformOptions = { model: 'llama3.2', temperature: 0.3, timeout_ms: 2000 };
const CONTENT = '[{"question": "Q?", "options": ["a", "b", "c", "d"], "answer": 0, "explanation": "e"}]';

function isInferenceError(code: InferenceError['code'], retryable: boolean, status?: number) {
  return (err: unknown): boolean => {
    if (!(err instanceof InferenceError)) return false;
    assert.equal(err.code, code);
    assert.equal(err.retryable, retryable);
    if (status !== undefined) assert.equal(err.details?.status, status);
    return true;
  };
}

// =============================================================================
// Ollama
// =============================================================================

describe('OllamaAdapter', () => {
  let server: TestServer;

  before(async () => {
    server = await startServer((request, res) => {
      if (request.url === '/api/tags') {
        sendJson(res, 200, { models: [{ name: 'llama3.2:latest' }, { name: 'mistral' }] });
        return;
      }
      const body = request.body;
      const model = typeof body === 'object' && body !== null && 'model' in body ? body.model : undefined;
      switch (model) {
        case 'llama3.2':
          sendJson(res, 200, {
            model: 'llama3.2:latest',
            created_at: '2024-06-01T00:00:00Z',
            response: CONTENT,
            done: true,
            prompt_eval_count: 12,
            eval_count: 34,
          });
          return;
        case 'broken':
          sendJson(res, 500, { error: 'runner crashed' });
          return;
        case 'missing':
          sendJson(res, 404, { error: "model 'missing' not found" });
          return;
        case 'hollow':
          sendJson(res, 200, { model: 'hollow', done: true });
          return;
        case 'slow':
          // never answers
          return;
        default:
          sendJson(res, 400, { error: 'unexpected model' });
      }
    });
  });

  after(async () => {
    await server.close();
  });

  it('posts a non-streaming generate request', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url, num_predict: 512 });

    await adapter.transform('Write questions.', OPTIONS);

    const request = server.requests.find((r) => r.url === '/api/generate');
    assert.deepEqual(request?.body, {
      model: 'llama3.2',
      prompt: 'Write questions.',
      stream: false,
      options: { temperature: 0.3, num_predict: 512 },
    });
  });

  it('maps the response', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url });

    const result = await adapter.transform('Write questions.', OPTIONS);

    assert.equal(result.content, CONTENT);
    assert.equal(result.model_version, 'llama3.2:latest');
    assert.equal(result.tokens_input, 12);
    assert.equal(result.tokens_output, 34);
  });

  it('treats server errors as retryable', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'broken' }),
      isInferenceError('INFERENCE_ERROR', true, 500)
    );
  });

  it('treats an unknown model as final', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'missing' }),
      (err: unknown) =>
        isInferenceError('INFERENCE_ERROR', false, 404)(err) &&
        err instanceof Error &&
        err.message === "Model 'missing' not found. Run: ollama pull missing"
    );
  });

  it('rejects a body without response text', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'hollow' }),
      isInferenceError('INFERENCE_ERROR', true)
    );
  });

  it('times out slow calls', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'slow', timeout_ms: 50 }),
      isInferenceError('INFERENCE_TIMEOUT', true)
    );
  });

  it('reports an unreachable server as unavailable', async () => {
    const adapter = new OllamaAdapter({ base_url: await closedPortUrl() });

    await assert.rejects(() => adapter.transform('p', OPTIONS), isInferenceError('INFERENCE_UNAVAILABLE', true));
    assert.equal(await adapter.isReady(), false);
    assert.deepEqual(await adapter.listModels(), []);
  });

  it('probes availability', async () => {
    assert.equal(await isOllamaAvailable(server.url), true);
    assert.equal(await isOllamaAvailable(await closedPortUrl()), false);
  });

  it('creates adapters for a base URL', () => {
    assert.equal(createOllamaAdapter(`${server.url}/`).endpoint, server.url);
  });

  it('lists models and reports readiness', async () => {
    const adapter = new OllamaAdapter({ base_url: server.url });

    assert.equal(await adapter.isReady(), true);
    assert.deepEqual(await adapter.listModels(), ['llama3.2:latest', 'mistral']);

    await adapter.shutdown();
    assert.equal(await adapter.isReady(), false);
  });
});

// =============================================================================
// OpenAI-compatible
// =============================================================================

describe('OpenAICompatibleAdapter', () => {
  let server: TestServer;

  before(async () => {
    server = await startServer((request, res) => {
      if (request.url === '/v1/models') {
        sendJson(res, 200, {
          object: 'list',
          data: [{ id: 'llama3.2', object: 'model', created: 0, owned_by: 'local' }],
        });
        return;
      }
      const body = request.body;
      const model = typeof body === 'object' && body !== null && 'model' in body ? body.model : undefined;
      switch (model) {
        case 'llama3.2':
          sendJson(res, 200, {
            id: 'chatcmpl-1',
            object: 'chat.completion',
            created: 0,
            model: 'llama3.2',
            choices: [
              { index: 0, message: { role: 'assistant', content: CONTENT }, finish_reason: 'stop' },
            ],
            usage: { prompt_tokens: 20, completion_tokens: 40, total_tokens: 60 },
          });
          return;
        case 'broken':
          sendJson(res, 500, { error: { message: 'runner crashed' } });
          return;
        case 'missing':
          sendJson(res, 404, { error: { message: 'model not found' } });
          return;
        case 'slow':
          // never answers
          return;
        default:
          sendJson(res, 400, { error: { message: 'unexpected model' } });
      }
    });
  });

  after(async () => {
    await server.close();
  });

  it('sends one user message to chat completions', async () => {
    const adapter = new OpenAICompatibleAdapter({ base_url: `${server.url}/v1`, api_key: 'test-secret' });

    const result = await adapter.transform('Write questions.', OPTIONS);

    const request = server.requests.find((r) => r.url === '/v1/chat/completions');
    assert.deepEqual(request?.body, {
      model: 'llama3.2',
      max_tokens: 2048,
      temperature: 0.3,
      stream: false,
      messages: [{ role: 'user', content: 'Write questions.' }],
    });
    assert.equal(result.content, CONTENT);
    assert.equal(result.model_version, 'llama3.2');
    assert.equal(result.tokens_input, 20);
    assert.equal(result.tokens_output, 40);
  });

  it('treats server errors as retryable', async () => {
    const adapter = new OpenAICompatibleAdapter({ base_url: `${server.url}/v1`, api_key: 'test-secret' });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'broken' }),
      isInferenceError('INFERENCE_ERROR', true, 500)
    );
  });

  it('treats client errors as final', async () => {
    const adapter = new OpenAICompatibleAdapter({ base_url: `${server.url}/v1`, api_key: 'test-secret' });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'missing' }),
      isInferenceError('INFERENCE_ERROR', false, 404)
    );
  });

  it('times out slow calls', async () => {
    const adapter = new OpenAICompatibleAdapter({ base_url: `${server.url}/v1`, api_key: 'test-secret' });

    await assert.rejects(
      () => adapter.transform('p', { ...OPTIONS, model: 'slow', timeout_ms: 50 }),
      isInferenceError('INFERENCE_TIMEOUT', true)
    );
  });

  it('reports an unreachable server as unavailable', async () => {
    const adapter = new OpenAICompatibleAdapter({ base_url: `${await closedPortUrl()}/v1`, api_key: 'test-secret' });

    await assert.rejects(() => adapter.transform('p', OPTIONS), isInferenceError('INFERENCE_UNAVAILABLE', true));
    assert.equal(await adapter.isReady(), false);
  });

  it('lists models', async () => {
    const adapter = new OpenAICompatibleAdapter({ base_url: `${server.url}/v1`, api_key: 'test-secret' });

    assert.equal(await adapter.isReady(), true);
    assert.deepEqual(await adapter.listModels(), ['llama3.2']);
  });
});
