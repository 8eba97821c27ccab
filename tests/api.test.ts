import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chatHandler from '../api/chat.js';
import imageHandler from '../api/image.js';
import modelsHandler from '../api/models.js';
import performanceHandler from '../api/performance.js';
import type { AutomationDriver, AutomationOutcome } from '../lib/automation-client.js';
import { ConfigValidationError } from '../lib/config.js';
import { silentLogger } from '../lib/logger.js';
import { configureRuntime, resetRuntime, type RuntimeOverrides } from '../lib/runtime.js';
import { InMemorySessionStore } from '../lib/session-store.js';
import { abortError } from '../lib/transport.js';
import {
  DONE,
  createUpstreamFetch,
  deltaEvent,
  jsonResponse,
  makeJwt,
  makeReq,
  makeRes,
  sseResponse,
} from './helpers.js';

const BASE_ENV = { CHAT_BASE_URL: 'https://upstream.test', LOG_LEVEL: 'error' };

function withToken(overrides: Partial<RuntimeOverrides> = {}) {
  return configureRuntime({
    env: { ...BASE_ENV, CHAT_AUTH_TOKEN: makeJwt({ id: 'api-user' }) },
    logger: silentLogger,
    sessions: new InMemorySessionStore(),
    fetch: createUpstreamFetch(() => sseResponse([deltaEvent('Hi there'), DONE])),
    ...overrides,
  });
}

function withoutToken(overrides: Partial<RuntimeOverrides> = {}) {
  return configureRuntime({
    env: { ...BASE_ENV },
    logger: silentLogger,
    sessions: new InMemorySessionStore(),
    ...overrides,
  });
}

beforeEach(() => {
  resetRuntime();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('POST /api/chat', () => {
  it('H1: direct success returns 200 with the reply', async () => {
    await withToken();
    const m = makeRes();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: 'hello' } }), m.res);

    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({
      success: true,
      response: 'Hi there',
      chat_id: 'chat-new-1',
      model: 'qwen3-235b-a22b',
      transport: 'direct',
      warnings: [],
    });
  });

  it('H2: malformed body is a 400', async () => {
    await withToken();
    const m = makeRes();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: 42 } }), m.res);
    expect(m.statusCode()).toBe(400);
    expect(m.body()).toMatchObject({ error: 'Invalid payload format' });
  });

  it('H3: unknown model and empty prompt are 400s with their kind', async () => {
    await withToken();
    const unknown = makeRes();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: 'hello', model_name: 'nope' } }), unknown.res);
    expect(unknown.statusCode()).toBe(400);
    expect(unknown.body()).toEqual({ success: false, error: { kind: 'UnknownModel', message: 'Unknown model: nope' } });

    const empty = makeRes();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: '  ' } }), empty.res);
    expect(empty.statusCode()).toBe(400);
    expect(empty.body()).toMatchObject({ error: { kind: 'EmptyPrompt' } });
  });

  it('H4: other methods are 405', async () => {
    await withToken();
    const m = makeRes();
    await chatHandler(makeReq({ method: 'GET' }), m.res);
    expect(m.statusCode()).toBe(405);
    expect(m.headers.Allow).toBe('POST');
  });

  it('H5: both paths failing is a 502 with the automation error', async () => {
    await withoutToken();
    const m = makeRes();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: 'hello' } }), m.res);

    expect(m.statusCode()).toBe(502);
    expect(m.body()).toMatchObject({
      success: false,
      transport: 'fallback',
      error: { kind: 'AutomationCrashed', message: '[automation] No automation driver configured' },
    });
  });

  it('H6: fallback reply is returned when there is no token', async () => {
    const driver: AutomationDriver = { run: async (job) => ({ text: `echo: ${job.prompt}` }) };
    await withoutToken({ automationDriver: driver });
    const m = makeRes();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: 'hello', chat_id: 'conv-1' } }), m.res);

    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({ response: 'echo: hello', transport: 'fallback', chat_id: 'conv-1' });
  });

  it('H7: client disconnect cancels the dispatch with 499', async () => {
    const run = vi.fn<AutomationDriver['run']>((_job, signal) => new Promise<AutomationOutcome>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(abortError()), { once: true });
    }));
    await withoutToken({ automationDriver: { run } });
    const m = makeRes();

    const pending = chatHandler(makeReq({ method: 'POST', body: { prompt: 'hello' } }), m.res);
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    m.disconnect();
    await pending;

    expect(m.statusCode()).toBe(499);
    expect(m.body()).toMatchObject({ success: false, error: { kind: 'Cancelled' } });
  });
});

describe('POST /api/image', () => {
  it('H8: returns the generated image URL', async () => {
    await withToken({
      fetch: createUpstreamFetch(() => jsonResponse({ choices: [{ message: { content: 'https://cdn.test/fox.png' } }] })),
    });
    const m = makeRes();
    await imageHandler(makeReq({ method: 'POST', body: { prompt: 'a fox' } }), m.res);

    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({
      success: true,
      image_url: 'https://cdn.test/fox.png',
      model: 'qwen-vl-max-latest',
      transport: 'direct',
    });
  });
});

describe('GET /api/models', () => {
  it('H9: lists every model with the defaults', async () => {
    await withToken();
    const m = makeRes();
    await modelsHandler(makeReq({ method: 'GET' }), m.res);

    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({ default_model: 'qwen3-235b-a22b', default_image_model: 'qwen-vl-max-latest' });
    const body = m.body();
    const models = body !== null && typeof body === 'object' && 'models' in body ? body.models : undefined;
    expect(Array.isArray(models) && models.length).toBe(14);
  });

  it('H10: describes one model', async () => {
    await withToken();
    const m = makeRes();
    await modelsHandler(makeReq({ method: 'GET', query: { id: 'qwen3-coder-plus' } }), m.res);

    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({
      model_id: 'qwen3-coder-plus',
      capabilities: { webSearch: true, thinkingMode: true, imageGeneration: false },
      recommended_use: 'Ideal for code generation, debugging, and technical documentation',
    });
  });

  it('H11: unknown id is a 404', async () => {
    await withToken();
    const m = makeRes();
    await modelsHandler(makeReq({ method: 'GET', query: { id: 'ghost' } }), m.res);
    expect(m.statusCode()).toBe(404);
    expect(m.body()).toEqual({ error: 'Unknown model: ghost' });
  });
});

describe('GET /api/performance', () => {
  it('H12: reports counters and direct availability', async () => {
    await withToken();
    await chatHandler(makeReq({ method: 'POST', body: { prompt: 'hello' } }), makeRes().res);

    const m = makeRes();
    await performanceHandler(makeReq({ method: 'GET' }), m.res);
    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({
      direct: { calls: 1, successes: 1 },
      fallback: { calls: 0 },
      totalCalls: 1,
      direct_api_available: true,
    });
  });

  it('H13: direct is unavailable without a token', async () => {
    await withoutToken();
    const m = makeRes();
    await performanceHandler(makeReq({ method: 'GET' }), m.res);
    expect(m.body()).toMatchObject({ direct_api_available: false, directSkips: 0 });
  });
});

describe('file attachments on /api/chat', () => {
  it('H14: files are uploaded on the direct path before the completion', async () => {
    const fetch = createUpstreamFetch((url) => url.includes('/api/v2/files/upload')
      ? jsonResponse({ data: { file_id: 'file-1' } })
      : sseResponse([deltaEvent('summarized'), DONE]));
    await withToken({ fetch });
    const m = makeRes();
    await chatHandler(makeReq({
      method: 'POST',
      body: { prompt: 'summarize', files: [{ name: 'notes.txt', content: 'aGVsbG8=' }] },
    }), m.res);

    expect(m.statusCode()).toBe(200);
    expect(m.body()).toMatchObject({ response: 'summarized', transport: 'direct' });
    expect(fetch.mock.calls.map(([url]) => url)).toContain('https://upstream.test/api/v2/files/upload');
  });

  it('H15: file content that is not base64 is a 400', async () => {
    await withToken();
    const m = makeRes();
    await chatHandler(makeReq({
      method: 'POST',
      body: { prompt: 'summarize', files: [{ name: 'notes.txt', content: 'not base64!' }] },
    }), m.res);
    expect(m.statusCode()).toBe(400);
    expect(m.body()).toMatchObject({ error: 'Invalid payload format' });
  });
});

describe('runtime start failures', () => {
  const badEnv = { DIRECT_TIMEOUT_MS: 'soon' };

  it('H16: chat and image answer 500 with a JSON body when the environment is invalid', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await expect(configureRuntime({ env: badEnv })).rejects.toBeInstanceOf(ConfigValidationError);

    for (const handler of [chatHandler, imageHandler]) {
      const m = makeRes();
      await handler(makeReq({ method: 'POST', body: { prompt: 'hello' } }), m.res);
      expect(m.statusCode()).toBe(500);
      expect(m.body()).toMatchObject({ success: false, error: { kind: 'InternalError' } });
    }
    expect(consoleError).toHaveBeenCalledTimes(2);
  });

  it('H17: models and performance answer 500 as well', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await expect(configureRuntime({ env: badEnv })).rejects.toBeInstanceOf(ConfigValidationError);

    for (const handler of [modelsHandler, performanceHandler]) {
      const m = makeRes();
      await handler(makeReq({ method: 'GET' }), m.res);
      expect(m.statusCode()).toBe(500);
      expect(m.body()).toMatchObject({ success: false, error: { kind: 'InternalError' } });
    }
  });
});

