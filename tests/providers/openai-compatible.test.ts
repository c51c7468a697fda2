import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProviderError } from '../../src/errors/index.js';
import { OpenAICompatibleProvider } from '../../src/providers/adapters/openai-compatible.js';
import { completeJson, createProvider, JSON_SYSTEM_PROMPT } from '../../src/providers/provider.js';
import { ScriptedProvider } from '../../src/providers/adapters/scripted.js';
import { memoryLogger } from '../helpers/stubs.js';

function completion(content: string | null, finishReason = 'stop') {
  return new Response(
    JSON.stringify({
      choices: [{ message: { role: 'assistant', content }, finish_reason: finishReason }],
      usage: { prompt_tokens: 12, completion_tokens: 5 },
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function makeProvider() {
  const { logger } = memoryLogger();
  return new OpenAICompatibleProvider(
    { name: 'groq', apiKey: 'test-key', model: 'test-model', baseUrl: 'https://llm.example.test/openai/v1/' },
    { networkConfig: { maxRetries: 1 }, logger },
  );
}

describe('OpenAICompatibleProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a non-streaming chat completion request', async () => {
    const fetchMock = stubFetch(completion('{"ok": true}'));

    await makeProvider().chat([{ role: 'user', content: 'hello' }], { maxTokens: 100 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.example.test/openai/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-key' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hello' }],
      stream: false,
      max_tokens: 100,
    });
  });

  it('uses the model override', async () => {
    const fetchMock = stubFetch(completion('{}'));
    await makeProvider().chat([{ role: 'user', content: 'x' }], { model: 'other-model' });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body)).model).toBe('other-model');
  });

  it('returns content, stop reason and usage', async () => {
    stubFetch(completion('{"a": 1}', 'length'));

    const response = await makeProvider().chat([{ role: 'user', content: 'x' }]);

    expect(response).toEqual({
      content: '{"a": 1}',
      stopReason: 'max_tokens',
      usage: { inputTokens: 12, outputTokens: 5 },
    });
  });

  it('maps a null message content to an empty string', async () => {
    stubFetch(completion(null));
    expect((await makeProvider().chat([{ role: 'user', content: 'x' }])).content).toBe('');
  });

  it('maps HTTP errors to provider errors', async () => {
    stubFetch(new Response('{"error": "invalid api key"}', { status: 401 }));

    const error = await makeProvider()
      .chat([{ role: 'user', content: 'x' }])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error instanceof ProviderError && error.code).toBe('AUTHENTICATION_FAILED');
    expect(error instanceof ProviderError && error.statusCode).toBe(401);
  });

  it('rejects a response without choices', async () => {
    stubFetch(new Response('{"choices": []}', { status: 200 }));
    await expect(makeProvider().chat([{ role: 'user', content: 'x' }])).rejects.toThrow(
      'groq returned a response without choices',
    );
  });
});

describe('provider helpers', () => {
  it('creates a scripted provider', () => {
    const provider = createProvider({ type: 'scripted', responses: ['{}'] });
    expect(provider).toBeInstanceOf(ScriptedProvider);
  });

  it('creates an OpenAI-compatible provider', () => {
    const provider = createProvider({
      type: 'openai-compatible',
      config: { name: 'gemini', apiKey: 'test-key', model: 'gemini-2.5-flash', baseUrl: 'https://llm.example.test' },
    });
    expect(provider.name).toBe('gemini');
    expect(provider.defaultModel).toBe('gemini-2.5-flash');
  });

  it('sends the JSON-only system message', async () => {
    const provider = new ScriptedProvider(['{"x": 1}']);

    expect(await completeJson(provider, 'give me json')).toBe('{"x": 1}');
    expect(provider.calls[0].messages).toEqual([
      { role: 'system', content: JSON_SYSTEM_PROMPT },
      { role: 'user', content: 'give me json' },
    ]);
    expect(provider.calls[0].options).toBeUndefined();
  });

  it('repeats the last scripted reply once the queue runs dry', async () => {
    const provider = new ScriptedProvider(['first', 'second']);
    const replies = [];
    for (let i = 0; i < 3; i++) {
      replies.push((await provider.chat([{ role: 'user', content: 'x' }])).content);
    }
    expect(replies).toEqual(['first', 'second', 'second']);
  });

  it('serves replies queued after construction', async () => {
    const provider = new ScriptedProvider();
    expect((await provider.chat([{ role: 'user', content: 'x' }])).content).toBe('');

    provider.enqueue('{"a": 1}', '{"a": 2}');

    expect((await provider.chat([{ role: 'user', content: 'y' }])).content).toBe('{"a": 1}');
    expect(provider.prompts()).toEqual(['x', 'y']);
  });
});
