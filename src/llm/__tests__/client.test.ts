import { describe, it, expect, vi, afterEach } from 'vitest';
import { LlmClient, joinUrl } from '../client.js';
import { buildScriptMessages } from '../prompts.js';
import { ConfigSchema } from '../../shared/config.js';
import { LlmError } from '../../shared/errors.js';

const llmConfig = ConfigSchema.parse({
  llm: { base_url: 'https://llm.example/v1/', api_key: 'test-secret', model: 'test-model' },
}).llm;

function stubFetch(response: () => Response) {
  const mock = vi.fn((_input: string | URL | Request, _init?: RequestInit) => Promise.resolve(response()));
  vi.stubGlobal('fetch', mock);
  return mock;
}

function completion(content: string | null): Response {
  return new Response(
    JSON.stringify({ model: 'test-model-2025', choices: [{ message: { content } }], usage: { total_tokens: 42 } }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('joinUrl', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('https://llm.example/v1/', '/chat/completions')).toBe('https://llm.example/v1/chat/completions');
  });

  it('defaults to the OpenAI endpoint', () => {
    expect(joinUrl('', '/audio/speech')).toBe('https://api.openai.com/v1/audio/speech');
  });
});

describe('LlmClient', () => {
  it('reports whether an API key is set', () => {
    expect(new LlmClient(llmConfig).isConfigured()).toBe(true);
    expect(new LlmClient({ ...llmConfig, api_key: '' }).isConfigured()).toBe(false);
  });

  it('posts a chat completion request', async () => {
    const mock = stubFetch(() => completion('Hello there.'));
    const client = new LlmClient(llmConfig);

    const result = await client.chat([{ role: 'user', content: 'hi' }]);

    expect(result).toEqual({ content: 'Hello there.', model: 'test-model-2025', token_count: 42 });
    const [url, init] = mock.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.example/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hi' }],
      max_tokens: 4096,
    });
  });

  it('throws on HTTP errors', async () => {
    stubFetch(() => new Response('overloaded', { status: 500, statusText: 'Internal Server Error' }));
    await expect(new LlmClient(llmConfig).chat([])).rejects.toThrow('LLM API error: 500 Internal Server Error');
  });

  it('throws on empty content', async () => {
    stubFetch(() => completion(null));
    await expect(new LlmClient(llmConfig).chat([])).rejects.toThrow('LLM returned empty content');
  });

  it('throws on a non-JSON body', async () => {
    stubFetch(() => new Response('<html>proxy error</html>', { status: 200 }));
    await expect(new LlmClient(llmConfig).chat([])).rejects.toThrow(LlmError);
  });
});

describe('buildScriptMessages', () => {
  it('puts the corpus, topic and length target in the user message', () => {
    const [system, user] = buildScriptMessages({
      renderedCorpus: '## Post\nBody',
      topic: 'climate tech',
      windowDescription: 'the past 1 week (Jan 8 - Jan 15, 2025)',
      targetWords: 1800,
    });

    expect(system?.role).toBe('system');
    expect(system?.content).toContain('UNTRUSTED DATA');
    expect(user?.role).toBe('user');
    expect(user?.content).toContain('Write an audio essay about climate tech in venture capital.');
    expect(user?.content).toContain('## Post\nBody');
    expect(user?.content).toContain('over the past 1 week (Jan 8 - Jan 15, 2025)');
    expect(user?.content).toContain('Target about 1800 words.');
  });
});
