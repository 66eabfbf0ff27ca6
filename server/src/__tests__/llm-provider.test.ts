import { describe, it, expect, vi } from 'vitest';
import { ProviderHttpError } from '../lib/errors.js';
import { classifyFailure } from '../lib/failure-classifier.js';
import { OpenRouterProvider, createCombinedAbortSignal } from '../lib/llm-provider.js';
import { PerplexityClient } from '../lib/perplexity.js';
import { jsonResponse } from './llm-fakes.js';

const params = {
  model: 'gen-model',
  system: 'sys',
  messages: [{ role: 'user' as const, content: 'hello' }],
  max_tokens: 256,
};

describe('OpenRouterProvider', () => {
  it('posts an OpenAI-style request and maps the reply', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ choices: [{ message: { content: 'hi there' } }], usage: { prompt_tokens: 5, completion_tokens: 2 } }),
    );
    const provider = new OpenRouterProvider({ apiKey: 'test-key', baseUrl: 'https://llm.example/api/v1/', fetch: fetchImpl });

    const response = await provider.chat(params);

    expect(response).toEqual({ text: 'hi there', usage: { input_tokens: 5, output_tokens: 2 } });
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://llm.example/api/v1/chat/completions');
    expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gen-model',
      max_tokens: 256,
      temperature: 0.2,
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  it('surfaces status and Retry-After on an error response', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse('slow down', 429, { 'Retry-After': '5' }));
    const provider = new OpenRouterProvider({ apiKey: 'test-key', baseUrl: 'https://llm.example/api/v1', fetch: fetchImpl });

    const error: unknown = await provider.chat(params).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderHttpError);
    expect(classifyFailure(error)).toMatchObject({
      decision: 'retryable',
      category: 'service_overload',
      retryAfterMs: 5_000,
      status: 429,
    });
  });

  it('returns empty text when the reply has no choices', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({}));
    const provider = new OpenRouterProvider({ apiKey: 'test-key', baseUrl: 'https://llm.example/api/v1', fetch: fetchImpl });

    expect(await provider.chat(params)).toEqual({ text: '', usage: { input_tokens: 0, output_tokens: 0 } });
  });
});

describe('PerplexityClient', () => {
  it('returns text and citations', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ choices: [{ message: { content: 'answer' } }], citations: ['https://example.com/a'] }),
    );
    const client = new PerplexityClient('test-key', 'sonar', fetchImpl);

    const result = await client.query([{ role: 'user', content: 'q' }], { max_tokens: 100 });

    expect(result).toEqual({ text: 'answer', citations: ['https://example.com/a'] });
    expect(JSON.parse(String(fetchImpl.mock.calls[0][1]?.body))).toMatchObject({ model: 'sonar', max_tokens: 100 });
  });

  it('throws a classified quota error on 402', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse('out of credits', 402));
    const client = new PerplexityClient('test-key', 'sonar', fetchImpl);

    const error: unknown = await client.query([{ role: 'user', content: 'q' }]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderHttpError);
    expect(classifyFailure(error).category).toBe('quota_error');
  });
});

describe('createCombinedAbortSignal', () => {
  it('follows the caller signal', () => {
    const caller = new AbortController();
    const { signal, cleanup } = createCombinedAbortSignal(caller.signal, 10_000);

    caller.abort(new Error('caller gave up'));

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toEqual(new Error('caller gave up'));
    cleanup();
  });

  it('aborts on its own timeout', async () => {
    const { signal, cleanup } = createCombinedAbortSignal(undefined, 5);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(signal.aborted).toBe(true);
    cleanup();
  });
});
