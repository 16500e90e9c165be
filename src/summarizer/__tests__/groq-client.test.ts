import { describe, it, expect, vi } from 'vitest';
import { APIError } from 'openai';
import { GroqCompletionClient, classifyCompletionError } from '../groq-client.js';

const OPTIONS = { temperature: 0.7, maxTokens: 400 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completion(choices: unknown[]) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1741987800,
    model: 'llama-test',
    choices,
  };
}

function mockFetch(body: unknown, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(body, status));
}

function makeClient(fetchMock: ReturnType<typeof mockFetch>) {
  return new GroqCompletionClient({
    apiKey: 'test-key',
    model: 'llama-test',
    baseUrl: 'https://api.groq.test/openai/v1',
    timeoutMs: 30000,
    fetch: fetchMock,
  });
}

describe('GroqCompletionClient', () => {
  it('sends the prompt with the model, temperature and token limit', async () => {
    const fetchMock = mockFetch(
      completion([
        { index: 0, message: { role: 'assistant', content: 'Stocks rose.' }, finish_reason: 'stop' },
      ])
    );

    const text = await makeClient(fetchMock).complete('Write a market wrap', OPTIONS);

    expect(text).toBe('Stocks rose.');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe('https://api.groq.test/openai/v1/chat/completions');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: 'llama-test',
      messages: [{ role: 'user', content: 'Write a market wrap' }],
      temperature: 0.7,
      max_tokens: 400,
    });
  });

  it('rejects a reply without choices', async () => {
    const client = makeClient(mockFetch(completion([])));

    await expect(client.complete('prompt', OPTIONS)).rejects.toThrow('Empty response from language model');
  });

  it('rejects a reply with null content', async () => {
    const client = makeClient(
      mockFetch(
        completion([{ index: 0, message: { role: 'assistant', content: null }, finish_reason: 'stop' }])
      )
    );

    await expect(client.complete('prompt', OPTIONS)).rejects.toThrow('Empty response from language model');
  });

  it('makes a single HTTP call on 429 and surfaces the status', async () => {
    const fetchMock = mockFetch({ error: { message: 'Rate limit reached for model' } }, 429);

    const error = await makeClient(fetchMock)
      .complete('prompt', OPTIONS)
      .catch((e: unknown) => e);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({ status: 429 });
    expect(classifyCompletionError(error)).toMatchObject({ kind: 'transient', reason: 'rate-limit' });
  });
});

describe('classifyCompletionError', () => {
  it('treats HTTP 429 from the SDK as rate limiting', () => {
    const error = APIError.generate(429, undefined, 'Too Many Requests', new Headers());

    expect(classifyCompletionError(error)).toMatchObject({ kind: 'transient', reason: 'rate-limit' });
  });

  it('treats 5xx from the SDK as a provider fault', () => {
    const error = APIError.generate(503, undefined, 'Service Unavailable', new Headers());

    expect(classifyCompletionError(error)).toMatchObject({ kind: 'transient', reason: 'server-error' });
  });

  it('lets the SDK status win over the message text', () => {
    const error = APIError.generate(400, undefined, 'context length limit exceeded', new Headers());

    expect(classifyCompletionError(error)).toMatchObject({ kind: 'permanent' });
  });

  it('matches rate limit wording in plain errors', () => {
    expect(classifyCompletionError(new Error('Rate limit reached'))).toEqual({
      kind: 'transient',
      reason: 'rate-limit',
      message: 'Rate limit reached',
    });
    expect(classifyCompletionError(new Error('Tokens per minute LIMIT hit'))).toMatchObject({
      reason: 'rate-limit',
    });
  });

  it('matches internal server error wording in plain errors', () => {
    expect(classifyCompletionError(new Error('Groq: Internal Server Error'))).toEqual({
      kind: 'transient',
      reason: 'server-error',
      message: 'Groq: Internal Server Error',
    });
  });

  it('classifies everything else as permanent', () => {
    expect(classifyCompletionError(new Error('Invalid API Key'))).toEqual({
      kind: 'permanent',
      message: 'Invalid API Key',
    });
    expect(classifyCompletionError('boom')).toEqual({ kind: 'permanent', message: 'boom' });
  });
});
