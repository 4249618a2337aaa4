import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const createMock = vi.hoisted(() => vi.fn());

vi.mock('@anthropic-ai/sdk', () => {
  class APIError extends Error {
    status = 529;
  }
  class Anthropic {
    static APIError = APIError;
    messages = { create: createMock };
  }
  return { default: Anthropic };
});

import { ConfigError, ProviderError } from '../errors.js';
import { createChatClient } from './client.js';
import type { ChatRequest } from './types.js';

function request(provider: ChatRequest['provider'], model: string): ChatRequest {
  return { provider, model, system: 'Summarize.', user: 'paper text', temperature: 0.3, maxTokens: 200 };
}

function okJson(body: unknown) {
  return { ok: true, status: 200, json: async () => body };
}

describe('createChatClient', () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
    createMock.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('calls OpenAI chat completions and returns the content verbatim', async () => {
    mockFetch.mockResolvedValue(okJson({ choices: [{ message: { content: ' It works.\n' } }] }));
    const client = createChatClient({ apiKeys: { openai: 'test-secret' } });

    const text = await client.complete(request('openai', 'gpt-4'));

    expect(text).toBe(' It works.\n');
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(init.body)).toEqual({
      model: 'gpt-4',
      messages: [
        { role: 'system', content: 'Summarize.' },
        { role: 'user', content: 'paper text' },
      ],
      temperature: 0.3,
      max_tokens: 200,
    });
  });

  it('routes groq and ollama to their own endpoints', async () => {
    mockFetch.mockResolvedValue(okJson({ choices: [{ message: { content: 'ok' } }] }));
    const client = createChatClient({ apiKeys: { groq: 'test-secret' } });

    await client.complete(request('groq', 'llama3-8b-8192'));
    await client.complete(request('ollama', 'llama3'));

    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(mockFetch.mock.calls[1]?.[0]).toBe('http://localhost:11434/v1/chat/completions');
    expect(mockFetch.mock.calls[1]?.[1].headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('honours a base url override', async () => {
    mockFetch.mockResolvedValue(okJson({ choices: [{ message: { content: 'ok' } }] }));
    const client = createChatClient({ apiKeys: {}, baseUrl: 'http://gpu-box:11434/v1/' });

    await client.complete(request('ollama', 'llama3'));

    expect(mockFetch.mock.calls[0]?.[0]).toBe('http://gpu-box:11434/v1/chat/completions');
  });

  it('turns an error response into a ProviderError', async () => {
    mockFetch.mockResolvedValue({
      ok: false,
      status: 401,
      json: async () => ({ error: { message: 'Invalid API key', type: 'invalid_request_error' } }),
    });
    const client = createChatClient({ apiKeys: { openai: 'test-secret' } });

    const err = await client.complete(request('openai', 'gpt-4')).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toHaveProperty('message', 'openai request failed: 401 Invalid API key');
    expect(err).toHaveProperty('status', 401);
  });

  it('rejects a response without message content', async () => {
    mockFetch.mockResolvedValue(okJson({ choices: [] }));
    const client = createChatClient({ apiKeys: { openai: 'test-secret' } });

    await expect(client.complete(request('openai', 'gpt-4'))).rejects.toThrow('openai response had no message content');
  });

  it('calls Gemini generateContent', async () => {
    mockFetch.mockResolvedValue(okJson({ candidates: [{ content: { parts: [{ text: 'Part one. ' }, { text: 'Part two.' }] } }] }));
    const client = createChatClient({ apiKeys: { google: 'test-secret' } });

    const text = await client.complete(request('google', 'gemini-pro'));

    expect(text).toBe('Part one. Part two.');
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://generativelanguage.googleapis.com/v1beta/models/gemini-pro:generateContent');
    expect(init.headers['x-goog-api-key']).toBe('test-secret');
    expect(JSON.parse(init.body).generationConfig).toEqual({ temperature: 0.3, maxOutputTokens: 200 });
  });

  it('calls Anthropic messages', async () => {
    createMock.mockResolvedValue({ content: [{ type: 'text', text: 'Claude summary.' }] });
    const client = createChatClient({ apiKeys: { anthropic: 'test-secret' } });

    const text = await client.complete(request('anthropic', 'claude-3-sonnet'));

    expect(text).toBe('Claude summary.');
    expect(createMock).toHaveBeenCalledWith({
      model: 'claude-3-sonnet',
      max_tokens: 200,
      temperature: 0.3,
      system: 'Summarize.',
      messages: [{ role: 'user', content: 'paper text' }],
    });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('wraps Anthropic SDK errors', async () => {
    createMock.mockRejectedValue(new Error('overloaded'));
    const client = createChatClient({ apiKeys: { anthropic: 'test-secret' } });

    await expect(client.complete(request('anthropic', 'claude-3-sonnet'))).rejects.toThrow(
      'anthropic request failed: overloaded'
    );
  });

  it('needs a key for hosted providers', async () => {
    const client = createChatClient({ apiKeys: {} });

    await expect(client.complete(request('mistral', 'mistral-small-latest'))).rejects.toBeInstanceOf(ConfigError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
