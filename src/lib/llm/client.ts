import { ConfigError } from '../errors.js';
import { AnthropicAdapter } from './anthropic.js';
import { GeminiAdapter } from './gemini.js';
import { OpenAiCompatibleAdapter } from './openai-compatible.js';
import type { ChatClient, ChatRequest, ProviderAdapter, ProviderName } from './types.js';

const OPENAI_COMPATIBLE_BASE_URLS = {
  openai: 'https://api.openai.com/v1',
  groq: 'https://api.groq.com/openai/v1',
  mistral: 'https://api.mistral.ai/v1',
  ollama: 'http://localhost:11434/v1',
} as const;

export interface ChatClientOptions {
  /** API key per provider. ollama runs without one. */
  apiKeys: Partial<Record<ProviderName, string>>;
  /** Replaces the default endpoint of an OpenAI-compatible provider. */
  baseUrl?: string | undefined;
}

/**
 * Routes each request to the adapter for its provider. Adapters are built on
 * first use so a run only needs credentials for the provider it talks to.
 */
class ProviderChatClient implements ChatClient {
  private readonly adapters = new Map<ProviderName, ProviderAdapter>();

  constructor(private readonly opts: ChatClientOptions) {}

  async complete(req: ChatRequest): Promise<string> {
    const { provider, ...rest } = req;
    return this.adapterFor(provider).chat(rest);
  }

  private adapterFor(provider: ProviderName): ProviderAdapter {
    const existing = this.adapters.get(provider);
    if (existing) return existing;
    const adapter = this.build(provider);
    this.adapters.set(provider, adapter);
    return adapter;
  }

  private build(provider: ProviderName): ProviderAdapter {
    const apiKey = this.opts.apiKeys[provider];
    switch (provider) {
      case 'anthropic':
        return new AnthropicAdapter(this.requireKey(provider, apiKey));
      case 'google':
        return new GeminiAdapter(this.requireKey(provider, apiKey));
      case 'ollama':
        return new OpenAiCompatibleAdapter(provider, this.opts.baseUrl ?? OPENAI_COMPATIBLE_BASE_URLS.ollama, apiKey);
      case 'openai':
      case 'groq':
      case 'mistral':
        return new OpenAiCompatibleAdapter(
          provider,
          this.opts.baseUrl ?? OPENAI_COMPATIBLE_BASE_URLS[provider],
          this.requireKey(provider, apiKey)
        );
    }
  }

  private requireKey(provider: ProviderName, apiKey: string | undefined): string {
    if (!apiKey) throw new ConfigError(`No API key for provider '${provider}'`);
    return apiKey;
  }
}

export function createChatClient(opts: ChatClientOptions): ChatClient {
  return new ProviderChatClient(opts);
}
