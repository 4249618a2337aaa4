export const SUPPORTED_PROVIDERS = ['anthropic', 'openai', 'google', 'groq', 'mistral', 'ollama'] as const;

export type ProviderName = (typeof SUPPORTED_PROVIDERS)[number];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4',
  google: 'gemini-2.0-flash',
  groq: 'llama3-8b-8192',
  mistral: 'mistral-small-latest',
  ollama: 'llama3',
};

export function isSupportedProvider(name: string): name is ProviderName {
  return (SUPPORTED_PROVIDERS as readonly string[]).includes(name);
}

export interface ChatRequest {
  provider: ProviderName;
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/** One chat completion, answered with the model's text. */
export interface ChatClient {
  complete(req: ChatRequest): Promise<string>;
}

export type ProviderRequest = Omit<ChatRequest, 'provider'>;

export interface ProviderAdapter {
  chat(req: ProviderRequest): Promise<string>;
}
