import { z } from 'zod';

import { ProviderError } from '../errors.js';
import type { ProviderAdapter, ProviderRequest } from './types.js';

const FETCH_TIMEOUT_MS = 120_000;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string().optional(), type: z.string().optional() }),
});

/** Providers that speak the OpenAI `/chat/completions` dialect (OpenAI, Groq, Mistral, ollama). */
export class OpenAiCompatibleAdapter implements ProviderAdapter {
  constructor(
    private readonly provider: string,
    private readonly baseUrl: string,
    private readonly apiKey: string | undefined
  ) {}

  async chat(req: ProviderRequest): Promise<string> {
    const url = this.baseUrl.replace(/\/+$/, '') + '/chat/completions';
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers,
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        body: JSON.stringify({
          model: req.model,
          messages: [
            { role: 'system', content: req.system },
            { role: 'user', content: req.user },
          ],
          temperature: req.temperature,
          max_tokens: req.maxTokens,
        }),
      });
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ProviderError(`${this.provider} request failed: ${msg}`, this.provider, undefined, { cause: e });
    }

    const json: unknown = await res.json().catch(() => null);

    if (!res.ok) {
      const parsedError = ErrorBodySchema.safeParse(json);
      const detail = parsedError.success ? ` ${parsedError.data.error.message ?? parsedError.data.error.type ?? ''}` : '';
      throw new ProviderError(`${this.provider} request failed: ${res.status}${detail}`.trimEnd(), this.provider, res.status);
    }

    const parsed = ChatCompletionSchema.safeParse(json);
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
    if (typeof content !== 'string') {
      throw new ProviderError(`${this.provider} response had no message content`, this.provider, res.status);
    }
    return content;
  }
}
