import { z } from 'zod';

import { ProviderError } from '../errors.js';
import type { ProviderAdapter, ProviderRequest } from './types.js';

const FETCH_TIMEOUT_MS = 120_000;

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
      })
    )
    .optional(),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string().optional(), status: z.string().optional() }),
});

export class GeminiAdapter implements ProviderAdapter {
  constructor(private readonly apiKey: string) {}

  async chat(req: ProviderRequest): Promise<string> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(req.model)}:generateContent`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          'x-goog-api-key': this.apiKey,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: req.system }] },
          contents: [{ role: 'user', parts: [{ text: req.user }] }],
          generationConfig: { temperature: req.temperature, maxOutputTokens: req.maxTokens },
        }),
      });
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new ProviderError(`google request failed: ${msg}`, 'google', undefined, { cause: e });
    }

    const json: unknown = await res.json().catch(() => null);

    if (!res.ok) {
      const parsedError = ErrorBodySchema.safeParse(json);
      const detail = parsedError.success ? ` ${parsedError.data.error.status ?? ''} ${parsedError.data.error.message ?? ''}` : '';
      throw new ProviderError(`google request failed: ${res.status}${detail}`.trimEnd(), 'google', res.status);
    }

    const parsed = GenerateContentSchema.safeParse(json);
    const parts = parsed.success ? parsed.data.candidates?.[0]?.content?.parts : undefined;
    if (!parts || parts.length === 0) {
      throw new ProviderError('google response had no candidate text', 'google', res.status);
    }
    return parts.map((p) => p.text ?? '').join('');
  }
}
