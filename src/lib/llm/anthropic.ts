import Anthropic from '@anthropic-ai/sdk';

import { ProviderError } from '../errors.js';
import type { ProviderAdapter, ProviderRequest } from './types.js';

export class AnthropicAdapter implements ProviderAdapter {
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async chat(req: ProviderRequest): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: req.model,
        max_tokens: req.maxTokens,
        temperature: req.temperature,
        system: req.system,
        messages: [{ role: 'user', content: req.user }],
      });
    } catch (e) {
      const status = e instanceof Anthropic.APIError ? e.status : undefined;
      const msg = e instanceof Error ? e.message : String(e);
      throw new ProviderError(`anthropic request failed: ${msg}`, 'anthropic', status, { cause: e });
    }

    const block = response.content.find((b) => b.type === 'text');
    if (block?.type !== 'text') {
      throw new ProviderError('anthropic response had no text block', 'anthropic');
    }
    return block.text;
  }
}
