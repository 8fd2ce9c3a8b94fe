// Anthropic provider: Messages API over plain fetch.

import { LlmVerdictProvider, field } from './llm';
import type { LlmOptions } from './llm';

export const ANTHROPIC_BASE = 'https://api.anthropic.com/v1';
export const ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';
const API_VERSION = '2023-06-01';

export class AnthropicVerdictProvider extends LlmVerdictProvider {
  readonly id = 'anthropic';
  readonly name: string;
  protected readonly envKey = 'ANTHROPIC_API_KEY';

  constructor(opts: Partial<LlmOptions> & { apiKey: string | null }) {
    const full: LlmOptions = {
      apiKey: opts.apiKey,
      model: opts.model || ANTHROPIC_MODEL,
      baseUrl: opts.baseUrl || ANTHROPIC_BASE,
      timeoutMs: opts.timeoutMs ?? 15_000,
    };
    super(full);
    this.name = `Anthropic (${full.model})`;
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const data = await this.post('/messages', {
      'x-api-key': this.opts.apiKey ?? '',
      'anthropic-version': API_VERSION,
    }, {
      model: this.opts.model,
      max_tokens: maxTokens,
      temperature: 0.7,
      messages: [{ role: 'user', content: prompt }],
    });
    const blocks = field(data, 'content');
    const text = Array.isArray(blocks) ? field(blocks[0], 'text') : undefined;
    if (typeof text !== 'string') throw new Error('Unexpected response shape from Anthropic');
    return text;
  }
}
