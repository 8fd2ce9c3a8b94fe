// OpenAI provider: Chat Completions over plain fetch.

import { LlmVerdictProvider, field } from './llm';
import type { LlmOptions } from './llm';

export const OPENAI_BASE = 'https://api.openai.com/v1';
export const OPENAI_MODEL = 'gpt-4o';

export class OpenAIVerdictProvider extends LlmVerdictProvider {
  readonly id = 'openai';
  readonly name: string;
  protected readonly envKey = 'OPENAI_API_KEY';

  constructor(opts: Partial<LlmOptions> & { apiKey: string | null }) {
    const full: LlmOptions = {
      apiKey: opts.apiKey,
      model: opts.model || OPENAI_MODEL,
      baseUrl: opts.baseUrl || OPENAI_BASE,
      timeoutMs: opts.timeoutMs ?? 15_000,
    };
    super(full);
    this.name = `OpenAI (${full.model})`;
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const data = await this.post('/chat/completions', { Authorization: `Bearer ${this.opts.apiKey}` }, {
      model: this.opts.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0.7,
      max_tokens: maxTokens,
    });
    const choices = field(data, 'choices');
    const content = Array.isArray(choices) ? field(field(choices[0], 'message'), 'content') : undefined;
    if (typeof content !== 'string') throw new Error('Unexpected response shape from OpenAI');
    return content;
  }
}
