import type { ProviderSettings } from '../config';
import { AnthropicVerdictProvider } from './anthropic';
import { MockVerdictProvider } from './mock';
import { OpenAIVerdictProvider } from './openai';
import type { PlanningVerdictProvider } from './types';

/** Picks the backend once, at construction; business logic never branches on it. */
export function createVerdictProvider(settings: ProviderSettings): PlanningVerdictProvider {
  const opts = {
    apiKey: settings.apiKey,
    model: settings.model ?? undefined,
    baseUrl: settings.baseUrl ?? undefined,
    timeoutMs: settings.timeoutMs,
  };
  switch (settings.name) {
    case 'openai':
      return new OpenAIVerdictProvider(opts);
    case 'anthropic':
      return new AnthropicVerdictProvider(opts);
    case 'mock':
    case 'auto':
      return new MockVerdictProvider();
  }
}

export { OpenAIVerdictProvider } from './openai';
export { AnthropicVerdictProvider } from './anthropic';
export { MockVerdictProvider } from './mock';
export { LlmVerdictProvider } from './llm';
export { parseVerdictResponse, parsePlannedTasks, extractJson } from './parse';
export { NO_TASK_MESSAGE } from './types';
export type { VerdictProvider, TaskPlanner, PlanningVerdictProvider } from './types';
