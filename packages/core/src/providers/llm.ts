import { errorMessage } from '../errors';
import { log } from '../output';
import type { ActivityEvent, PlannedTask, Task, VerdictResult } from '../types';
import type { PlanningVerdictProvider } from './types';
import { NO_TASK_MESSAGE } from './types';
import { parsePlannedTasks, parseVerdictResponse } from './parse';
import { buildPlanPrompt, buildVerdictPrompt } from './prompt';

export interface LlmOptions {
  apiKey: string | null;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

/** Shared classify/plan flow; subclasses only know how to talk to their HTTP API. */
export abstract class LlmVerdictProvider implements PlanningVerdictProvider {
  abstract readonly id: string;
  abstract readonly name: string;
  protected abstract readonly envKey: string;

  constructor(protected opts: LlmOptions) {}

  /** Sends one user prompt and returns the model's text reply. */
  protected abstract complete(prompt: string, maxTokens: number): Promise<string>;

  async classify(task: Task | null, events: ActivityEvent[]): Promise<VerdictResult> {
    if (!task) return { verdict: 'Idle', message: NO_TASK_MESSAGE };
    if (!this.opts.apiKey) {
      return { verdict: 'On Track', message: `⚠️ API key not configured. Set ${this.envKey} or provider.apiKey in config.yaml.` };
    }
    try {
      const text = await this.complete(buildVerdictPrompt(task, events), 300);
      return parseVerdictResponse(text);
    } catch (err) {
      return { verdict: 'On Track', message: `Error analyzing activity: ${errorMessage(err)}` };
    }
  }

  async planTasks(projectDescription: string): Promise<PlannedTask[]> {
    if (!this.opts.apiKey || !projectDescription.trim()) return [];
    try {
      return parsePlannedTasks(await this.complete(buildPlanPrompt(projectDescription), 800));
    } catch (err) {
      log.warn(`Task planning failed: ${errorMessage(err)}`);
      return [];
    }
  }

  protected async post(path: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
    const res = await fetch(`${this.opts.baseUrl.replace(/\/$/, '')}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    });
    if (!res.ok) {
      const detail = await res.text().catch(() => res.statusText);
      throw new Error(`HTTP ${res.status}: ${detail.slice(0, 200)}`);
    }
    return res.json();
  }
}

export function field(v: unknown, key: string): unknown {
  return typeof v === 'object' && v !== null && key in v ? Reflect.get(v, key) : undefined;
}
