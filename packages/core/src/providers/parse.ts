import { isVerdict } from '../types';
import type { PlannedTask, VerdictResult } from '../types';

const FALLBACK_CHARS = 200;

/** Strips a ```json / ``` fence around a model reply. */
export function extractJson(text: string): string {
  const content = text.trim();
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  return fenced ? fenced[1].trim() : content;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(extractJson(text));
  } catch {
    return undefined;
  }
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Reads a `{ verdict, message }` reply. Anything else (prose, bad JSON,
 * an unknown verdict) becomes 'On Track' with the raw text as the message.
 */
export function parseVerdictResponse(text: string): VerdictResult {
  const parsed = tryParse(text);
  if (isObject(parsed) && isVerdict(parsed.verdict)) {
    const message = typeof parsed.message === 'string' && parsed.message.trim() ? parsed.message.trim() : 'No message';
    return { verdict: parsed.verdict, message };
  }
  return { verdict: 'On Track', message: text.trim().slice(0, FALLBACK_CHARS) };
}

export function parsePlannedTasks(text: string): PlannedTask[] {
  const parsed = tryParse(text);
  const list = isObject(parsed) ? parsed.tasks : parsed;
  if (!Array.isArray(list)) return [];
  const tasks: PlannedTask[] = [];
  for (const item of list) {
    if (!isObject(item) || typeof item.title !== 'string' || !item.title.trim()) continue;
    tasks.push({
      title: item.title.trim(),
      description: typeof item.description === 'string' ? item.description : '',
      estimatedDuration: typeof item.estimated_duration === 'string' ? item.estimated_duration
        : typeof item.estimatedDuration === 'string' ? item.estimatedDuration : '30 min',
    });
  }
  return tasks;
}
