import * as path from 'path';
import { DATA_DIR, NotFoundError, ValidationError, createContext, loadConfig } from '@focusline/core';
import type { FocusContext, Task } from '@focusline/core';

export function getDataDir(): string {
  return path.resolve(process.cwd(), process.env.FOCUSLINE_DIR || DATA_DIR);
}

export function openSession(): FocusContext {
  return createContext(loadConfig(getDataDir()));
}

export function parseId(raw: string): number {
  const id = Number(raw.replace(/^#/, ''));
  if (!Number.isInteger(id) || id < 1) throw new ValidationError(`Invalid task id "${raw}"`);
  return id;
}

export async function requireTask(ctx: FocusContext, raw: string): Promise<Task> {
  const id = parseId(raw);
  const task = await ctx.tasks.get(id);
  if (!task) throw new NotFoundError('Task', id);
  return task;
}
