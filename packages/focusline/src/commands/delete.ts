import { isJsonMode, log, out } from '@focusline/core';
import { openSession, requireTask } from '../session';

export async function deleteCommand(id: string) {
  const ctx = openSession();
  const task = await requireTask(ctx, id);
  await ctx.tasks.delete(task.id);

  if (isJsonMode()) return out({ deleted: task.id });
  log.success(`Deleted: ${task.title}`);
}
