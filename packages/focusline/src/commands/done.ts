import { isJsonMode, log, out } from '@focusline/core';
import { openSession, requireTask } from '../session';

export async function doneCommand(id: string) {
  const ctx = openSession();
  const task = await requireTask(ctx, id);
  await ctx.tasks.update(task.id, { status: 'done' });

  if (isJsonMode()) return out(await ctx.tasks.get(task.id));
  log.success(`Done: ${task.title} 🎉`);
  const next = (await ctx.tasks.list()).find(t => t.status === 'todo');
  if (next) log.dim(`  Next up: #${next.id} ${next.title} (focusline start ${next.id})`);
}
