import { isJsonMode, log, out, parseStatus } from '@focusline/core';
import type { TaskPatch } from '@focusline/core';
import { openSession, requireTask } from '../session';
import { formatTaskLine } from '../format';

export async function editCommand(id: string, opts: { title?: string; description?: string; estimate?: string; status?: string }) {
  const ctx = openSession();
  const task = await requireTask(ctx, id);

  const patch: TaskPatch = {};
  if (opts.title !== undefined) patch.title = opts.title;
  if (opts.description !== undefined) patch.description = opts.description;
  if (opts.estimate !== undefined) patch.estimatedDuration = opts.estimate;
  if (opts.status !== undefined) patch.status = parseStatus(opts.status);
  await ctx.tasks.update(task.id, patch);

  const updated = await ctx.tasks.get(task.id);
  if (isJsonMode()) return out(updated);
  if (updated) log.success(`Updated: ${formatTaskLine(updated)}`);
}
