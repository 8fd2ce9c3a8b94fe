import { isJsonMode, log, out } from '@focusline/core';
import { openSession } from '../session';
import { formatTaskLine } from '../format';

export async function addCommand(title: string, opts: { description?: string; estimate?: string; start?: boolean }) {
  const ctx = openSession();
  const id = await ctx.tasks.add({
    title,
    description: opts.description,
    estimatedDuration: opts.estimate,
  });
  if (opts.start) await ctx.tasks.setActive(id);
  const task = await ctx.tasks.get(id);

  if (isJsonMode()) return out(task);
  if (task) log.success(`Added: ${formatTaskLine(task)}`);
}
