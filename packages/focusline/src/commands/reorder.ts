import { isJsonMode, log, out } from '@focusline/core';
import { openSession, parseId } from '../session';
import { formatTaskLine } from '../format';

export async function reorderCommand(ids: string[]) {
  const ctx = openSession();
  await ctx.tasks.reorder(ids.map(parseId));
  const tasks = await ctx.tasks.list();

  if (isJsonMode()) return out(tasks);
  log.success('Reordered');
  tasks.forEach(t => console.log(formatTaskLine(t)));
}
