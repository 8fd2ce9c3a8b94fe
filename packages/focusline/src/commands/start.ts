import { ValidationError, isJsonMode, log, out } from '@focusline/core';
import { openSession, requireTask } from '../session';
import { formatTaskLine } from '../format';

export async function startCommand(id: string) {
  const ctx = openSession();
  const task = await requireTask(ctx, id);
  if (!(await ctx.tasks.setActive(task.id))) {
    throw new ValidationError(`Task ${task.id} is done. Reopen it with: focusline edit ${task.id} --status todo`);
  }

  const active = await ctx.tasks.getActive();
  if (isJsonMode()) return out(active);
  if (active) log.success(`Now working on: ${formatTaskLine(active)}`);
}
