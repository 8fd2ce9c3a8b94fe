import chalk from 'chalk';
import { isJsonMode, out, parseStatus } from '@focusline/core';
import { openSession } from '../session';
import { formatTaskLine } from '../format';

export async function listCommand(opts: { status?: string; all?: boolean }) {
  const ctx = openSession();
  let tasks = await ctx.tasks.list();

  if (opts.status) {
    const status = parseStatus(opts.status);
    tasks = tasks.filter(t => t.status === status);
  } else if (!opts.all) {
    tasks = tasks.filter(t => t.status !== 'done');
  }

  if (isJsonMode()) return out(tasks);

  if (!tasks.length) {
    console.log(chalk.dim('No tasks found. Add one with: focusline add "<title>"'));
    return;
  }
  tasks.forEach(t => console.log(formatTaskLine(t)));
}
