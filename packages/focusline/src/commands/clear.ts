import chalk from 'chalk';
import { isJsonMode, log, out } from '@focusline/core';
import { openSession } from '../session';

export async function clearCommand(opts: { history?: boolean; yes?: boolean }) {
  if (!opts.yes) {
    if (isJsonMode()) return out({ success: false, error: 'Pass --yes to confirm' });
    console.log(chalk.yellow(`This deletes every task${opts.history ? ' and all focus history' : ''}. Re-run with --yes to confirm.`));
    return;
  }
  const ctx = openSession();
  await ctx.tasks.clearAll();
  if (opts.history) await ctx.metrics.clearAll();

  if (isJsonMode()) return out({ success: true, history: Boolean(opts.history) });
  log.success(opts.history ? 'Cleared tasks and focus history' : 'Cleared tasks');
}
