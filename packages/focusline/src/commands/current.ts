import chalk from 'chalk';
import { isJsonMode, out } from '@focusline/core';
import { openSession } from '../session';
import { formatTaskFull } from '../format';

export async function currentCommand() {
  const active = await openSession().tasks.getActive();
  if (isJsonMode()) return out(active);
  if (!active) {
    console.log(chalk.dim('No active task. Pick one with: focusline start <id>'));
    return;
  }
  console.log(formatTaskFull(active));
}
