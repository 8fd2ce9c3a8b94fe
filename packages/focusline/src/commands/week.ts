import chalk from 'chalk';
import { isJsonMode, out } from '@focusline/core';
import { openSession } from '../session';
import { formatWeek, weeklyRows } from '../format';

export async function weekCommand() {
  const ctx = openSession();
  const records = await ctx.metrics.weeklyStats();
  const chart = await ctx.metrics.chartSeries();

  if (isJsonMode()) return out({ days: weeklyRows(records), chart });

  console.log(chalk.bold('\n📈 Focus score, last 7 days\n'));
  formatWeek(chart).forEach(line => console.log(line));
  console.log(chalk.dim('\n  on track / distracted / idle\n'));
}
