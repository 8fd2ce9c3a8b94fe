import chalk from 'chalk';
import { ValidationError, isJsonMode, log, out } from '@focusline/core';
import { openSession } from '../session';
import { formatPlannedTask } from '../format';

export async function planCommand(description: string, opts: { add?: boolean }) {
  const ctx = openSession();
  const planned = await ctx.provider.planTasks(description);
  if (!planned.length) {
    throw new ValidationError('Could not generate tasks. Check the provider configuration or describe the project in more detail.');
  }

  const ids: number[] = [];
  if (opts.add) {
    for (const t of planned) {
      ids.push(await ctx.tasks.add({ title: t.title, description: t.description, estimatedDuration: t.estimatedDuration }));
    }
  }

  if (isJsonMode()) return out({ tasks: planned, added: ids });
  console.log(chalk.bold(`\n🗺️  Plan for "${description}" (${ctx.provider.name})\n`));
  planned.forEach((t, i) => console.log(formatPlannedTask(t, i)));
  console.log();
  if (opts.add) log.success(`Added ${ids.length} tasks. Start with: focusline start ${ids[0]}`);
  else log.dim('  Re-run with --add to put these on your list');
}
