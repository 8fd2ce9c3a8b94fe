import chalk from 'chalk';
import { stringify } from 'csv-stringify/sync';
import { ValidationError, isJsonMode, out } from '@focusline/core';
import { openSession } from '../session';
import { formatHistoryEntry, historyRows } from '../format';

export async function historyCommand(opts: { limit: string; csv?: boolean }) {
  const limit = Number(opts.limit);
  if (!Number.isInteger(limit) || limit < 0) throw new ValidationError(`Invalid limit "${opts.limit}"`);
  const entries = await openSession().metrics.history(limit);

  if (opts.csv) {
    process.stdout.write(stringify(historyRows(entries), { header: true }));
    return;
  }
  if (isJsonMode()) return out(entries);

  if (!entries.length) {
    console.log(chalk.dim('No focus checks yet'));
    return;
  }
  entries.forEach(e => console.log(formatHistoryEntry(e)));
}
