#!/usr/bin/env tsx
import { Command } from 'commander';
import { errorMessage, isJsonMode, log, out, setJsonMode } from '@focusline/core';
import { initCommand } from './commands/init';
import { addCommand } from './commands/add';
import { listCommand } from './commands/list';
import { showCommand } from './commands/show';
import { editCommand } from './commands/edit';
import { deleteCommand } from './commands/delete';
import { startCommand } from './commands/start';
import { doneCommand } from './commands/done';
import { currentCommand } from './commands/current';
import { reorderCommand } from './commands/reorder';
import { clearCommand } from './commands/clear';
import { checkCommand } from './commands/check';
import { watchCommand } from './commands/watch';
import { statsCommand } from './commands/stats';
import { weekCommand } from './commands/week';
import { historyCommand } from './commands/history';
import { pomodoroCommand } from './commands/pomodoro';
import { planCommand } from './commands/plan';

const program = new Command();

program
  .name('focusline')
  .description('Accountability buddy for the terminal: one task at a time, checked every few seconds')
  .version('0.1.0')
  .option('--json', 'Output as JSON')
  .hook('preAction', (cmd) => {
    if (cmd.opts().json) setJsonMode(true);
  });

program.command('init')
  .description('Initialize .focusline/ in current directory')
  .action(initCommand);

program.command('add <title>')
  .description('Add a task')
  .option('-d, --description <text>', 'What "done" looks like')
  .option('-e, --estimate <duration>', 'Estimated duration, e.g. "20 min"')
  .option('--start', 'Make it the active task')
  .action(addCommand);

program.command('list')
  .description('List tasks in order')
  .option('-s, --status <status>', 'Filter by status (todo, in_progress, done)')
  .option('-a, --all', 'Include done tasks')
  .action(listCommand);

program.command('show <id>')
  .description('Show task details')
  .action(showCommand);

program.command('edit <id>')
  .description('Edit a task')
  .option('-t, --title <title>', 'New title')
  .option('-d, --description <text>', 'New description')
  .option('-e, --estimate <duration>', 'New estimate')
  .option('-s, --status <status>', 'New status')
  .action(editCommand);

program.command('delete <id>')
  .description('Delete a task')
  .action(deleteCommand);

program.command('start <id>')
  .description('Make a task the active one')
  .action(startCommand);

program.command('done <id>')
  .description('Complete a task')
  .action(doneCommand);

program.command('current')
  .description('Show the active task')
  .action(currentCommand);

program.command('reorder <ids...>')
  .description('Set the task order, e.g. reorder 3 1 2')
  .action(reorderCommand);

program.command('clear')
  .description('Delete all tasks')
  .option('--history', 'Also delete focus history and streaks')
  .option('-y, --yes', 'Confirm')
  .action(clearCommand);

program.command('check')
  .description('Run one focus check now')
  .option('--text <text>', 'Check this text instead of file activity (demo mode)')
  .option('--notify', 'Send a desktop notification for alerts')
  .action(checkCommand);

program.command('watch <dir>')
  .description('Watch a directory and check focus on an interval')
  .option('-i, --interval <seconds>', 'Seconds between checks, or "1 minute", "5 minutes", "10 minutes"')
  .option('--no-notify', 'Disable desktop notifications')
  .action(watchCommand);

program.command('stats')
  .description('Show today\'s focus stats')
  .action(statsCommand);

program.command('week')
  .description('Show the last 7 days')
  .action(weekCommand);

program.command('history')
  .description('Show recent focus checks, newest first')
  .option('-n, --limit <n>', 'Number of entries', '20')
  .option('--csv', 'Export as CSV')
  .action(historyCommand);

program.command('pomodoro')
  .description('Run a 25 minute work session and a 5 minute break')
  .option('--no-notify', 'Disable desktop notifications')
  .action(pomodoroCommand);

program.command('plan <description>')
  .description('Break a project into 15-30 minute tasks')
  .option('--add', 'Add the planned tasks to the list')
  .action(planCommand);

program.parseAsync().catch((err: unknown) => {
  if (isJsonMode()) out({ success: false, error: errorMessage(err) });
  else log.error(errorMessage(err));
  process.exit(1);
});
