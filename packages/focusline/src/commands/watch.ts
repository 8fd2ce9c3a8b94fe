import * as path from 'path';
import chalk from 'chalk';
import { CHECK_INTERVALS, ValidationError, isJsonMode, log, out } from '@focusline/core';
import { openSession } from '../session';
import { notifyCheckResult, printCheckResult } from '../report';

/** Seconds, or one of the preset labels ("1 minute", "5 minutes"). */
export function parseInterval(raw: string): number {
  const preset = CHECK_INTERVALS[raw.trim().toLowerCase()];
  if (preset) return preset;
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new ValidationError(`Invalid interval "${raw}". Use seconds or one of: ${Object.keys(CHECK_INTERVALS).join(', ')}`);
  }
  return seconds;
}

export async function watchCommand(dir: string, opts: { interval?: string; notify: boolean }) {
  const ctx = openSession();
  if (opts.interval) ctx.scheduler.setIntervalSeconds(parseInterval(opts.interval));

  ctx.watcher.start(dir);
  ctx.watcher.onEvent(e => log.dim(`  ${e.kind.toUpperCase()}: ${e.source}`));
  ctx.scheduler.onResult((result) => {
    if (isJsonMode()) out(result);
    else printCheckResult(result);
    if (opts.notify) notifyCheckResult(result);
  });
  ctx.scheduler.start();

  const active = await ctx.tasks.getActive();
  log.info(chalk.bold(`👀 Watching ${path.resolve(dir)}`));
  log.dim(`  Provider: ${ctx.provider.name} · every ${ctx.scheduler.interval}s · Ctrl+C to stop`);
  log.dim(active ? `  Task: #${active.id} ${active.title}` : '  No active task. Pick one with: focusline start <id>');
  if (ctx.degraded) log.warn('Running on in-memory storage; nothing from this session will be saved.');

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => {
      ctx.scheduler.stop();
      ctx.watcher.stop();
      resolve();
    });
  });
  log.info('\nStopped watching.');
}
