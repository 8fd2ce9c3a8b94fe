import { isJsonMode, log, out } from '@focusline/core';
import { openSession } from '../session';
import { notifyCheckResult, printCheckResult } from '../report';

export async function checkCommand(opts: { text?: string; notify?: boolean }) {
  const ctx = openSession();
  if (opts.text !== undefined) {
    ctx.monitor.setLaunchMode('demo');
    log.dim(ctx.monitor.updateDemoText(opts.text));
  } else if (ctx.monitor.mode === 'local') {
    log.dim('No watcher in a one-off check; use `focusline watch <dir>` to track file activity.');
  }

  const result = await ctx.scheduler.runNow();
  if (isJsonMode()) return out(result);
  log.dim(`Provider: ${ctx.provider.name}`);
  printCheckResult(result);
  if (opts.notify) notifyCheckResult(result);
}
