#!/usr/bin/env tsx
import chalk from 'chalk';
import { createContext, loadConfig, log, errorMessage, sendDesktopNotification } from '@focusline/core';
import { createApp, listenApp } from './app';

const PORT = parseInt(process.env.FOCUSLINE_PORT || '4100', 10);

const ctx = createContext(loadConfig());
const app = createApp(ctx);

// Optional: watch a directory and run the scheduler alongside the API.
const watchDir = process.env.FOCUSLINE_WATCH;
if (watchDir) {
  try {
    ctx.watcher.start(watchDir);
    ctx.scheduler.onResult((result) => {
      const line = result.log.split('\n').pop() ?? result.message;
      log.info(`${chalk.dim(new Date().toTimeString().slice(0, 8))} ${line}`);
      if (result.alert) sendDesktopNotification(result.alert.title, result.alert.message, Boolean(result.escalation));
    });
    ctx.scheduler.start();
  } catch (e) {
    log.warn(`Not watching ${watchDir}: ${errorMessage(e)}`);
  }
}

listenApp(app, PORT).then((server) => {
  console.log(chalk.bold(`🦉 Focusline API on http://localhost:${PORT}/api`));
  log.dim(`  Provider: ${ctx.provider.name} · data: ${ctx.config.dataDir}${ctx.degraded ? ' (in-memory fallback)' : ''}`);
  if (ctx.watcher.watchingPath) log.dim(`  Watching ${ctx.watcher.watchingPath} every ${ctx.scheduler.interval}s`);

  process.once('SIGINT', () => {
    ctx.scheduler.stop();
    ctx.watcher.stop();
    server.close(() => process.exit(0));
  });
}).catch((err: unknown) => {
  log.error(`Cannot listen on port ${PORT}: ${errorMessage(err)}`);
  ctx.scheduler.stop();
  ctx.watcher.stop();
  process.exit(1);
});
