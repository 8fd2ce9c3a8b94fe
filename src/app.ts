import express from 'express';
import type { Express } from 'express';
import type { Server } from 'http';
import type { FocusContext } from '@focusline/core';
import { createFocusRouter } from './routes';

export function createApp(ctx: FocusContext): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({
      ok: true,
      provider: ctx.provider.name,
      mode: ctx.monitor.mode,
      storage: ctx.degraded ? 'memory (degraded)' : ctx.tasks.durable ? 'file' : 'memory',
      watching: ctx.watcher.watchingPath,
    });
  });

  app.use('/api', createFocusRouter(ctx));
  return app;
}

/** Resolves once the port is bound; rejects with the listen error (EADDRINUSE and friends). */
export function listenApp(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}
