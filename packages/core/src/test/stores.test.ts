import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { openStores } from '../stores';
import { createContext } from '../context';
import { defaultConfig } from '../config';
import { setQuiet } from '../output';
import { MemoryTaskStore } from '../tasks/store';
import { MemoryMetricsStore } from '../metrics/store';
import { cleanupTempDirs, tempDir, StubProvider } from './helpers';

beforeEach(() => {
  setQuiet(true);
});

afterEach(() => {
  setQuiet(false);
  cleanupTempDirs();
});

describe('openStores', () => {
  it('opens durable stores in the data directory', async () => {
    const dir = tempDir();
    const stores = openStores({ dataDir: dir, storage: 'file' });

    expect(stores.degraded).toBe(false);
    expect(stores.tasks.durable).toBe(true);
    await stores.tasks.add({ title: 'A' });
    expect(fs.existsSync(path.join(dir, 'tasks.json'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'history.json'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'streaks.json'))).toBe(true);
  });

  it('uses memory stores when asked to', () => {
    const stores = openStores({ dataDir: '/unused', storage: 'memory' });
    expect(stores.tasks.durable).toBe(false);
    expect(stores.metrics.durable).toBe(false);
    expect(stores.degraded).toBe(false);
  });

  it('falls back to memory when the data directory is unusable', async () => {
    const blocker = path.join(tempDir(), 'not-a-dir');
    fs.writeFileSync(blocker, '');
    const stores = openStores({ dataDir: path.join(blocker, '.focusline'), storage: 'file' });

    expect(stores.degraded).toBe(true);
    expect(stores.tasks.durable).toBe(false);
    expect(await stores.tasks.add({ title: 'Still works' })).toBe(1);
  });
});

describe('createContext', () => {
  it('wires the monitor to the given stores and provider', async () => {
    const tasks = new MemoryTaskStore();
    const metrics = new MemoryMetricsStore();
    const provider = Object.assign(new StubProvider([{ verdict: 'Distracted', message: 'hey' }]), {
      planTasks: async () => [],
    });
    const ctx = createContext(defaultConfig(tempDir()), { tasks, metrics, provider });
    await tasks.setActive(await tasks.add({ title: 'Write parser' }));

    const result = await ctx.scheduler.runNow();

    expect(result.verdict).toBe('Distracted');
    expect((await metrics.todayStats()).distracted).toBe(1);
    expect(ctx.scheduler.interval).toBe(30);
    expect(ctx.degraded).toBe(false);
  });
});
