import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import {
  MemoryMetricsStore, MemoryTaskStore, MockVerdictProvider, createContext, defaultConfig,
} from '@focusline/core';
import type { FocusContext } from '@focusline/core';
import { createApp, listenApp } from '../app';

let ctx: FocusContext;
let server: Server;
let base: string;

async function api(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
  const res = await fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, json: await res.json() };
}

beforeEach(async () => {
  ctx = createContext(defaultConfig('/unused'), {
    tasks: new MemoryTaskStore(),
    metrics: new MemoryMetricsStore(),
    provider: new MockVerdictProvider(),
  });
  server = await listenApp(createApp(ctx), 0, '127.0.0.1');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
  base = `http://127.0.0.1:${address.port}/api`;
});

afterEach(async () => {
  await new Promise<void>(resolve => server.close(() => resolve()));
});

describe('listenApp', () => {
  it('rejects when the port is already taken', async () => {
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    await expect(listenApp(createApp(ctx), address.port, '127.0.0.1')).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });
});

describe('task routes', () => {
  it('creates, reads and lists tasks', async () => {
    const created = await api('POST', '/tasks', { title: 'Write parser', estimatedDuration: '20 min' });
    expect(created.status).toBe(201);
    expect(created.json).toMatchObject({ id: 1, title: 'Write parser', status: 'todo', position: 1 });

    expect((await api('GET', '/tasks/1')).json).toMatchObject({ id: 1, estimatedDuration: '20 min' });
    expect((await api('GET', '/tasks')).json).toHaveLength(1);
  });

  it('rejects a blank title', async () => {
    const res = await api('POST', '/tasks', { title: '  ' });
    expect(res).toEqual({ status: 400, json: { error: 'Task title is required.' } });
  });

  it('returns 404 for a missing task', async () => {
    expect(await api('GET', '/tasks/42')).toEqual({ status: 404, json: { error: 'Task 42 not found.' } });
    expect((await api('PUT', '/tasks/42', { title: 'x' })).status).toBe(404);
  });

  it('rejects an unknown status on update', async () => {
    await api('POST', '/tasks', { title: 'A' });
    const res = await api('PUT', '/tasks/1', { status: 'blocked' });
    expect(res.status).toBe(400);
    expect(res.json).toMatchObject({ error: expect.stringContaining('Invalid status "blocked"') });
  });

  it('keeps a single active task', async () => {
    await api('POST', '/tasks', { title: 'A' });
    await api('POST', '/tasks', { title: 'B' });
    await api('POST', '/tasks/1/start');
    await api('POST', '/tasks/2/start');

    expect((await api('GET', '/tasks/active')).json).toMatchObject({ task: { id: 2, status: 'in_progress' } });
    expect((await api('GET', '/tasks?status=in_progress')).json).toHaveLength(1);
  });

  it('refuses to start a done task', async () => {
    await api('POST', '/tasks', { title: 'A' });
    await api('POST', '/tasks/1/done');
    expect((await api('POST', '/tasks/1/start')).status).toBe(400);
  });

  it('reorders and deletes idempotently', async () => {
    await api('POST', '/tasks', { title: 'A' });
    await api('POST', '/tasks', { title: 'B' });
    const reordered = await api('POST', '/tasks/reorder', { ids: [2, 1] });
    expect(reordered.json).toMatchObject([{ title: 'B' }, { title: 'A' }]);

    expect((await api('DELETE', '/tasks/2')).json).toEqual({ ok: true });
    expect((await api('DELETE', '/tasks/2')).json).toEqual({ ok: true });
    expect((await api('GET', '/tasks')).json).toHaveLength(1);
  });
});

describe('monitoring routes', () => {
  it('checks posted activity against the active task', async () => {
    await api('POST', '/tasks', { title: 'Write parser', status: 'in progress' });
    const posted = await api('POST', '/activity', { kind: 'modified', source: 'src/parser.ts', content: 'export function parse() {}' });
    expect(posted).toEqual({ status: 201, json: { recorded: true, size: 1 } });

    const check = await api('POST', '/check');
    expect(check.json).toMatchObject({
      verdict: 'On Track',
      message: 'Nice, editing src/parser.ts! Keep going on "Write parser".',
      log: '✅ [On Track] Nice, editing src/parser.ts! Keep going on "Write parser".',
    });

    expect((await api('GET', '/stats')).json).toMatchObject({ onTrack: 1, totalChecks: 1, focusScore: 100, currentStreak: 1 });
    expect((await api('GET', '/history?limit=5')).json).toMatchObject([{ taskTitle: 'Write parser', verdict: 'On Track' }]);
  });

  it('classifies posted text for one check only', async () => {
    await api('POST', '/tasks', { title: 'Write parser', status: 'in progress' });
    const demo = await api('POST', '/check', { text: 'reading reddit memes' });
    expect(demo.json).toMatchObject({
      verdict: 'Distracted',
      message: 'Wait, why demo_workspace? We\'re supposed to be on "Write parser". 🤨',
    });

    await api('POST', '/activity', { kind: 'modified', source: 'src/parser.ts' });
    const check = await api('POST', '/check', {});
    expect(check.json).toMatchObject({
      verdict: 'On Track',
      message: 'Nice, editing src/parser.ts! Keep going on "Write parser".',
    });
    expect(ctx.monitor.mode).toBe('local');
  });

  it('reports Idle without recording when no task is active', async () => {
    const check = await api('POST', '/check');
    expect(check.json).toMatchObject({ verdict: 'Idle', alert: { title: 'Focus alert 🦉' } });
    expect((await api('GET', '/stats')).json).toMatchObject({ totalChecks: 0 });
  });

  it('validates posted activity', async () => {
    expect((await api('POST', '/activity', { kind: 'renamed', source: 'a.ts' })).status).toBe(400);
    expect((await api('POST', '/activity', { kind: 'modified' })).status).toBe(400);
  });

  it('serves a seven day chart', async () => {
    const res = await api('GET', '/stats/week');
    expect(res.json).toMatchObject({ days: [], chart: { focusScores: [0, 0, 0, 0, 0, 0, 0] } });
  });

  it('rejects a bad history limit', async () => {
    expect((await api('GET', '/history?limit=abc')).status).toBe(400);
  });
});

describe('health and planning', () => {
  it('reports the provider and storage', async () => {
    expect((await api('GET', '/health')).json).toEqual({
      ok: true, provider: 'Mock AI (offline)', mode: 'local', storage: 'memory', watching: null,
    });
  });

  it('plans and adds tasks', async () => {
    const res = await api('POST', '/plan', { description: 'A habit tracker', add: true });
    expect(res.json).toMatchObject({ added: [1, 2, 3, 4, 5] });
    expect((await api('GET', '/tasks')).json).toHaveLength(5);
  });
});
