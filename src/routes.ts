import { Router } from 'express';
import type { Request, Response } from 'express';
import {
  FocuslineError, NotFoundError, ValidationError, errorMessage, parseStatus, toTaskPatch,
} from '@focusline/core';
import type { ActivityKind, FocusContext, Task } from '@focusline/core';

const ACTIVITY_KINDS: readonly ActivityKind[] = ['created', 'modified', 'deleted', 'text_edit'];

function sendError(res: Response, e: unknown) {
  const status = e instanceof NotFoundError ? 404 : e instanceof FocuslineError ? 400 : 500;
  res.status(status).json({ error: errorMessage(e) });
}

function taskId(req: Request): number {
  const id = Number(req.params.id);
  if (!Number.isInteger(id) || id < 1) throw new ValidationError(`Invalid task id "${req.params.id}"`);
  return id;
}

function body(req: Request): Record<string, unknown> {
  const b: unknown = req.body;
  return typeof b === 'object' && b !== null && !Array.isArray(b) ? { ...b } : {};
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export function createFocusRouter(ctx: FocusContext): Router {
  const router = Router();

  async function requireTask(id: number): Promise<Task> {
    const task = await ctx.tasks.get(id);
    if (!task) throw new NotFoundError('Task', id);
    return task;
  }

  // --- Task endpoints ---

  router.get('/tasks', async (req, res) => {
    try {
      let tasks = await ctx.tasks.list();
      if (typeof req.query.status === 'string') {
        const status = parseStatus(req.query.status);
        tasks = tasks.filter(t => t.status === status);
      }
      res.json(tasks);
    } catch (e) { sendError(res, e); }
  });

  router.post('/tasks', async (req, res) => {
    try {
      const b = body(req);
      if (typeof b.title !== 'string') throw new ValidationError('Task title is required.');
      const id = await ctx.tasks.add({
        title: b.title,
        description: optionalString(b.description),
        estimatedDuration: optionalString(b.estimatedDuration),
        status: b.status === undefined ? undefined : parseStatus(String(b.status)),
      });
      res.status(201).json(await requireTask(id));
    } catch (e) { sendError(res, e); }
  });

  router.get('/tasks/active', async (_req, res) => {
    try {
      res.json({ task: await ctx.tasks.getActive() });
    } catch (e) { sendError(res, e); }
  });

  router.post('/tasks/reorder', async (req, res) => {
    try {
      const ids = body(req).ids;
      if (!Array.isArray(ids) || !ids.every(Number.isInteger)) {
        throw new ValidationError('ids must be an array of task ids');
      }
      await ctx.tasks.reorder(ids.map(Number));
      res.json(await ctx.tasks.list());
    } catch (e) { sendError(res, e); }
  });

  router.get('/tasks/:id', async (req, res) => {
    try {
      res.json(await requireTask(taskId(req)));
    } catch (e) { sendError(res, e); }
  });

  router.put('/tasks/:id', async (req, res) => {
    try {
      const id = taskId(req);
      if (!(await ctx.tasks.update(id, toTaskPatch(req.body)))) throw new NotFoundError('Task', id);
      res.json(await requireTask(id));
    } catch (e) { sendError(res, e); }
  });

  router.delete('/tasks/:id', async (req, res) => {
    try {
      await ctx.tasks.delete(taskId(req));
      res.json({ ok: true });
    } catch (e) { sendError(res, e); }
  });

  router.post('/tasks/:id/start', async (req, res) => {
    try {
      const task = await requireTask(taskId(req));
      if (!(await ctx.tasks.setActive(task.id))) throw new ValidationError(`Task ${task.id} is done and cannot be started.`);
      res.json(await requireTask(task.id));
    } catch (e) { sendError(res, e); }
  });

  router.post('/tasks/:id/done', async (req, res) => {
    try {
      const id = taskId(req);
      if (!(await ctx.tasks.update(id, { status: 'done' }))) throw new NotFoundError('Task', id);
      res.json(await requireTask(id));
    } catch (e) { sendError(res, e); }
  });

  // --- Monitoring endpoints ---

  router.post('/activity', async (req, res) => {
    try {
      const b = body(req);
      const kind = ACTIVITY_KINDS.find(k => k === b.kind);
      if (!kind) throw new ValidationError(`kind must be one of: ${ACTIVITY_KINDS.join(', ')}`);
      if (typeof b.source !== 'string' || !b.source.trim()) throw new ValidationError('source is required');
      const recorded = ctx.feed.record({ kind, source: b.source, content: optionalString(b.content) });
      res.status(recorded ? 201 : 200).json({ recorded, size: ctx.feed.size });
    } catch (e) { sendError(res, e); }
  });

  router.get('/activity', async (req, res) => {
    try {
      const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : 10;
      res.json({
        events: ctx.feed.recent(Number.isFinite(limit) ? limit : 10),
        summary: ctx.monitor.activitySummary(ctx.watcher.isRunning() || ctx.feed.size > 0),
      });
    } catch (e) { sendError(res, e); }
  });

  router.post('/check', async (req, res) => {
    try {
      const text = body(req).text;
      res.json(await ctx.scheduler.runNow(typeof text === 'string' ? { text } : {}));
    } catch (e) { sendError(res, e); }
  });

  router.get('/log', async (_req, res) => {
    res.json({ log: ctx.monitor.log, escalation: ctx.monitor.escalation });
  });

  // --- Metrics endpoints ---

  router.get('/stats', async (_req, res) => {
    try {
      const today = await ctx.metrics.todayStats();
      res.json({ ...today, currentStreak: await ctx.metrics.currentStreak() });
    } catch (e) { sendError(res, e); }
  });

  router.get('/stats/week', async (_req, res) => {
    try {
      res.json({ days: await ctx.metrics.weeklyStats(), chart: await ctx.metrics.chartSeries() });
    } catch (e) { sendError(res, e); }
  });

  router.get('/history', async (req, res) => {
    try {
      const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) : 20;
      if (!Number.isInteger(limit) || limit < 0) throw new ValidationError(`Invalid limit "${String(req.query.limit)}"`);
      res.json(await ctx.metrics.history(limit));
    } catch (e) { sendError(res, e); }
  });

  // --- Planning ---

  router.post('/plan', async (req, res) => {
    try {
      const b = body(req);
      if (typeof b.description !== 'string' || !b.description.trim()) throw new ValidationError('description is required');
      const tasks = await ctx.provider.planTasks(b.description);
      const added: number[] = [];
      if (b.add === true) {
        for (const t of tasks) added.push(await ctx.tasks.add(t));
      }
      res.json({ tasks, added });
    } catch (e) { sendError(res, e); }
  });

  return router;
}
