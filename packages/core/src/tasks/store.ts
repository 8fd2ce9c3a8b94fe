import * as path from 'path';
import { readJSON, writeJSON, isRecord } from '../json-file';
import { assertStatus, requireTitle } from './validate';
import { isTaskStatus } from '../types';
import type { NewTask, Task, TaskPatch } from '../types';

// --- Storage Interface ---
export interface TaskStore {
  /** True when tasks survive a process restart. */
  readonly durable: boolean;

  add(input: NewTask): Promise<number>;
  get(id: number): Promise<Task | null>;
  list(): Promise<Task[]>;
  update(id: number, patch: TaskPatch): Promise<boolean>;
  delete(id: number): Promise<void>;
  setActive(id: number): Promise<boolean>;
  getActive(): Promise<Task | null>;
  reorder(ids: number[]): Promise<void>;
  clearAll(): Promise<void>;
}

export interface TaskDocument {
  nextId: number;
  tasks: Task[];
}

function emptyDocument(): TaskDocument {
  return { nextId: 1, tasks: [] };
}

function byPosition(a: Task, b: Task): number {
  return a.position - b.position || a.id - b.id;
}

// --- In-memory store (process lifetime) ---
export class MemoryTaskStore implements TaskStore {
  readonly durable: boolean = false;

  constructor(protected doc: TaskDocument = emptyDocument()) {}

  /** Called at the start of every operation. */
  protected load(): void {}

  /** Called after every mutation. */
  protected persist(): void {}

  async add(input: NewTask): Promise<number> {
    this.load();
    const title = requireTitle(input.title);
    const status = input.status ?? 'todo';
    assertStatus(status);
    const now = new Date().toISOString();
    const maxPos = this.doc.tasks.reduce((m, t) => Math.max(m, t.position), 0);
    const task: Task = {
      id: this.doc.nextId++,
      title,
      description: input.description ?? '',
      status,
      estimatedDuration: input.estimatedDuration ?? '',
      position: maxPos + 1,
      createdAt: now,
      updatedAt: now,
    };
    if (status === 'in_progress') this.demoteActive(now);
    this.doc.tasks.push(task);
    this.persist();
    return task.id;
  }

  async get(id: number): Promise<Task | null> {
    this.load();
    const task = this.find(id);
    return task ? { ...task } : null;
  }

  async list(): Promise<Task[]> {
    this.load();
    return this.doc.tasks.map(t => ({ ...t })).sort(byPosition);
  }

  async update(id: number, patch: TaskPatch): Promise<boolean> {
    this.load();
    if (patch.status !== undefined) assertStatus(patch.status);
    const title = patch.title !== undefined ? requireTitle(patch.title) : undefined;
    const task = this.find(id);
    if (!task) return false;

    const now = new Date().toISOString();
    if (title !== undefined) task.title = title;
    if (patch.description !== undefined) task.description = patch.description;
    if (patch.estimatedDuration !== undefined) task.estimatedDuration = patch.estimatedDuration;
    if (patch.position !== undefined) task.position = patch.position;
    if (patch.status !== undefined) {
      if (patch.status === 'in_progress') this.demoteActive(now, id);
      task.status = patch.status;
    }
    task.updatedAt = now;
    this.persist();
    return true;
  }

  async delete(id: number): Promise<void> {
    this.load();
    const before = this.doc.tasks.length;
    this.doc.tasks = this.doc.tasks.filter(t => t.id !== id);
    if (this.doc.tasks.length !== before) this.persist();
  }

  async setActive(id: number): Promise<boolean> {
    this.load();
    const target = this.find(id);
    if (!target || target.status === 'done') return false;
    const now = new Date().toISOString();
    this.demoteActive(now, id);
    target.status = 'in_progress';
    target.updatedAt = now;
    this.persist();
    return true;
  }

  async getActive(): Promise<Task | null> {
    this.load();
    const active = this.doc.tasks.filter(t => t.status === 'in_progress').sort(byPosition);
    return active.length ? { ...active[0] } : null;
  }

  async reorder(ids: number[]): Promise<void> {
    this.load();
    ids.forEach((id, i) => {
      const task = this.find(id);
      if (task) task.position = i + 1;
    });
    this.persist();
  }

  async clearAll(): Promise<void> {
    this.load();
    this.doc.tasks = [];
    this.persist();
  }

  private find(id: number): Task | undefined {
    return this.doc.tasks.find(t => t.id === id);
  }

  private demoteActive(now: string, exceptId?: number) {
    for (const t of this.doc.tasks) {
      if (t.status === 'in_progress' && t.id !== exceptId) {
        t.status = 'todo';
        t.updatedAt = now;
      }
    }
  }
}

// --- File store (tasks.json in the data directory) ---

function isTask(v: unknown): v is Task {
  return isRecord(v)
    && typeof v.id === 'number'
    && typeof v.title === 'string'
    && typeof v.description === 'string'
    && isTaskStatus(v.status)
    && typeof v.estimatedDuration === 'string'
    && typeof v.position === 'number'
    && typeof v.createdAt === 'string'
    && typeof v.updatedAt === 'string';
}

export function readTaskDocument(file: string): TaskDocument {
  const raw = readJSON(file);
  if (!isRecord(raw) || !Array.isArray(raw.tasks)) return emptyDocument();
  const tasks = raw.tasks.filter(isTask);
  const maxId = tasks.reduce((m, t) => Math.max(m, t.id), 0);
  const nextId = typeof raw.nextId === 'number' ? Math.max(raw.nextId, maxId + 1) : maxId + 1;
  return { nextId, tasks };
}

export class FileTaskStore extends MemoryTaskStore {
  readonly durable: boolean = true;
  readonly file: string;

  /** Throws when the data directory cannot be created or written. */
  constructor(dataDir: string) {
    const file = path.join(dataDir, 'tasks.json');
    super(readTaskDocument(file));
    this.file = file;
    this.persist();
  }

  /** Picks up writes from other processes on the same data directory. */
  protected load(): void {
    this.doc = readTaskDocument(this.file);
  }

  protected persist(): void {
    writeJSON(this.file, this.doc);
  }
}
