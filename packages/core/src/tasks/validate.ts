import { ValidationError } from '../errors';
import { TASK_STATUSES, isTaskStatus } from '../types';
import type { TaskPatch, TaskStatus } from '../types';

const STATUS_ALIASES: Record<string, TaskStatus> = {
  'todo': 'todo',
  'in progress': 'in_progress',
  'in-progress': 'in_progress',
  'in_progress': 'in_progress',
  'active': 'in_progress',
  'done': 'done',
};

/** Accepts the stored value or its display label ("In Progress"). */
export function parseStatus(input: string): TaskStatus {
  const status = STATUS_ALIASES[input.trim().toLowerCase()];
  if (!status) {
    throw new ValidationError(`Invalid status "${input}". Must be one of: ${TASK_STATUSES.join(', ')}`, 'INVALID_STATUS');
  }
  return status;
}

export function requireTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new ValidationError('Task title is required.');
  return trimmed;
}

export function assertStatus(status: unknown): asserts status is TaskStatus {
  if (!isTaskStatus(status)) {
    throw new ValidationError(`Invalid status "${String(status)}". Must be one of: ${TASK_STATUSES.join(', ')}`, 'INVALID_STATUS');
  }
}

/** Builds a patch from an untyped body (HTTP JSON); unknown fields are dropped. */
export function toTaskPatch(body: unknown): TaskPatch {
  const patch: TaskPatch = {};
  if (typeof body !== 'object' || body === null) return patch;
  const src: Record<string, unknown> = { ...body };
  if (typeof src.title === 'string') patch.title = src.title;
  if (typeof src.description === 'string') patch.description = src.description;
  if (typeof src.estimatedDuration === 'string') patch.estimatedDuration = src.estimatedDuration;
  if (typeof src.position === 'number') patch.position = src.position;
  if (src.status !== undefined) patch.status = parseStatus(String(src.status));
  return patch;
}
