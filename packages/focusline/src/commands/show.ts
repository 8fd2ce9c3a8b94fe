import { isJsonMode, out } from '@focusline/core';
import { openSession, requireTask } from '../session';
import { formatTaskFull } from '../format';

export async function showCommand(id: string) {
  const task = await requireTask(openSession(), id);
  if (isJsonMode()) return out(task);
  console.log(formatTaskFull(task));
}
