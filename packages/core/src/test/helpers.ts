import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { VerdictProvider } from '../providers/types';
import type { ActivityEvent, Task, VerdictResult } from '../types';

const dirs: string[] = [];

export function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'focusline-'));
  dirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  while (dirs.length) {
    const dir = dirs.pop();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** Replies with queued verdicts in order, then 'On Track'. */
export class StubProvider implements VerdictProvider {
  readonly id = 'stub';
  readonly name = 'Stub';
  calls: Array<{ task: Task | null; events: ActivityEvent[] }> = [];

  constructor(private replies: VerdictResult[] = []) {}

  queue(...replies: VerdictResult[]): this {
    this.replies.push(...replies);
    return this;
  }

  async classify(task: Task | null, events: ActivityEvent[]): Promise<VerdictResult> {
    this.calls.push({ task, events });
    return this.replies.shift() ?? { verdict: 'On Track', message: 'ok' };
  }
}
