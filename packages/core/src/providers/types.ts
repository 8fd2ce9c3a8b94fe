// Verdict providers: anything that maps (active task, recent activity) to a verdict.
// Each model backend (OpenAI, Anthropic, the offline mock) implements this once.

import type { ActivityEvent, PlannedTask, Task, VerdictResult } from '../types';

export interface VerdictProvider {
  readonly id: string;       // 'openai', 'anthropic', 'mock'
  readonly name: string;     // 'OpenAI (gpt-4o)'

  /** Never rejects; transport and parse failures resolve to a non-alarming 'On Track'. */
  classify(task: Task | null, events: ActivityEvent[]): Promise<VerdictResult>;
}

export interface TaskPlanner {
  /** Breaks a project description into micro-tasks; [] on any failure. */
  planTasks(projectDescription: string): Promise<PlannedTask[]>;
}

export type PlanningVerdictProvider = VerdictProvider & TaskPlanner;

export const NO_TASK_MESSAGE = 'No active task selected. Pick a task to get started! 🎯';
