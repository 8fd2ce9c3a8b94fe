// Offline provider used when no API key is configured. Keyword overlap between
// the task and the touched files decides the verdict; no network access.

import type { ActivityEvent, PlannedTask, Task, VerdictResult } from '../types';
import type { PlanningVerdictProvider } from './types';
import { NO_TASK_MESSAGE } from './types';

const MIN_KEYWORD = 4;
const STOPWORDS = new Set(['with', 'from', 'into', 'that', 'this', 'then', 'than', 'have', 'make', 'task', 'some']);

export function keywords(text: string): string[] {
  return [...new Set(
    text.toLowerCase().split(/[^a-z0-9]+/).filter(w => w.length >= MIN_KEYWORD && !STOPWORDS.has(w)),
  )];
}

export class MockVerdictProvider implements PlanningVerdictProvider {
  readonly id = 'mock';
  readonly name = 'Mock AI (offline)';

  async classify(task: Task | null, events: ActivityEvent[]): Promise<VerdictResult> {
    if (!task) return { verdict: 'Idle', message: NO_TASK_MESSAGE };
    if (events.length === 0) {
      return { verdict: 'Idle', message: 'Files won\'t write themselves. *Hoot hoot.* 🦉' };
    }

    const words = keywords(`${task.title} ${task.description}`);
    const last = events[events.length - 1];
    const related = events.find(e => {
      const haystack = `${e.source} ${e.content}`.toLowerCase();
      return words.some(w => haystack.includes(w));
    });

    if (related || words.length === 0) {
      const source = (related ?? last).source;
      return { verdict: 'On Track', message: `Nice, editing ${source}! Keep going on "${task.title}".` };
    }
    return { verdict: 'Distracted', message: `Wait, why ${last.source}? We're supposed to be on "${task.title}". 🤨` };
  }

  async planTasks(projectDescription: string): Promise<PlannedTask[]> {
    const project = projectDescription.trim();
    if (!project) return [];
    return [
      { title: 'Set up the project skeleton', description: `Create the repository and tooling for: ${project}`, estimatedDuration: '15 min' },
      { title: 'Sketch the data model', description: 'Write down the core types and how they relate.', estimatedDuration: '20 min' },
      { title: 'Build the first core feature', description: 'Implement the smallest slice that does something useful.', estimatedDuration: '30 min' },
      { title: 'Add tests for the core feature', description: 'Cover the happy path and one edge case.', estimatedDuration: '20 min' },
      { title: 'Polish and write the README', description: 'Tidy naming, error messages and usage docs.', estimatedDuration: '15 min' },
    ];
  }
}
