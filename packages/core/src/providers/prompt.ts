import type { ActivityEvent, Task } from '../types';

const EVENTS_IN_PROMPT = 5;
const CONTENT_IN_PROMPT = 200;

export function buildVerdictPrompt(task: Task, events: ActivityEvent[]): string {
  const activity = events.length
    ? events.slice(-EVENTS_IN_PROMPT)
      .map(e => `- ${e.kind.toUpperCase()}: ${e.source}\n  Content: ${(e.content || 'N/A').slice(0, CONTENT_IN_PROMPT)}`)
      .join('\n')
    : 'No file changes detected since the last check.';

  return `You are an accountability buddy for a developer.

Current task:
- Title: ${task.title}
- Description: ${task.description || 'No description'}

Recent activity:
${activity}

Decide whether the activity matches the task and answer with exactly one verdict:
- "On Track": activity is related to the task (be encouraging and specific)
- "Distracted": activity is unrelated to the task (be playfully sassy)
- "Idle": there is no activity (be gently nudging)

Respond with JSON only:
{"verdict": "On Track" | "Distracted" | "Idle", "message": "1-2 sentences", "reasoning": "short explanation"}`;
}

export function buildPlanPrompt(projectDescription: string): string {
  return `You are a project planner. The user wants to build: "${projectDescription}"

Break this into 5-8 concrete micro-tasks, each achievable in 15-30 minutes,
ordered from setup to core features to polish.

Respond with JSON only:
{"tasks": [{"title": "...", "description": "...", "estimated_duration": "20 min"}]}`;
}
