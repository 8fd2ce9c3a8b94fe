export const TASK_STATUSES = ['todo', 'in_progress', 'done'] as const;
export type TaskStatus = typeof TASK_STATUSES[number];

export const STATUS_LABELS: Record<TaskStatus, string> = {
  todo: 'Todo',
  in_progress: 'In Progress',
  done: 'Done',
};

export interface Task {
  id: number;
  title: string;
  description: string;
  status: TaskStatus;
  estimatedDuration: string;
  position: number;
  createdAt: string;
  updatedAt: string;
}

export interface NewTask {
  title: string;
  description?: string;
  estimatedDuration?: string;
  status?: TaskStatus;
}

export type TaskPatch = Partial<Pick<Task, 'title' | 'description' | 'status' | 'estimatedDuration' | 'position'>>;

export const VERDICTS = ['On Track', 'Distracted', 'Idle'] as const;
export type Verdict = typeof VERDICTS[number];

export interface VerdictResult {
  verdict: Verdict;
  message: string;
}

export type ActivityKind = 'created' | 'modified' | 'deleted' | 'text_edit';

export interface ActivityEvent {
  kind: ActivityKind;
  source: string;
  content: string;
  timestamp: string;
}

export interface FocusHistoryEntry {
  id: number;
  taskId: number;
  taskTitle: string;
  verdict: Verdict;
  message: string;
  timestamp: string;
}

export interface DailyStreakRecord {
  date: string;
  onTrackCount: number;
  distractedCount: number;
  idleCount: number;
  maxConsecutiveOnTrack: number;
  focusScore: number;
}

export interface TodayStats {
  onTrack: number;
  distracted: number;
  idle: number;
  maxStreak: number;
  focusScore: number;
  totalChecks: number;
}

export interface ChartSeries {
  dates: string[];
  focusScores: number[];
  onTrack: number[];
  distracted: number[];
  idle: number[];
}

export interface PlannedTask {
  title: string;
  description: string;
  estimatedDuration: string;
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return TASK_STATUSES.some(s => s === value);
}

export function isVerdict(value: unknown): value is Verdict {
  return VERDICTS.some(v => v === value);
}
