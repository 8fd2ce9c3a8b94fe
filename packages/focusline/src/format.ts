import chalk from 'chalk';
import { STATUS_LABELS } from '@focusline/core';
import type { ChartSeries, DailyStreakRecord, FocusHistoryEntry, PlannedTask, Task, TaskStatus, TodayStats, Verdict } from '@focusline/core';

const statusIcon: Record<TaskStatus, string> = {
  todo: '○',
  in_progress: '◐',
  done: '●',
};

const statusColor: Record<TaskStatus, (s: string) => string> = {
  todo: chalk.white,
  in_progress: chalk.cyan.bold,
  done: chalk.gray,
};

const verdictColor: Record<Verdict, (s: string) => string> = {
  'On Track': chalk.green,
  'Distracted': chalk.yellow,
  'Idle': chalk.gray,
};

const BAR_WIDTH = 20;

export function formatTaskLine(task: Task): string {
  const est = task.estimatedDuration ? chalk.gray(` ~${task.estimatedDuration}`) : '';
  return `${statusIcon[task.status]} ${chalk.dim(`#${task.id}`)} ${statusColor[task.status](task.title)}${est}`;
}

export function formatTaskFull(task: Task): string {
  const lines = [
    chalk.bold(`${statusIcon[task.status]} ${task.title}`),
    '',
    `  ID:       ${task.id}`,
    `  Status:   ${STATUS_LABELS[task.status]}`,
    `  Position: ${task.position}`,
  ];
  if (task.estimatedDuration) lines.push(`  Estimate: ${task.estimatedDuration}`);
  if (task.description) lines.push(`  Notes:    ${task.description}`);
  lines.push(`  Created:  ${task.createdAt}`);
  lines.push(`  Updated:  ${task.updatedAt}`);
  return lines.join('\n');
}

export function colorVerdict(verdict: Verdict, text: string = verdict): string {
  return verdictColor[verdict](text);
}

export function formatStats(stats: TodayStats, streak: number): string {
  return [
    chalk.bold('\n📊 Today\n'),
    `  ${'Focus score'.padEnd(14)} ${stats.focusScore}%`,
    `  ${'Checks'.padEnd(14)} ${stats.totalChecks}`,
    `  ${'On Track'.padEnd(14)} ${colorVerdict('On Track', String(stats.onTrack))}`,
    `  ${'Distracted'.padEnd(14)} ${colorVerdict('Distracted', String(stats.distracted))}`,
    `  ${'Idle'.padEnd(14)} ${colorVerdict('Idle', String(stats.idle))}`,
    `  ${'Streak'.padEnd(14)} ${streak} 🔥 (best ${stats.maxStreak})`,
    '',
  ].join('\n');
}

export function scoreBar(score: number): string {
  const filled = Math.round((score / 100) * BAR_WIDTH);
  return '█'.repeat(filled) + chalk.dim('░'.repeat(BAR_WIDTH - filled));
}

/** One line per day, oldest first. */
export function formatWeek(series: ChartSeries): string[] {
  return series.dates.map((date, i) => {
    const score = series.focusScores[i];
    const counts = chalk.dim(`${series.onTrack[i]}/${series.distracted[i]}/${series.idle[i]}`);
    return `  ${date}  ${scoreBar(score)} ${`${Math.round(score)}%`.padStart(4)}  ${counts}`;
  });
}

export function formatHistoryEntry(e: FocusHistoryEntry): string {
  const when = chalk.dim(e.timestamp.slice(0, 16).replace('T', ' '));
  return `${when}  ${colorVerdict(e.verdict, e.verdict.padEnd(10))}  ${e.taskTitle}: ${e.message}`;
}

export function historyRows(entries: FocusHistoryEntry[]) {
  return entries.map(e => ({
    id: e.id,
    timestamp: e.timestamp,
    taskId: e.taskId,
    taskTitle: e.taskTitle,
    verdict: e.verdict,
    message: e.message,
  }));
}

export function weeklyRows(records: DailyStreakRecord[]) {
  return records.map(r => ({ ...r, focusScore: Math.round(r.focusScore * 10) / 10 }));
}

export function formatPlannedTask(t: PlannedTask, index: number): string {
  const est = t.estimatedDuration ? chalk.gray(` ~${t.estimatedDuration}`) : '';
  const desc = t.description ? `\n     ${chalk.dim(t.description)}` : '';
  return `  ${index + 1}. ${t.title}${est}${desc}`;
}
