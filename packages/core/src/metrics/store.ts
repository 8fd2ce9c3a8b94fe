import * as path from 'path';
import { readJSON, writeJSON, isRecord } from '../json-file';
import { ValidationError } from '../errors';
import { VERDICTS, isVerdict } from '../types';
import type { ChartSeries, DailyStreakRecord, FocusHistoryEntry, TodayStats, Verdict } from '../types';
import { dayKey, daysBefore, shortDate } from './dates';

export interface MetricsStore {
  readonly durable: boolean;

  record(taskId: number, taskTitle: string, verdict: Verdict, message: string): Promise<FocusHistoryEntry>;
  todayStats(): Promise<TodayStats>;
  currentStreak(): Promise<number>;
  weeklyStats(): Promise<DailyStreakRecord[]>;
  history(limit?: number): Promise<FocusHistoryEntry[]>;
  chartSeries(): Promise<ChartSeries>;
  clearAll(): Promise<void>;
}

export interface MetricsDocument {
  nextId: number;
  entries: FocusHistoryEntry[];
  streaks: Record<string, DailyStreakRecord>;
}

export type Clock = () => Date;

function emptyDocument(): MetricsDocument {
  return { nextId: 1, entries: [], streaks: {} };
}

function emptyRecord(date: string): DailyStreakRecord {
  return { date, onTrackCount: 0, distractedCount: 0, idleCount: 0, maxConsecutiveOnTrack: 0, focusScore: 0 };
}

export function totalChecks(r: DailyStreakRecord): number {
  return r.onTrackCount + r.distractedCount + r.idleCount;
}

export function focusScore(r: DailyStreakRecord): number {
  const total = totalChecks(r);
  return total > 0 ? (r.onTrackCount / total) * 100 : 0;
}

/** Number of trailing 'On Track' verdicts, newest entry last. */
export function trailingOnTrack(entries: FocusHistoryEntry[]): number {
  let streak = 0;
  for (let i = entries.length - 1; i >= 0; i--) {
    if (entries[i].verdict !== 'On Track') break;
    streak++;
  }
  return streak;
}

export class MemoryMetricsStore implements MetricsStore {
  readonly durable: boolean = false;

  constructor(
    protected doc: MetricsDocument = emptyDocument(),
    protected now: Clock = () => new Date(),
  ) {}

  /** Called at the start of every operation. */
  protected load(): void {}

  /** Writes the next document; it becomes current only when this returns. */
  protected persist(_next: MetricsDocument): void {}

  async record(taskId: number, taskTitle: string, verdict: Verdict, message: string): Promise<FocusHistoryEntry> {
    if (!isVerdict(verdict)) {
      throw new ValidationError(`Invalid verdict "${String(verdict)}". Must be one of: ${VERDICTS.join(', ')}`, 'INVALID_VERDICT');
    }
    this.load();
    const ts = this.now();
    const date = dayKey(ts);
    const entry: FocusHistoryEntry = {
      id: this.doc.nextId,
      taskId,
      taskTitle,
      verdict,
      message,
      timestamp: ts.toISOString(),
    };
    const entries = [...this.doc.entries, entry];

    const rec = { ...(this.doc.streaks[date] ?? emptyRecord(date)) };
    if (verdict === 'On Track') rec.onTrackCount++;
    else if (verdict === 'Distracted') rec.distractedCount++;
    else rec.idleCount++;
    rec.maxConsecutiveOnTrack = Math.max(rec.maxConsecutiveOnTrack, trailingOnTrack(entriesOn(entries, date)));
    rec.focusScore = focusScore(rec);

    this.commit({ nextId: entry.id + 1, entries, streaks: { ...this.doc.streaks, [date]: rec } });
    return { ...entry };
  }

  async todayStats(): Promise<TodayStats> {
    this.load();
    const rec = this.doc.streaks[dayKey(this.now())];
    if (!rec) return { onTrack: 0, distracted: 0, idle: 0, maxStreak: 0, focusScore: 0, totalChecks: 0 };
    return {
      onTrack: rec.onTrackCount,
      distracted: rec.distractedCount,
      idle: rec.idleCount,
      maxStreak: rec.maxConsecutiveOnTrack,
      focusScore: Math.round(rec.focusScore * 10) / 10,
      totalChecks: totalChecks(rec),
    };
  }

  async currentStreak(): Promise<number> {
    this.load();
    return trailingOnTrack(entriesOn(this.doc.entries, dayKey(this.now())));
  }

  async weeklyStats(): Promise<DailyStreakRecord[]> {
    this.load();
    const today = this.now();
    const stats: DailyStreakRecord[] = [];
    for (let i = 0; i < 7; i++) {
      const rec = this.doc.streaks[dayKey(daysBefore(today, i))];
      if (rec) stats.push({ ...rec });
    }
    return stats;
  }

  async history(limit = 20): Promise<FocusHistoryEntry[]> {
    if (limit <= 0) return [];
    this.load();
    return this.doc.entries.slice(-limit).reverse().map(e => ({ ...e }));
  }

  async chartSeries(): Promise<ChartSeries> {
    this.load();
    const today = this.now();
    const series: ChartSeries = { dates: [], focusScores: [], onTrack: [], distracted: [], idle: [] };
    for (let i = 6; i >= 0; i--) {
      const day = daysBefore(today, i);
      const rec = this.doc.streaks[dayKey(day)] ?? emptyRecord(dayKey(day));
      series.dates.push(shortDate(day));
      series.focusScores.push(rec.focusScore);
      series.onTrack.push(rec.onTrackCount);
      series.distracted.push(rec.distractedCount);
      series.idle.push(rec.idleCount);
    }
    return series;
  }

  async clearAll(): Promise<void> {
    this.load();
    this.commit({ nextId: this.doc.nextId, entries: [], streaks: {} });
  }

  private commit(next: MetricsDocument): void {
    this.persist(next);
    this.doc = next;
  }
}

function entriesOn(entries: FocusHistoryEntry[], date: string): FocusHistoryEntry[] {
  return entries.filter(e => dayKey(new Date(e.timestamp)) === date);
}

// --- File store (history.json + streaks.json) ---

function isEntry(v: unknown): v is FocusHistoryEntry {
  return isRecord(v)
    && typeof v.id === 'number'
    && typeof v.taskId === 'number'
    && typeof v.taskTitle === 'string'
    && isVerdict(v.verdict)
    && typeof v.message === 'string'
    && typeof v.timestamp === 'string';
}

function isStreakRecord(v: unknown): v is DailyStreakRecord {
  return isRecord(v)
    && typeof v.date === 'string'
    && typeof v.onTrackCount === 'number'
    && typeof v.distractedCount === 'number'
    && typeof v.idleCount === 'number'
    && typeof v.maxConsecutiveOnTrack === 'number'
    && typeof v.focusScore === 'number';
}

export function readMetricsDocument(historyFile: string, streaksFile: string): MetricsDocument {
  const doc = emptyDocument();
  const history = readJSON(historyFile);
  if (isRecord(history) && Array.isArray(history.entries)) {
    doc.entries = history.entries.filter(isEntry);
    const maxId = doc.entries.reduce((m, e) => Math.max(m, e.id), 0);
    doc.nextId = typeof history.nextId === 'number' ? Math.max(history.nextId, maxId + 1) : maxId + 1;
  }
  const streaks = readJSON(streaksFile);
  if (isRecord(streaks)) {
    for (const [date, rec] of Object.entries(streaks)) {
      if (isStreakRecord(rec)) doc.streaks[date] = rec;
    }
  }
  return doc;
}

export class FileMetricsStore extends MemoryMetricsStore {
  readonly durable: boolean = true;
  readonly historyFile: string;
  readonly streaksFile: string;

  /** Throws when the data directory cannot be created or written. */
  constructor(dataDir: string, now?: Clock) {
    const historyFile = path.join(dataDir, 'history.json');
    const streaksFile = path.join(dataDir, 'streaks.json');
    super(readMetricsDocument(historyFile, streaksFile), now);
    this.historyFile = historyFile;
    this.streaksFile = streaksFile;
    this.persist(this.doc);
  }

  /** Picks up writes from other processes on the same data directory. */
  protected load(): void {
    this.doc = readMetricsDocument(this.historyFile, this.streaksFile);
  }

  protected persist(next: MetricsDocument): void {
    writeJSON(this.historyFile, { nextId: next.nextId, entries: next.entries });
    writeJSON(this.streaksFile, next.streaks);
  }
}
