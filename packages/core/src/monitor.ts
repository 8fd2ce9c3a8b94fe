import { errorMessage } from './errors';
import type { LaunchMode } from './config';
import type { ActivityFeed } from './activity/feed';
import type { MetricsStore } from './metrics/store';
import type { TaskStore } from './tasks/store';
import type { VerdictProvider } from './providers/types';
import { NO_TASK_MESSAGE } from './providers/types';
import type { ActivityEvent, Verdict, VerdictResult } from './types';

export const NOT_ATTACHED_MESSAGE = '⚠️ Verdict provider not attached. Check your provider configuration.';
export const DEMO_SOURCE = 'demo_workspace';

const VERDICT_EMOJI: Record<Verdict, string> = {
  'On Track': '✅',
  'Distracted': '⚠️',
  'Idle': '💤',
};

export interface FocusAlert {
  title: string;
  message: string;
  verdict: Verdict;
}

/** Raised once a run of Distracted (or Idle) verdicts reaches the threshold. */
export interface EscalationSignal {
  verdict: 'Distracted' | 'Idle';
  consecutive: number;
}

export interface CheckResult {
  /** Rolling log, oldest line first. */
  log: string;
  verdict: Verdict | null;
  message: string;
  alert: FocusAlert | null;
  escalation: EscalationSignal | null;
}

/** Per-call overrides; `text` classifies that text once without changing the launch mode. */
export interface CheckRequest {
  text?: string;
}

export interface EscalationState {
  consecutiveDistracted: number;
  consecutiveIdle: number;
}

export interface FocusMonitorDeps {
  tasks: TaskStore;
  feed: ActivityFeed;
  metrics: MetricsStore;
  provider?: VerdictProvider | null;
}

export interface FocusMonitorOptions {
  mode: LaunchMode;
  logLimit: number;
  escalationThreshold: number;
  activityWindow: number;
  demoChars: number;
}

const DEFAULT_OPTIONS: FocusMonitorOptions = {
  mode: 'local',
  logLimit: 20,
  escalationThreshold: 3,
  activityWindow: 10,
  demoChars: 500,
};

/**
 * Runs one focus check per `runCheck()` call. Callers serialize calls
 * (see FocusScheduler); the monitor itself holds no lock.
 */
export class FocusMonitor {
  private tasks: TaskStore;
  private feed: ActivityFeed;
  private metrics: MetricsStore;
  private provider: VerdictProvider | null;
  private opts: FocusMonitorOptions;

  private consecutiveDistracted = 0;
  private consecutiveIdle = 0;
  private activityLog: string[] = [];
  private demoText = '';

  constructor(deps: FocusMonitorDeps, opts: Partial<FocusMonitorOptions> = {}) {
    this.tasks = deps.tasks;
    this.feed = deps.feed;
    this.metrics = deps.metrics;
    this.provider = deps.provider ?? null;
    this.opts = { ...DEFAULT_OPTIONS, ...opts };
  }

  get mode(): LaunchMode {
    return this.opts.mode;
  }

  get escalation(): EscalationState {
    return { consecutiveDistracted: this.consecutiveDistracted, consecutiveIdle: this.consecutiveIdle };
  }

  get log(): string[] {
    return [...this.activityLog];
  }

  setProvider(provider: VerdictProvider | null): void {
    this.provider = provider;
  }

  setLaunchMode(mode: LaunchMode): void {
    this.opts.mode = mode;
  }

  updateDemoText(text: string): string {
    this.demoText = text;
    return `✅ Text updated (${text.length} characters)`;
  }

  activitySummary(monitoringActive: boolean): string {
    if (this.opts.mode === 'demo') return `📝 Demo text content: ${this.demoText.length} characters`;
    if (!monitoringActive) return '⏸️ Monitoring is not active';
    const recent = this.feed.recent(5);
    if (!recent.length) return '💤 No recent file activity';
    return recent.map(e => `• ${e.kind.toUpperCase()}: ${e.source}`).join('\n');
  }

  resetLog(): void {
    this.activityLog = [];
  }

  resetEscalation(): void {
    this.consecutiveDistracted = 0;
    this.consecutiveIdle = 0;
  }

  /** Never rejects; unexpected failures come back as a log line with a null verdict. */
  async runCheck(request: CheckRequest = {}): Promise<CheckResult> {
    const provider = this.provider;
    if (!provider) {
      return { log: NOT_ATTACHED_MESSAGE, verdict: null, message: NOT_ATTACHED_MESSAGE, alert: null, escalation: null };
    }
    try {
      return await this.check(provider, request);
    } catch (err) {
      const message = `⚠️ Focus check failed: ${errorMessage(err)}`;
      return { log: [...this.activityLog, message].join('\n'), verdict: null, message, alert: null, escalation: null };
    }
  }

  private async check(provider: VerdictProvider, request: CheckRequest): Promise<CheckResult> {
    const task = await this.tasks.getActive();
    // No active task: Idle without asking the provider, no escalation, nothing recorded.
    if (!task) return this.finish({ verdict: 'Idle', message: NO_TASK_MESSAGE }, null);

    const text = request.text ?? (this.opts.mode === 'demo' ? this.demoText : undefined);
    const activity = text !== undefined ? this.demoActivity(text) : this.feed.recent(this.opts.activityWindow);
    const result = await provider.classify(task, activity);

    // Counters move only once the verdict is stored.
    await this.metrics.record(task.id, task.title, result.verdict, result.message);
    if (result.verdict === 'On Track') this.resetEscalation();
    else if (result.verdict === 'Distracted') this.consecutiveDistracted++;
    else this.consecutiveIdle++;

    return this.finish(result, this.escalationFor(result.verdict));
  }

  private demoActivity(text: string): ActivityEvent[] {
    if (!text) return [];
    return [{
      kind: 'text_edit',
      source: DEMO_SOURCE,
      content: text.slice(-this.opts.demoChars),
      timestamp: new Date().toISOString(),
    }];
  }

  private escalationFor(verdict: Verdict): EscalationSignal | null {
    const threshold = this.opts.escalationThreshold;
    if (verdict === 'Distracted' && this.consecutiveDistracted >= threshold) {
      return { verdict, consecutive: this.consecutiveDistracted };
    }
    if (verdict === 'Idle' && this.consecutiveIdle >= threshold) {
      return { verdict, consecutive: this.consecutiveIdle };
    }
    return null;
  }

  private finish(result: VerdictResult, escalation: EscalationSignal | null): CheckResult {
    this.activityLog.push(`${VERDICT_EMOJI[result.verdict]} [${result.verdict}] ${result.message}`);
    if (this.activityLog.length > this.opts.logLimit) {
      this.activityLog = this.activityLog.slice(-this.opts.logLimit);
    }
    const alert = result.verdict === 'On Track'
      ? null
      : { title: 'Focus alert 🦉', message: result.message, verdict: result.verdict };
    return { log: this.activityLog.join('\n'), verdict: result.verdict, message: result.message, alert, escalation };
  }
}
