import type { ActivityEvent, ActivityKind } from '../types';

export interface ActivityFeedOptions {
  maxEvents: number;
  debounceMs: number;
  /** Path segments or suffixes that are never recorded ('.git', 'node_modules', '.pyc'). */
  ignore: string[];
}

export interface ActivityInput {
  kind: ActivityKind;
  source: string;
  content?: string;
  timestamp?: Date;
}

const DEFAULT_OPTIONS: ActivityFeedOptions = {
  maxEvents: 50,
  debounceMs: 1000,
  ignore: [],
};

/**
 * Bounded, debounced log of recent workspace activity.
 * Oldest events are evicted first once `maxEvents` is reached.
 */
export class ActivityFeed {
  private events: ActivityEvent[] = [];
  private lastSeen = new Map<string, number>();
  private opts: ActivityFeedOptions;

  constructor(opts: Partial<ActivityFeedOptions> = {}) {
    this.opts = { ...DEFAULT_OPTIONS, ...opts };
  }

  get size(): number {
    return this.events.length;
  }

  /** Sources still inside their debounce window. */
  get debouncedSources(): number {
    return this.lastSeen.size;
  }

  shouldIgnore(source: string): boolean {
    const parts = source.split(/[\\/]/);
    return this.opts.ignore.some(p => parts.includes(p) || source.endsWith(p));
  }

  isDebounced(source: string, at: Date = new Date()): boolean {
    const last = this.lastSeen.get(source);
    return last !== undefined && at.getTime() - last < this.opts.debounceMs;
  }

  /** Returns false when the event was filtered out or debounced. */
  record(input: ActivityInput): boolean {
    const at = input.timestamp ?? new Date();
    if (this.shouldIgnore(input.source) || this.isDebounced(input.source, at)) return false;
    this.forgetBefore(at.getTime() - this.opts.debounceMs);
    this.lastSeen.set(input.source, at.getTime());

    this.events.push({
      kind: input.kind,
      source: input.source,
      content: input.content ?? '',
      timestamp: at.toISOString(),
    });
    if (this.events.length > this.opts.maxEvents) {
      this.events = this.events.slice(-this.opts.maxEvents);
    }
    return true;
  }

  /** Most recent events, oldest first. */
  recent(limit = 10): ActivityEvent[] {
    if (limit <= 0) return [];
    return this.events.slice(-limit).map(e => ({ ...e }));
  }

  private forgetBefore(cutoff: number) {
    for (const [source, seen] of this.lastSeen) {
      if (seen <= cutoff) this.lastSeen.delete(source);
    }
  }

  clear(): void {
    this.events = [];
    this.lastSeen.clear();
  }
}
