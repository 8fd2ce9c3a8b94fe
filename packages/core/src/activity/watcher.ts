import * as fs from 'fs';
import * as path from 'path';
import { ValidationError, errorMessage } from '../errors';
import { log } from '../output';
import type { ActivityEvent, ActivityKind } from '../types';
import type { ActivityFeed } from './feed';
import { captureContent } from './capture';
import type { CaptureOptions } from './capture';

type EventHandler = (event: ActivityEvent) => void;

/** Recursive directory watcher that pushes file events into an ActivityFeed. */
export class FileWatcher {
  private watcher: fs.FSWatcher | null = null;
  private root: string | null = null;
  private handlers: EventHandler[] = [];

  constructor(private feed: ActivityFeed, private capture: CaptureOptions) {}

  onEvent(handler: EventHandler): void {
    this.handlers.push(handler);
  }

  get watchingPath(): string | null {
    return this.root;
  }

  isRunning(): boolean {
    return this.watcher !== null;
  }

  start(dir: string): void {
    if (this.watcher) this.stop();
    const root = path.resolve(dir);
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new ValidationError(`Path does not exist: ${dir}`);
    }
    this.root = root;
    this.watcher = fs.watch(root, { recursive: true }, (eventType, filename) => {
      if (!filename) return;
      const abs = path.join(root, filename);
      const kind: ActivityKind = eventType === 'change' ? 'modified' : fs.existsSync(abs) ? 'created' : 'deleted';
      this.ingest(abs, kind);
    });
    this.watcher.on('error', (err) => log.warn(`File watcher error: ${errorMessage(err)}`));
  }

  /** Closes the watcher and empties the feed. */
  stop(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    this.root = null;
    this.feed.clear();
  }

  /** Records one file event; directories, ignored paths and debounced repeats are dropped. */
  ingest(absPath: string, kind: ActivityKind, at: Date = new Date()): boolean {
    const base = this.root ?? path.dirname(absPath);
    const source = path.relative(base, absPath) || path.basename(absPath);
    if (this.feed.shouldIgnore(source) || this.feed.isDebounced(source, at)) return false;
    if (kind !== 'deleted' && isDirectory(absPath)) return false;

    const content = captureContent(absPath, kind, this.capture);
    if (!this.feed.record({ kind, source, content, timestamp: at })) return false;
    const [event] = this.feed.recent(1);
    for (const h of this.handlers) h(event);
    return true;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
