import type { FocuslineConfig } from './config';
import { ActivityFeed } from './activity/feed';
import { FileWatcher } from './activity/watcher';
import { FocusMonitor } from './monitor';
import { FocusScheduler } from './scheduler';
import { createVerdictProvider } from './providers';
import type { PlanningVerdictProvider } from './providers/types';
import { openStores } from './stores';
import type { Stores } from './stores';

export interface FocusContext extends Stores {
  config: FocuslineConfig;
  feed: ActivityFeed;
  watcher: FileWatcher;
  provider: PlanningVerdictProvider;
  monitor: FocusMonitor;
  scheduler: FocusScheduler;
}

/** Wires one instance of every component; callers pass the pieces they need around explicitly. */
export function createContext(config: FocuslineConfig, overrides: Partial<Pick<FocusContext, 'provider'> & Stores> = {}): FocusContext {
  const stores = overrides.tasks && overrides.metrics
    ? { tasks: overrides.tasks, metrics: overrides.metrics, degraded: false }
    : openStores(config);
  const feed = new ActivityFeed({
    maxEvents: config.activity.maxEvents,
    debounceMs: config.activity.debounceMs,
    ignore: config.activity.ignore,
  });
  const watcher = new FileWatcher(feed, {
    maxContentChars: config.activity.maxContentChars,
    textExtensions: config.activity.textExtensions,
  });
  const provider = overrides.provider ?? createVerdictProvider(config.provider);
  const monitor = new FocusMonitor(
    { tasks: stores.tasks, feed, metrics: stores.metrics, provider },
    {
      mode: config.mode,
      logLimit: config.monitor.logLimit,
      escalationThreshold: config.monitor.escalationThreshold,
      activityWindow: config.monitor.activityWindow,
      demoChars: config.activity.maxContentChars,
    },
  );
  const scheduler = new FocusScheduler(monitor, config.monitor.checkIntervalSeconds);
  return { ...stores, config, feed, watcher, provider, monitor, scheduler };
}
