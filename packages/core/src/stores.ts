import { errorMessage } from './errors';
import { log } from './output';
import type { FocuslineConfig } from './config';
import { FileMetricsStore, MemoryMetricsStore } from './metrics/store';
import type { Clock, MetricsStore } from './metrics/store';
import { FileTaskStore, MemoryTaskStore } from './tasks/store';
import type { TaskStore } from './tasks/store';

export interface Stores {
  tasks: TaskStore;
  metrics: MetricsStore;
  /** True when file storage was requested but could not be opened. */
  degraded: boolean;
}

/**
 * Opens the configured stores. When the data directory cannot be used the
 * process continues on in-memory stores, with a warning.
 */
export function openStores(config: Pick<FocuslineConfig, 'dataDir' | 'storage'>, now?: Clock): Stores {
  if (config.storage === 'memory') {
    return { tasks: new MemoryTaskStore(), metrics: new MemoryMetricsStore(undefined, now), degraded: false };
  }
  try {
    return { tasks: new FileTaskStore(config.dataDir), metrics: new FileMetricsStore(config.dataDir, now), degraded: false };
  } catch (err) {
    log.warn(`Storage at ${config.dataDir} unavailable (${errorMessage(err)}). Falling back to in-memory mode; nothing will be saved.`);
    return { tasks: new MemoryTaskStore(), metrics: new MemoryMetricsStore(undefined, now), degraded: true };
  }
}
