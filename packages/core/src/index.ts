export * from './types';
export * from './errors';
export { setJsonMode, isJsonMode, setQuiet, out, log } from './output';
export {
  loadConfig, defaultConfig, mergeConfig, applyEnv, initDataDir, configPath, DATA_DIR, CHECK_INTERVALS,
} from './config';
export type {
  FocuslineConfig, LaunchMode, StorageMode, ProviderName, ProviderSettings, MonitorSettings, ActivitySettings,
} from './config';
export { MemoryTaskStore, FileTaskStore } from './tasks/store';
export type { TaskStore } from './tasks/store';
export { parseStatus, toTaskPatch, requireTitle } from './tasks/validate';
export { MemoryMetricsStore, FileMetricsStore, focusScore, trailingOnTrack } from './metrics/store';
export type { MetricsStore, Clock } from './metrics/store';
export { dayKey } from './metrics/dates';
export { ActivityFeed } from './activity/feed';
export type { ActivityInput, ActivityFeedOptions } from './activity/feed';
export { FileWatcher } from './activity/watcher';
export { captureContent, BINARY_SENTINEL } from './activity/capture';
export * from './providers';
export { FocusMonitor, NOT_ATTACHED_MESSAGE, DEMO_SOURCE } from './monitor';
export type { CheckRequest, CheckResult, FocusAlert, EscalationSignal, EscalationState, FocusMonitorOptions } from './monitor';
export { FocusScheduler } from './scheduler';
export { PomodoroTimer, formatTime, WORK_SECONDS, BREAK_SECONDS } from './pomodoro';
export type { TickResult } from './pomodoro';
export { openStores } from './stores';
export type { Stores } from './stores';
export { createContext } from './context';
export type { FocusContext } from './context';
export { sendDesktopNotification, ringBell } from './notify';
