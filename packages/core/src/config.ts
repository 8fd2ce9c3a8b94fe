import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

export type LaunchMode = 'local' | 'demo';
export type StorageMode = 'file' | 'memory';
export type ProviderName = 'auto' | 'openai' | 'anthropic' | 'mock';

export interface ProviderSettings {
  name: ProviderName;
  model: string | null;
  apiKey: string | null;
  baseUrl: string | null;
  timeoutMs: number;
}

export interface MonitorSettings {
  checkIntervalSeconds: number;
  escalationThreshold: number;
  logLimit: number;
  activityWindow: number;
}

export interface ActivitySettings {
  maxEvents: number;
  debounceMs: number;
  maxContentChars: number;
  ignore: string[];
  textExtensions: string[];
}

export interface FocuslineConfig {
  dataDir: string;
  mode: LaunchMode;
  storage: StorageMode;
  provider: ProviderSettings;
  monitor: MonitorSettings;
  activity: ActivitySettings;
}

export const DATA_DIR = '.focusline';
export const CHECK_INTERVALS: Record<string, number> = {
  '30 seconds': 30,
  '1 minute': 60,
  '5 minutes': 300,
  '10 minutes': 600,
};

export function defaultConfig(dataDir: string = path.resolve(DATA_DIR)): FocuslineConfig {
  return {
    dataDir,
    mode: 'local',
    storage: 'file',
    provider: { name: 'auto', model: null, apiKey: null, baseUrl: null, timeoutMs: 15_000 },
    monitor: { checkIntervalSeconds: 30, escalationThreshold: 3, logLimit: 20, activityWindow: 10 },
    activity: {
      maxEvents: 50,
      debounceMs: 1000,
      maxContentChars: 500,
      ignore: [
        '.git', '__pycache__', '.env', 'node_modules', '.venv', 'venv', '.idea', '.vscode', DATA_DIR,
        '.pyc', '.pyo', '.pyd', '.so', '.dll', '.dylib',
      ],
      textExtensions: [
        '.py', '.js', '.jsx', '.ts', '.tsx', '.html', '.css', '.json', '.md', '.txt', '.yaml', '.yml', '.toml',
        '.c', '.cpp', '.h', '.java', '.go', '.rs', '.rb',
      ],
    },
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function pickString(v: unknown, fallback: string | null): string | null {
  return typeof v === 'string' && v.trim() ? v.trim() : fallback;
}

function pickNumber(v: unknown, fallback: number): number {
  const n = typeof v === 'string' ? Number(v) : v;
  return typeof n === 'number' && Number.isFinite(n) && n > 0 ? n : fallback;
}

function pickStrings(v: unknown, fallback: string[]): string[] {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === 'string') : fallback;
}

function pickEnum<T extends string>(v: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find(a => a === v) ?? fallback;
}

/** Overlays a parsed config.yaml document onto the defaults, ignoring unknown or mistyped keys. */
export function mergeConfig(base: FocuslineConfig, raw: unknown): FocuslineConfig {
  if (!isRecord(raw)) return base;
  const provider = isRecord(raw.provider) ? raw.provider : {};
  const monitor = isRecord(raw.monitor) ? raw.monitor : {};
  const activity = isRecord(raw.activity) ? raw.activity : {};
  return {
    dataDir: base.dataDir,
    mode: pickEnum(raw.mode, ['local', 'demo'] as const, base.mode),
    storage: pickEnum(raw.storage, ['file', 'memory'] as const, base.storage),
    provider: {
      name: pickEnum(provider.name, ['auto', 'openai', 'anthropic', 'mock'] as const, base.provider.name),
      model: pickString(provider.model, base.provider.model),
      apiKey: pickString(provider.apiKey, base.provider.apiKey),
      baseUrl: pickString(provider.baseUrl, base.provider.baseUrl),
      timeoutMs: pickNumber(provider.timeoutMs, base.provider.timeoutMs),
    },
    monitor: {
      checkIntervalSeconds: pickNumber(monitor.checkIntervalSeconds, base.monitor.checkIntervalSeconds),
      escalationThreshold: pickNumber(monitor.escalationThreshold, base.monitor.escalationThreshold),
      logLimit: pickNumber(monitor.logLimit, base.monitor.logLimit),
      activityWindow: pickNumber(monitor.activityWindow, base.monitor.activityWindow),
    },
    activity: {
      maxEvents: pickNumber(activity.maxEvents, base.activity.maxEvents),
      debounceMs: pickNumber(activity.debounceMs, base.activity.debounceMs),
      maxContentChars: pickNumber(activity.maxContentChars, base.activity.maxContentChars),
      ignore: pickStrings(activity.ignore, base.activity.ignore),
      textExtensions: pickStrings(activity.textExtensions, base.activity.textExtensions),
    },
  };
}

/**
 * Environment overrides, highest priority:
 * FOCUSLINE_MODE, FOCUSLINE_STORAGE, FOCUSLINE_PROVIDER, FOCUSLINE_MODEL,
 * OPENAI_API_KEY / ANTHROPIC_API_KEY (matching the selected provider).
 */
export function applyEnv(config: FocuslineConfig, env: NodeJS.ProcessEnv = process.env): FocuslineConfig {
  const provider = { ...config.provider };
  provider.name = pickEnum(env.FOCUSLINE_PROVIDER, ['auto', 'openai', 'anthropic', 'mock'] as const, provider.name);
  provider.model = pickString(env.FOCUSLINE_MODEL, provider.model);
  if (provider.name === 'auto') {
    if (env.OPENAI_API_KEY) provider.name = 'openai';
    else if (env.ANTHROPIC_API_KEY) provider.name = 'anthropic';
  }
  if (provider.name === 'openai') provider.apiKey = pickString(env.OPENAI_API_KEY, provider.apiKey);
  if (provider.name === 'anthropic') provider.apiKey = pickString(env.ANTHROPIC_API_KEY, provider.apiKey);
  return {
    ...config,
    mode: pickEnum(env.FOCUSLINE_MODE, ['local', 'demo'] as const, config.mode),
    storage: pickEnum(env.FOCUSLINE_STORAGE, ['file', 'memory'] as const, config.storage),
    provider,
  };
}

export function configPath(dataDir: string): string {
  return path.join(dataDir, 'config.yaml');
}

export function loadConfig(dataDir: string = path.resolve(process.env.FOCUSLINE_DIR || DATA_DIR)): FocuslineConfig {
  const file = configPath(dataDir);
  const raw: unknown = fs.existsSync(file) ? yaml.load(fs.readFileSync(file, 'utf-8')) : null;
  return applyEnv(mergeConfig(defaultConfig(dataDir), raw));
}

/** Creates the data directory with a default config.yaml. Returns false when it already existed. */
export function initDataDir(dataDir: string): boolean {
  const file = configPath(dataDir);
  if (fs.existsSync(file)) return false;
  fs.mkdirSync(dataDir, { recursive: true });
  const { dataDir: _dir, ...persisted } = defaultConfig(dataDir);
  fs.writeFileSync(file, yaml.dump(persisted));
  return true;
}
