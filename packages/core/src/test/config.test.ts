import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { applyEnv, configPath, defaultConfig, initDataDir, loadConfig, mergeConfig } from '../config';
import { cleanupTempDirs, tempDir } from './helpers';

afterEach(() => {
  cleanupTempDirs();
});

describe('mergeConfig', () => {
  it('overlays known keys and keeps defaults for the rest', () => {
    const base = defaultConfig('/data');
    const merged = mergeConfig(base, {
      mode: 'demo',
      provider: { name: 'anthropic', model: 'claude-test' },
      monitor: { checkIntervalSeconds: 60, logLimit: 'lots' },
      activity: { ignore: ['dist', 42] },
      extra: true,
    });

    expect(merged.dataDir).toBe('/data');
    expect(merged.mode).toBe('demo');
    expect(merged.provider).toMatchObject({ name: 'anthropic', model: 'claude-test', apiKey: null });
    expect(merged.monitor).toEqual({ checkIntervalSeconds: 60, escalationThreshold: 3, logLimit: 20, activityWindow: 10 });
    expect(merged.activity.ignore).toEqual(['dist']);
    expect(merged.activity.maxEvents).toBe(50);
  });

  it('ignores an unknown mode and a non-object document', () => {
    const base = defaultConfig('/data');
    expect(mergeConfig(base, { mode: 'cloud' }).mode).toBe('local');
    expect(mergeConfig(base, 'just a string')).toEqual(base);
  });
});

describe('applyEnv', () => {
  const base = defaultConfig('/data');

  it('picks OpenAI when only its key is set', () => {
    const config = applyEnv(base, { OPENAI_API_KEY: 'test-key' });
    expect(config.provider).toMatchObject({ name: 'openai', apiKey: 'test-key' });
  });

  it('picks Anthropic when only its key is set', () => {
    const config = applyEnv(base, { ANTHROPIC_API_KEY: 'test-key' });
    expect(config.provider).toMatchObject({ name: 'anthropic', apiKey: 'test-key' });
  });

  it('stays on auto without keys', () => {
    expect(applyEnv(base, {}).provider.name).toBe('auto');
  });

  it('honours an explicit provider and the mode and storage overrides', () => {
    const config = applyEnv(base, {
      FOCUSLINE_PROVIDER: 'mock',
      OPENAI_API_KEY: 'test-key',
      FOCUSLINE_MODE: 'demo',
      FOCUSLINE_STORAGE: 'memory',
      FOCUSLINE_MODEL: 'gpt-test',
    });
    expect(config.provider).toMatchObject({ name: 'mock', apiKey: null, model: 'gpt-test' });
    expect(config.mode).toBe('demo');
    expect(config.storage).toBe('memory');
  });
});

describe('initDataDir / loadConfig', () => {
  it('writes a default config once', () => {
    const dir = path.join(tempDir(), '.focusline');

    expect(initDataDir(dir)).toBe(true);
    expect(initDataDir(dir)).toBe(false);

    const written = yaml.load(fs.readFileSync(configPath(dir), 'utf-8'));
    expect(written).toMatchObject({ mode: 'local', storage: 'file', monitor: { checkIntervalSeconds: 30 } });
  });

  it('reads values back from config.yaml', () => {
    const dir = tempDir();
    fs.writeFileSync(configPath(dir), yaml.dump({ monitor: { escalationThreshold: 5 }, activity: { debounceMs: 250 } }));

    const config = loadConfig(dir);
    expect(config.dataDir).toBe(dir);
    expect(config.monitor.escalationThreshold).toBe(5);
    expect(config.activity.debounceMs).toBe(250);
  });

  it('surfaces a malformed config.yaml', () => {
    const dir = tempDir();
    fs.writeFileSync(configPath(dir), 'monitor: [unclosed');
    expect(() => loadConfig(dir)).toThrow();
  });
});
