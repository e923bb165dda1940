import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { mergeConfig, loadConfig, DEFAULT_CONFIG, getDbPath, getHeartbeatPath } from './config.js';

describe('mergeConfig', () => {
  it('should return the defaults for an empty object', () => {
    expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should apply valid overrides section by section', () => {
    const config = mergeConfig({
      daemon: { flushIntervalSeconds: 5 },
      server: { port: 8080 },
      logging: { level: 'DEBUG' },
    });

    expect(config.daemon).toEqual({ flushIntervalSeconds: 5, staleMultiplier: 3 });
    expect(config.server).toEqual({ port: 8080, host: '127.0.0.1' });
    expect(config.logging.level).toBe('debug');
    expect(config.store).toEqual(DEFAULT_CONFIG.store);
  });

  it('should fall back to defaults for values of the wrong type', () => {
    const config = mergeConfig({
      store: { busyTimeoutMs: -1, busyRetries: 1.5 },
      daemon: { flushIntervalSeconds: '10', staleMultiplier: 0 },
      issues: 'long titles please',
      server: { host: '' },
      logging: { level: 'verbose' },
    });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should accept zero busy retries', () => {
    expect(mergeConfig({ store: { busyRetries: 0 } }).store.busyRetries).toBe(0);
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'waypost-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should use defaults when there is no config file', () => {
    expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
  });

  it('should read overrides from config.json', () => {
    writeFileSync(join(tempDir, 'config.json'), JSON.stringify({ issues: { titleMaxLength: 80 } }));
    expect(loadConfig(tempDir).issues.titleMaxLength).toBe(80);
  });

  it('should use defaults when config.json is not valid JSON', () => {
    writeFileSync(join(tempDir, 'config.json'), '{ not json');
    expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
  });

  it('should place workspace files inside the directory', () => {
    expect(getDbPath('/work/.waypost')).toBe(join('/work/.waypost', 'issues.db'));
    expect(getHeartbeatPath('/work/.waypost')).toBe(join('/work/.waypost', 'daemon.json'));
  });
});
