import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { logger, parseLevel, type LogLevel } from './logger.js';
import type { WaypostConfig } from '../types/index.js';

export const CONFIG_FILE = 'config.json';
export const DB_FILE = 'issues.db';
export const HEARTBEAT_FILE = 'daemon.json';
export const DAEMON_LOG_FILE = 'daemon.log';

export const DEFAULT_CONFIG: WaypostConfig = {
  store: {
    busyTimeoutMs: 5000,
    busyRetries: 3,
  },
  daemon: {
    flushIntervalSeconds: 30,
    staleMultiplier: 3,
  },
  issues: {
    titleMaxLength: 256,
  },
  server: {
    port: 4477,
    host: '127.0.0.1',
  },
  logging: {
    level: 'info',
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(record: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = record[key];
  return isPlainObject(value) ? value : {};
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeInteger(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback;
}

function text(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function logLevelOf(value: unknown): LogLevel {
  return (typeof value === 'string' ? parseLevel(value) : undefined) ?? DEFAULT_CONFIG.logging.level;
}

/**
 * Merge user overrides onto the defaults. Values of the wrong type fall back
 * to the default, so a partially valid file still yields a usable config.
 */
export function mergeConfig(overrides: Record<string, unknown>): WaypostConfig {
  const store = section(overrides, 'store');
  const daemon = section(overrides, 'daemon');
  const issues = section(overrides, 'issues');
  const server = section(overrides, 'server');
  const logging = section(overrides, 'logging');

  return {
    store: {
      busyTimeoutMs: nonNegativeInteger(store.busyTimeoutMs, DEFAULT_CONFIG.store.busyTimeoutMs),
      busyRetries: nonNegativeInteger(store.busyRetries, DEFAULT_CONFIG.store.busyRetries),
    },
    daemon: {
      flushIntervalSeconds: positiveNumber(daemon.flushIntervalSeconds, DEFAULT_CONFIG.daemon.flushIntervalSeconds),
      staleMultiplier: positiveNumber(daemon.staleMultiplier, DEFAULT_CONFIG.daemon.staleMultiplier),
    },
    issues: {
      titleMaxLength: positiveNumber(issues.titleMaxLength, DEFAULT_CONFIG.issues.titleMaxLength),
    },
    server: {
      port: nonNegativeInteger(server.port, DEFAULT_CONFIG.server.port),
      host: text(server.host, DEFAULT_CONFIG.server.host),
    },
    logging: {
      level: logLevelOf(logging.level),
    },
  };
}

export function loadConfig(workspaceDir: string): WaypostConfig {
  const configPath = join(workspaceDir, CONFIG_FILE);

  if (existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isPlainObject(parsed)) {
        return mergeConfig(parsed);
      }
      logger.warn(`Ignoring ${configPath}: expected a JSON object, using defaults`);
    } catch {
      logger.warn(`Could not parse ${configPath}, using defaults`);
    }
  }

  return mergeConfig({});
}

export function getDbPath(workspaceDir: string): string {
  return join(workspaceDir, DB_FILE);
}

export function getHeartbeatPath(workspaceDir: string): string {
  return join(workspaceDir, HEARTBEAT_FILE);
}

export function getDaemonLogPath(workspaceDir: string): string {
  return join(workspaceDir, DAEMON_LOG_FILE);
}
