import { existsSync, readFileSync, writeFileSync, mkdirSync, renameSync, rmSync } from 'fs';
import { dirname } from 'path';
import { HEARTBEAT_VERSION } from './types.js';
import type { HeartbeatRecord, HeartbeatRead, HeartbeatStore } from './types.js';

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse heartbeat JSON. Missing optional fields get neutral defaults so an
 * artifact from a different build still yields pid and heartbeat time.
 */
export function parseHeartbeat(content: string): HeartbeatRead {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { kind: 'unreadable', reason: error instanceof Error ? error.message : 'invalid JSON' };
  }

  if (!isRecord(parsed)) {
    return { kind: 'unreadable', reason: 'not a JSON object' };
  }

  const { pid, heartbeatAt } = parsed;
  if (typeof pid !== 'number' || !Number.isInteger(pid) || pid <= 0) {
    return { kind: 'unreadable', reason: 'missing pid' };
  }
  if (typeof heartbeatAt !== 'string' || Number.isNaN(Date.parse(heartbeatAt))) {
    return { kind: 'unreadable', reason: 'missing heartbeatAt' };
  }

  return {
    kind: 'ok',
    record: {
      version: typeof parsed.version === 'number' ? parsed.version : HEARTBEAT_VERSION,
      pid,
      token: typeof parsed.token === 'string' ? parsed.token : '',
      startedAt: typeof parsed.startedAt === 'string' ? parsed.startedAt : heartbeatAt,
      heartbeatAt,
      flushIntervalMs: typeof parsed.flushIntervalMs === 'number' ? parsed.flushIntervalMs : 0,
      hostPid: typeof parsed.hostPid === 'number' ? parsed.hostPid : undefined,
    },
  };
}

/**
 * daemon.json on disk. Rewrites go through a temp file and rename so a
 * reader never sees a half-written record.
 */
export class FileHeartbeatStore implements HeartbeatStore {
  constructor(readonly path: string) {}

  read(): HeartbeatRead {
    let content: string;
    try {
      content = readFileSync(this.path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return { kind: 'missing' };
      }
      throw error;
    }
    return parseHeartbeat(content);
  }

  create(record: HeartbeatRecord): boolean {
    this.ensureDir();
    try {
      writeFileSync(this.path, JSON.stringify(record, null, 2), { flag: 'wx' });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  write(record: HeartbeatRecord): void {
    this.ensureDir();
    const tmp = `${this.path}.${process.pid}.tmp`;
    writeFileSync(tmp, JSON.stringify(record, null, 2));
    renameSync(tmp, this.path);
  }

  remove(): void {
    rmSync(this.path, { force: true });
  }

  private ensureDir(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

/**
 * In-process heartbeat store, for tests and embedding.
 */
export class MemoryHeartbeatStore implements HeartbeatStore {
  private content: string | undefined;

  read(): HeartbeatRead {
    return this.content === undefined ? { kind: 'missing' } : parseHeartbeat(this.content);
  }

  create(record: HeartbeatRecord): boolean {
    if (this.content !== undefined) return false;
    this.content = JSON.stringify(record);
    return true;
  }

  write(record: HeartbeatRecord): void {
    this.content = JSON.stringify(record);
  }

  remove(): void {
    this.content = undefined;
  }

  /** Replace the raw artifact, e.g. with damaged content. */
  setRaw(content: string | undefined): void {
    this.content = content;
  }
}
