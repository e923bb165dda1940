import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseHeartbeat, FileHeartbeatStore } from './heartbeat.js';
import type { HeartbeatRecord } from './types.js';

const RECORD: HeartbeatRecord = {
  version: 1,
  pid: 1234,
  token: 'test-token',
  startedAt: '2024-05-01T09:00:00.000Z',
  heartbeatAt: '2024-05-01T09:00:30.000Z',
  flushIntervalMs: 30000,
  hostPid: 99,
};

describe('parseHeartbeat', () => {
  it('should read a complete record', () => {
    expect(parseHeartbeat(JSON.stringify(RECORD))).toEqual({ kind: 'ok', record: RECORD });
  });

  it('should fill defaults when only pid and heartbeatAt are present', () => {
    expect(parseHeartbeat('{"pid": 10, "heartbeatAt": "2024-05-01T09:00:00.000Z", "extra": true}')).toEqual({
      kind: 'ok',
      record: {
        version: 1,
        pid: 10,
        token: '',
        startedAt: '2024-05-01T09:00:00.000Z',
        heartbeatAt: '2024-05-01T09:00:00.000Z',
        flushIntervalMs: 0,
        hostPid: undefined,
      },
    });
  });

  it('should report damaged content as unreadable', () => {
    expect(parseHeartbeat('{').kind).toBe('unreadable');
    expect(parseHeartbeat('[1, 2]')).toEqual({ kind: 'unreadable', reason: 'not a JSON object' });
    expect(parseHeartbeat('{"heartbeatAt": "2024-05-01T09:00:00.000Z"}')).toEqual({
      kind: 'unreadable',
      reason: 'missing pid',
    });
    expect(parseHeartbeat('{"pid": 10, "heartbeatAt": "yesterday"}')).toEqual({
      kind: 'unreadable',
      reason: 'missing heartbeatAt',
    });
  });
});

describe('FileHeartbeatStore', () => {
  let tempDir: string;
  let store: FileHeartbeatStore;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'waypost-heartbeat-'));
    store = new FileHeartbeatStore(join(tempDir, 'nested', 'daemon.json'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report a missing file', () => {
    expect(store.read()).toEqual({ kind: 'missing' });
  });

  it('should create the artifact only once', () => {
    expect(store.create(RECORD)).toBe(true);
    expect(store.create({ ...RECORD, pid: 5678 })).toBe(false);

    expect(store.read()).toEqual({ kind: 'ok', record: RECORD });
  });

  it('should overwrite on write and leave no temp file behind', () => {
    store.create(RECORD);
    store.write({ ...RECORD, heartbeatAt: '2024-05-01T09:01:00.000Z' });

    const onDisk: unknown = JSON.parse(readFileSync(store.path, 'utf-8'));
    expect(onDisk).toMatchObject({ heartbeatAt: '2024-05-01T09:01:00.000Z' });
    expect(existsSync(`${store.path}.${process.pid}.tmp`)).toBe(false);
  });

  it('should remove the artifact, even twice', () => {
    store.create(RECORD);
    store.remove();
    store.remove();

    expect(store.read()).toEqual({ kind: 'missing' });
  });
});
