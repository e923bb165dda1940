import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { DaemonLoop } from './loop.js';
import { MemoryHeartbeatStore } from './heartbeat.js';
import { BusyError } from '../core/errors.js';
import type { FlushResult } from '../types/index.js';
import type { HeartbeatRecord } from './types.js';

const RECORD: HeartbeatRecord = {
  version: 1,
  pid: 4242,
  token: 'test-token',
  startedAt: '2024-05-01T09:00:00.000Z',
  heartbeatAt: '2024-05-01T09:00:00.000Z',
  flushIntervalMs: 1000,
};

function flushed(): FlushResult {
  return { flushed: true, sessionId: 1, flushedAt: new Date() };
}

describe('DaemonLoop', () => {
  let heartbeat: MemoryHeartbeatStore;
  let alive: Set<number>;
  let flush: Mock<() => FlushResult>;

  const createLoop = (record: HeartbeatRecord = RECORD): DaemonLoop =>
    new DaemonLoop({
      heartbeat,
      processes: { isRunning: (pid) => alive.has(pid) },
      flush,
      record,
      retry: { maxRetries: 2, baseDelay: 0, maxDelay: 0 },
    });

  beforeEach(() => {
    heartbeat = new MemoryHeartbeatStore();
    heartbeat.write(RECORD);
    alive = new Set([77]);
    flush = vi.fn<() => FlushResult>(flushed);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should flush and refresh the heartbeat on each tick', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-05-01T09:00:05.000Z'));
    const loop = createLoop();

    expect(await loop.tick()).toBe(true);

    expect(flush).toHaveBeenCalledTimes(1);
    expect(heartbeat.read()).toEqual({
      kind: 'ok',
      record: { ...RECORD, heartbeatAt: '2024-05-01T09:00:05.000Z' },
    });
  });

  it('should stop when the artifact is removed', async () => {
    const loop = createLoop();
    heartbeat.remove();

    expect(await loop.tick()).toBe(false);
    expect(flush).not.toHaveBeenCalled();
    await expect(loop.done).resolves.toBe('artifact-removed');
  });

  it('should stop without touching an artifact that carries another token', async () => {
    const loop = createLoop();
    heartbeat.write({ ...RECORD, pid: 5000, token: 'other-token' });

    expect(await loop.tick()).toBe(false);
    await expect(loop.done).resolves.toBe('token-changed');

    const read = heartbeat.read();
    expect(read.kind === 'ok' && read.record.token).toBe('other-token');
  });

  it('should stop and clean up when the host process exits', async () => {
    const loop = createLoop({ ...RECORD, hostPid: 77 });

    expect(await loop.tick()).toBe(true);
    alive.delete(77);
    expect(await loop.tick()).toBe(false);

    await expect(loop.done).resolves.toBe('host-exited');
    expect(heartbeat.read()).toEqual({ kind: 'missing' });
  });

  it('should retry a flush that hits a busy store', async () => {
    flush.mockImplementationOnce(() => {
      throw new BusyError('flush', 4);
    });
    const loop = createLoop();

    expect(await loop.tick()).toBe(true);
    expect(flush).toHaveBeenCalledTimes(2);
  });

  it('should keep beating when a flush fails outright', async () => {
    flush.mockImplementation(() => {
      throw new Error('disk full');
    });
    const loop = createLoop();

    expect(await loop.tick()).toBe(true);
    expect(flush).toHaveBeenCalledTimes(1);
    expect(heartbeat.read().kind).toBe('ok');
  });

  it('should release its own artifact on stop', async () => {
    const loop = createLoop();
    loop.stop();

    await expect(loop.done).resolves.toBe('requested');
    expect(heartbeat.read()).toEqual({ kind: 'missing' });
    expect(await loop.tick()).toBe(false);
  });

  it('should tick on a timer until the artifact goes away', async () => {
    const loop = createLoop({ ...RECORD, flushIntervalMs: 5 });
    heartbeat.write({ ...RECORD, flushIntervalMs: 5 });

    loop.start();
    expect(loop.isRunning).toBe(true);

    await vi.waitFor(() => expect(flush.mock.calls.length).toBeGreaterThanOrEqual(2));

    heartbeat.remove();
    await expect(loop.done).resolves.toBe('artifact-removed');
    expect(loop.isRunning).toBe(false);

    const calls = flush.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(flush.mock.calls.length).toBe(calls);
  });
});
