import { describe, it, expect, beforeEach } from 'vitest';
import { DaemonCoordinator } from './index.js';
import { MemoryHeartbeatStore } from './heartbeat.js';
import { AlreadyRunningError, NotRunningError } from '../core/errors.js';
import type { DaemonSpawnArgs, HeartbeatRecord, ProcessControl } from './types.js';

class FakeProcesses implements ProcessControl {
  alive = new Set<number>();
  spawned: DaemonSpawnArgs[] = [];
  terminated: number[] = [];
  nextPid = 4000;
  failSpawn = false;

  spawnDaemon(args: DaemonSpawnArgs): number {
    if (this.failSpawn) {
      throw new Error('spawn failed');
    }
    this.spawned.push(args);
    const pid = this.nextPid++;
    this.alive.add(pid);
    return pid;
  }

  isRunning(pid: number): boolean {
    return this.alive.has(pid);
  }

  terminate(pid: number): boolean {
    this.terminated.push(pid);
    return this.alive.delete(pid);
  }
}

const START = Date.parse('2024-01-01T00:00:00.000Z');

describe('DaemonCoordinator', () => {
  let heartbeat: MemoryHeartbeatStore;
  let processes: FakeProcesses;
  let clock: number;

  const coordinator = (store: MemoryHeartbeatStore = heartbeat): DaemonCoordinator =>
    new DaemonCoordinator({
      heartbeat: store,
      processes,
      workspaceDir: '/work/.waypost',
      flushIntervalMs: 1000,
      staleMultiplier: 3,
      now: () => clock,
    });

  beforeEach(() => {
    heartbeat = new MemoryHeartbeatStore();
    processes = new FakeProcesses();
    clock = START;
  });

  it('should report stopped when there is no heartbeat', () => {
    expect(coordinator().status()).toEqual({ state: 'stopped', staleAfterMs: 3000 });
  });

  it('should spawn a daemon and record its pid and token', () => {
    const result = coordinator().start(77);

    expect(result.pid).toBe(4000);
    expect(result.reclaimed).toBe(false);
    expect(processes.spawned).toEqual([{ workspaceDir: '/work/.waypost', token: result.token, hostPid: 77 }]);

    const read = heartbeat.read();
    expect(read.kind).toBe('ok');
    if (read.kind === 'ok') {
      expect(read.record).toMatchObject({
        pid: 4000,
        token: result.token,
        hostPid: 77,
        flushIntervalMs: 1000,
        heartbeatAt: '2024-01-01T00:00:00.000Z',
      });
    }
  });

  it('should refuse to start while the heartbeat is fresh', () => {
    const daemon = coordinator();
    daemon.start();

    clock = START + 3000;
    expect(daemon.status().state).toBe('running');
    expect(() => daemon.start()).toThrow(AlreadyRunningError);
    expect(processes.spawned).toHaveLength(1);
  });

  it('should call a heartbeat older than the threshold stale and reclaim it', () => {
    const daemon = coordinator();
    const first = daemon.start();

    clock = START + 3001;
    const status = daemon.status();
    expect(status.state).toBe('stale');
    expect(status.ageMs).toBe(3001);

    const second = daemon.start();
    expect(second.reclaimed).toBe(true);
    expect(second.pid).toBe(4001);
    expect(second.token).not.toBe(first.token);
  });

  it('should treat an unreadable heartbeat as stale', () => {
    heartbeat.setRaw('{"pid": "nope"');
    const daemon = coordinator();

    expect(daemon.status().state).toBe('stale');
    expect(daemon.start().reclaimed).toBe(true);
  });

  it('should lose a start race to the writer that created the artifact first', () => {
    const winner: HeartbeatRecord = {
      version: 1,
      pid: 5150,
      token: 'winner-token',
      startedAt: '2024-01-01T00:00:00.000Z',
      heartbeatAt: '2024-01-01T00:00:00.000Z',
      flushIntervalMs: 1000,
    };
    class RacingHeartbeat extends MemoryHeartbeatStore {
      override create(): boolean {
        this.write(winner);
        return false;
      }
    }

    const daemon = coordinator(new RacingHeartbeat());
    let caught: unknown;
    try {
      daemon.start();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AlreadyRunningError);
    expect(caught).toMatchObject({ pid: 5150 });
    expect(processes.spawned).toEqual([]);
  });

  it('should remove the artifact when spawning fails', () => {
    processes.failSpawn = true;

    expect(() => coordinator().start()).toThrow('spawn failed');
    expect(heartbeat.read()).toEqual({ kind: 'missing' });
  });

  it('should stop a running daemon and remove its heartbeat', () => {
    const daemon = coordinator();
    daemon.start();

    expect(daemon.stop()).toEqual({ pid: 4000, signalled: true });
    expect(processes.terminated).toEqual([4000]);
    expect(daemon.status().state).toBe('stopped');
    expect(() => daemon.stop()).toThrow(NotRunningError);
  });

  it('should clear the heartbeat of a daemon that already exited', () => {
    heartbeat.setRaw(JSON.stringify({ pid: 999, heartbeatAt: '2023-12-31T00:00:00.000Z' }));

    expect(coordinator().stop()).toEqual({ pid: 999, signalled: false });
    expect(processes.terminated).toEqual([]);
    expect(heartbeat.read()).toEqual({ kind: 'missing' });
  });

  it('should not signal a live pid behind a stale heartbeat', () => {
    processes.alive.add(4242);
    heartbeat.setRaw(JSON.stringify({ pid: 4242, heartbeatAt: '2020-01-01T00:00:00.000Z' }));

    expect(coordinator().stop()).toEqual({ pid: 4242, signalled: false });
    expect(processes.terminated).toEqual([]);
    expect(processes.alive.has(4242)).toBe(true);
    expect(heartbeat.read()).toEqual({ kind: 'missing' });
  });
});
