import { v4 as uuidv4 } from 'uuid';
import { Store } from '../core/store.js';
import { SessionManager } from '../core/session-manager.js';
import { AlreadyRunningError, NotRunningError } from '../core/errors.js';
import { loadConfig, getDbPath, getHeartbeatPath } from '../utils/config.js';
import { logger, setLogLevel } from '../utils/logger.js';
import { FileHeartbeatStore } from './heartbeat.js';
import { NodeProcessControl } from './spawner.js';
import { DaemonLoop } from './loop.js';
import { HEARTBEAT_VERSION } from './types.js';
import type {
  DaemonStatus,
  DaemonStartResult,
  DaemonStopResult,
  HeartbeatRecord,
  HeartbeatStore,
  ProcessControl,
  StopReason,
} from './types.js';

export { FileHeartbeatStore, MemoryHeartbeatStore, parseHeartbeat } from './heartbeat.js';
export { NodeProcessControl, isProcessRunning, killProcess } from './spawner.js';
export { DaemonLoop } from './loop.js';
export * from './types.js';

export interface DaemonCoordinatorOptions {
  heartbeat: HeartbeatStore;
  processes: ProcessControl;
  workspaceDir: string;
  flushIntervalMs: number;
  staleMultiplier: number;
  now?: () => number;
}

/**
 * Liveness protocol around the heartbeat artifact: decides whether a daemon
 * is running, starts one when none is, and stops the one recorded.
 */
export class DaemonCoordinator {
  private options: DaemonCoordinatorOptions;
  private now: () => number;

  constructor(options: DaemonCoordinatorOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  get staleAfterMs(): number {
    return this.options.flushIntervalMs * this.options.staleMultiplier;
  }

  status(): DaemonStatus {
    const staleAfterMs = this.staleAfterMs;
    const current = this.options.heartbeat.read();

    switch (current.kind) {
      case 'missing':
        return { state: 'stopped', staleAfterMs };
      case 'unreadable':
        return { state: 'stale', staleAfterMs, reason: current.reason };
      case 'ok': {
        const ageMs = Math.max(0, this.now() - Date.parse(current.record.heartbeatAt));
        return {
          state: ageMs <= staleAfterMs ? 'running' : 'stale',
          record: current.record,
          ageMs,
          staleAfterMs,
        };
      }
    }
  }

  /**
   * Spawn the background process. A fresh heartbeat means one is already
   * running; a stale or unreadable one is reclaimed first.
   */
  start(hostPid?: number): DaemonStartResult {
    const status = this.status();
    if (status.state === 'running') {
      throw new AlreadyRunningError(status.record?.pid ?? 0);
    }

    let reclaimed = false;
    if (status.state === 'stale') {
      logger.warn('Reclaiming stale daemon heartbeat', {
        pid: status.record?.pid,
        ageMs: status.ageMs,
        reason: status.reason,
      });
      this.options.heartbeat.remove();
      reclaimed = true;
    }

    const startedAt = new Date(this.now()).toISOString();
    const record: HeartbeatRecord = {
      version: HEARTBEAT_VERSION,
      pid: process.pid,
      token: uuidv4(),
      startedAt,
      heartbeatAt: startedAt,
      flushIntervalMs: this.options.flushIntervalMs,
      hostPid,
    };

    // Exclusive create: of two racing starts only one gets here
    if (!this.options.heartbeat.create(record)) {
      const winner = this.options.heartbeat.read();
      throw new AlreadyRunningError(winner.kind === 'ok' ? winner.record.pid : 0);
    }

    let pid: number;
    try {
      pid = this.options.processes.spawnDaemon({
        workspaceDir: this.options.workspaceDir,
        token: record.token,
        hostPid,
      });
    } catch (error) {
      this.options.heartbeat.remove();
      throw error;
    }

    this.options.heartbeat.write({ ...record, pid });
    logger.debug('Daemon spawned', { pid, token: record.token });
    return { pid, token: record.token, reclaimed };
  }

  stop(): DaemonStopResult {
    const status = this.status();
    if (status.state === 'stopped') {
      throw new NotRunningError();
    }

    const pid = status.record?.pid ?? 0;
    // Signal only a pid backed by a fresh heartbeat
    const signalled =
      status.state === 'running' &&
      pid > 0 &&
      this.options.processes.isRunning(pid) &&
      this.options.processes.terminate(pid);
    if (status.state !== 'running') {
      logger.warn('Clearing stale daemon heartbeat without signalling', { pid });
    }
    this.options.heartbeat.remove();
    return { pid, signalled };
  }
}

export function createCoordinator(workspaceDir: string, processes: ProcessControl = new NodeProcessControl()): DaemonCoordinator {
  const config = loadConfig(workspaceDir);
  return new DaemonCoordinator({
    heartbeat: new FileHeartbeatStore(getHeartbeatPath(workspaceDir)),
    processes,
    workspaceDir,
    flushIntervalMs: config.daemon.flushIntervalSeconds * 1000,
    staleMultiplier: config.daemon.staleMultiplier,
  });
}

export interface RunDaemonOptions {
  token: string;
  hostPid?: number;
}

/**
 * Body of `waypost daemon run`: tick until signalled, orphaned or replaced.
 */
export async function runDaemon(workspaceDir: string, options: RunDaemonOptions): Promise<StopReason> {
  const config = loadConfig(workspaceDir);
  setLogLevel(config.logging.level);

  const heartbeat = new FileHeartbeatStore(getHeartbeatPath(workspaceDir));
  const current = heartbeat.read();
  if (current.kind !== 'ok' || current.record.token !== options.token) {
    logger.warn('Heartbeat artifact does not carry this daemon token, exiting');
    return 'token-changed';
  }

  const store = new Store(getDbPath(workspaceDir), config.store);
  const sessions = new SessionManager(store);
  const loop = new DaemonLoop({
    heartbeat,
    processes: new NodeProcessControl(),
    flush: () => sessions.flush(),
    record: {
      ...current.record,
      pid: process.pid,
      hostPid: options.hostPid,
      flushIntervalMs: config.daemon.flushIntervalSeconds * 1000,
    },
  });

  const onSignal = (): void => loop.stop('signal');
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  try {
    loop.start();
    return await loop.done;
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
    store.close();
  }
}
