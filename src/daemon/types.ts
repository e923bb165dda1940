export const HEARTBEAT_VERSION = 1;

/**
 * Contents of daemon.json. Only `pid` and `heartbeatAt` are required when
 * reading; unknown fields are ignored.
 */
export interface HeartbeatRecord {
  version: number;
  pid: number;
  token: string;
  startedAt: string;
  heartbeatAt: string;
  flushIntervalMs: number;
  hostPid?: number;
}

export type HeartbeatRead =
  | { kind: 'missing' }
  | { kind: 'unreadable'; reason: string }
  | { kind: 'ok'; record: HeartbeatRecord };

export type DaemonState = 'running' | 'stale' | 'stopped';

export interface DaemonStatus {
  state: DaemonState;
  record?: HeartbeatRecord;
  ageMs?: number;
  staleAfterMs: number;
  reason?: string;
}

export interface DaemonStartResult {
  pid: number;
  token: string;
  reclaimed: boolean;
}

export interface DaemonStopResult {
  pid: number;
  signalled: boolean;
}

export type StopReason = 'signal' | 'artifact-removed' | 'token-changed' | 'host-exited' | 'requested';

/**
 * Storage for the heartbeat artifact.
 */
export interface HeartbeatStore {
  read(): HeartbeatRead;
  /** Write only if no artifact exists; false when another writer got there first. */
  create(record: HeartbeatRecord): boolean;
  write(record: HeartbeatRecord): void;
  remove(): void;
}

/**
 * The process operations the coordinator needs.
 */
export interface ProcessControl {
  spawnDaemon(args: DaemonSpawnArgs): number;
  isRunning(pid: number): boolean;
  terminate(pid: number): boolean;
}

export interface DaemonSpawnArgs {
  workspaceDir: string;
  token: string;
  hostPid?: number;
}
