import { spawn } from 'child_process';
import { openSync, closeSync } from 'fs';
import { dirname } from 'path';
import { getDaemonLogPath } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import type { DaemonSpawnArgs, ProcessControl } from './types.js';

/**
 * Check if a process is still running
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // Sending signal 0 checks if process exists without killing it
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: it exists but belongs to someone else
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

/**
 * Send SIGTERM to a process. False if it was already gone.
 */
export function killProcess(pid: number): boolean {
  try {
    process.kill(pid, 'SIGTERM');
    return true;
  } catch {
    return false;
  }
}

export interface NodeProcessControlOptions {
  /** CLI entry script; defaults to the script of the running process. */
  entry?: string;
  execPath?: string;
}

/**
 * Runs `waypost daemon run` as a detached child with its output appended to
 * daemon.log.
 */
export class NodeProcessControl implements ProcessControl {
  private entry: string;
  private execPath: string;

  constructor(options: NodeProcessControlOptions = {}) {
    this.entry = options.entry ?? process.argv[1];
    this.execPath = options.execPath ?? process.execPath;
  }

  spawnDaemon({ workspaceDir, token, hostPid }: DaemonSpawnArgs): number {
    const args = [this.entry, 'daemon', 'run', '--token', token];
    if (hostPid !== undefined) {
      args.push('--host-pid', String(hostPid));
    }

    const logFd = openSync(getDaemonLogPath(workspaceDir), 'a');
    try {
      const child = spawn(this.execPath, args, {
        cwd: dirname(workspaceDir),
        env: { ...process.env, WAYPOST_DIR: workspaceDir },
        detached: true,
        stdio: ['ignore', logFd, logFd],
      });

      // A failed spawn still emits 'error' on the next tick
      child.once('error', (error) => {
        logger.error('Daemon process failed to start', { error: error.message });
      });

      // Unref so the CLI can exit independently
      child.unref();

      if (child.pid === undefined) {
        throw new Error('Failed to spawn daemon process');
      }
      return child.pid;
    } finally {
      closeSync(logFd);
    }
  }

  isRunning(pid: number): boolean {
    return isProcessRunning(pid);
  }

  terminate(pid: number): boolean {
    return killProcess(pid);
  }
}
