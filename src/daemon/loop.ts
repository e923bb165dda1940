import { withRetry, DEFAULT_RETRY_OPTIONS, type RetryOptions } from '../utils/retry.js';
import { logger } from '../utils/logger.js';
import type { FlushResult } from '../types/index.js';
import type { HeartbeatRecord, HeartbeatStore, ProcessControl, StopReason } from './types.js';

export interface DaemonLoopOptions {
  heartbeat: HeartbeatStore;
  processes: Pick<ProcessControl, 'isRunning'>;
  flush: () => FlushResult | Promise<FlushResult>;
  record: HeartbeatRecord;
  retry?: RetryOptions;
}

/**
 * Background flush loop. Each tick checks the control channel, flushes
 * session state and refreshes the heartbeat.
 */
export class DaemonLoop {
  private options: DaemonLoopOptions;
  private record: HeartbeatRecord;
  private running: boolean = false;
  private timeout: NodeJS.Timeout | null = null;
  private resolveDone: (reason: StopReason) => void = () => {};
  private stopReason: StopReason | undefined;

  readonly done: Promise<StopReason>;

  constructor(options: DaemonLoopOptions) {
    this.options = options;
    this.record = { ...options.record };
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Start ticking: once now, then every flush interval.
   */
  start(): void {
    if (this.running || this.stopReason) {
      return;
    }

    this.running = true;
    logger.info('Daemon loop started', {
      pid: this.record.pid,
      flushIntervalMs: this.record.flushIntervalMs,
      hostPid: this.record.hostPid,
    });
    this.schedule(0);
  }

  stop(reason: StopReason = 'requested'): void {
    if (this.stopReason) {
      return;
    }

    this.stopReason = reason;
    this.running = false;
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }

    this.releaseArtifact();
    logger.info('Daemon loop stopped', { reason });
    this.resolveDone(reason);
  }

  /**
   * One cycle. Returns false when the loop stopped during it.
   */
  async tick(): Promise<boolean> {
    const verdict = this.checkControl();
    if (verdict) {
      this.stop(verdict);
      return false;
    }

    try {
      const result = await withRetry(
        () => this.options.flush(),
        this.options.retry ?? DEFAULT_RETRY_OPTIONS,
        (_error, attempt, delay) => logger.warn('Flush hit a busy store, retrying', { attempt, delay })
      );
      if (result.flushed) {
        logger.debug('Flushed session', { sessionId: result.sessionId, timerSeconds: result.timerCheckpointSeconds });
      }
    } catch (error) {
      logger.error('Flush failed', { error: error instanceof Error ? error.message : String(error) });
    }

    if (this.stopReason) {
      return false;
    }

    // A stop may have removed the artifact while the flush ran
    const after = this.checkControl();
    if (after) {
      this.stop(after);
      return false;
    }

    this.record = { ...this.record, heartbeatAt: new Date().toISOString() };
    this.options.heartbeat.write(this.record);
    return true;
  }

  /**
   * Reasons to stop: the artifact is gone or no longer ours, or the host died.
   */
  private checkControl(): StopReason | undefined {
    const current = this.options.heartbeat.read();
    if (current.kind === 'missing') {
      return 'artifact-removed';
    }
    if (current.kind === 'unreadable' || current.record.token !== this.record.token) {
      return 'token-changed';
    }
    if (this.record.hostPid !== undefined && !this.options.processes.isRunning(this.record.hostPid)) {
      return 'host-exited';
    }
    return undefined;
  }

  private schedule(delayMs: number): void {
    this.timeout = setTimeout(() => {
      void this.run();
    }, delayMs);
  }

  private async run(): Promise<void> {
    if (!this.running) return;

    let keepGoing = false;
    try {
      keepGoing = await this.tick();
    } catch (error) {
      logger.error('Daemon tick failed', { error: error instanceof Error ? error.message : String(error) });
      keepGoing = this.running;
    }

    if (keepGoing && this.running) {
      this.schedule(this.record.flushIntervalMs);
    }
  }

  private releaseArtifact(): void {
    try {
      const current = this.options.heartbeat.read();
      if (current.kind === 'ok' && current.record.token === this.record.token) {
        this.options.heartbeat.remove();
      }
    } catch (error) {
      logger.warn('Could not remove heartbeat artifact', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
