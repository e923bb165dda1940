import { Store, sqliteCode } from './store.js';
import { AlreadyActiveError, NoActiveSessionError, NotFoundError } from './errors.js';
import { logger } from '../utils/logger.js';
import type {
  Session,
  Handoff,
  SessionStartResult,
  TimeEntry,
  RunningTimer,
  TimerStartResult,
  SessionStatusReport,
  FlushResult,
} from '../types/index.js';

export const DEFAULT_HISTORY_LIMIT = 10;

function elapsedSeconds(from: Date, to: Date): number {
  return Math.max(0, Math.floor((to.getTime() - from.getTime()) / 1000));
}

export function runningTimer(session: Session, now: Date = new Date()): RunningTimer | undefined {
  if (session.timerIssueId === undefined || session.timerStartedAt === undefined) {
    return undefined;
  }
  return {
    issueId: session.timerIssueId,
    startedAt: session.timerStartedAt,
    elapsedSeconds: elapsedSeconds(session.timerStartedAt, now),
  };
}

function toHandoff(session: Session | undefined): Handoff | undefined {
  if (!session?.endedAt) return undefined;
  return {
    sessionId: session.id,
    endedAt: session.endedAt,
    notes: session.handoffNotes ?? '',
    workingOnId: session.workingOnId,
  };
}

/**
 * The single "current session" record. Each transition reads and writes
 * inside one immediate transaction, so concurrent invocations serialize on
 * the store's write lock and see each other's committed state.
 */
export class SessionManager {
  constructor(private store: Store) {}

  private requireActive(): Session {
    const session = this.store.getActiveSession();
    if (!session) {
      throw new NoActiveSessionError();
    }
    return session;
  }

  private requireSession(id: number): Session {
    const session = this.store.getSession(id);
    if (!session) {
      throw new NotFoundError('session', id);
    }
    return session;
  }

  start(): SessionStartResult {
    const result = this.store.transaction(() => {
      const active = this.store.getActiveSession();
      if (active) {
        throw new AlreadyActiveError(active.id);
      }

      const handoff = toHandoff(this.store.getLastEndedSession());
      try {
        const session = this.store.insertSession(new Date());
        return { session, handoff };
      } catch (error) {
        // The single-active index fired: another writer got there first
        if (sqliteCode(error) === 'SQLITE_CONSTRAINT_UNIQUE') {
          const winner = this.store.getActiveSession();
          throw new AlreadyActiveError(winner?.id ?? 0);
        }
        throw error;
      }
    }, 'session start');

    logger.debug('Session started', { sessionId: result.session.id });
    return result;
  }

  work(issueId: number): Session {
    return this.store.transaction(() => {
      const session = this.requireActive();
      if (!this.store.issueExists(issueId)) {
        throw new NotFoundError('issue', issueId);
      }
      if (session.workingOnId !== issueId) {
        this.store.updateSession(session.id, { workingOnId: issueId });
      }
      return this.requireSession(session.id);
    }, 'session work');
  }

  startTimer(issueId: number): TimerStartResult {
    return this.store.transaction(() => {
      const session = this.requireActive();
      if (!this.store.issueExists(issueId)) {
        throw new NotFoundError('issue', issueId);
      }

      const now = new Date();
      const current = runningTimer(session, now);
      if (current && current.issueId === issueId) {
        return { session, timer: current };
      }

      const stopped = current ? this.recordEntry(session, current, now) : undefined;
      this.store.updateSession(session.id, {
        timerIssueId: issueId,
        timerStartedAt: now,
        timerCheckpointSeconds: null,
      });

      const updated = this.requireSession(session.id);
      return {
        session: updated,
        timer: { issueId, startedAt: now, elapsedSeconds: 0 },
        stopped,
      };
    }, 'timer start');
  }

  /**
   * Stop the running timer and record its duration. Returns null when no
   * timer was running.
   */
  stopTimer(): TimeEntry | null {
    return this.store.transaction(() => {
      const session = this.requireActive();
      const now = new Date();
      const current = runningTimer(session, now);
      const entry = current ? this.recordEntry(session, current, now) : null;
      if (session.timerIssueId !== undefined || session.timerStartedAt !== undefined) {
        this.clearTimer(session.id);
      }
      return entry;
    }, 'timer stop');
  }

  end(notes?: string): Session {
    const ended = this.store.transaction(() => {
      const session = this.requireActive();
      const now = new Date();
      const current = runningTimer(session, now);
      if (current) {
        this.recordEntry(session, current, now);
      }

      this.store.updateSession(session.id, {
        endedAt: now,
        handoffNotes: notes ?? '',
        timerIssueId: null,
        timerStartedAt: null,
        timerCheckpointSeconds: null,
      });
      return this.requireSession(session.id);
    }, 'session end');

    logger.debug('Session ended', { sessionId: ended.id });
    return ended;
  }

  status(): SessionStatusReport {
    const session = this.store.getActiveSession();
    if (!session) {
      return { active: false, handoff: toHandoff(this.store.getLastEndedSession()) };
    }

    return {
      active: true,
      session,
      workingOn: session.workingOnId !== undefined ? this.store.getIssue(session.workingOnId) : undefined,
      timer: runningTimer(session),
    };
  }

  /**
   * Persist the active session's liveness: last flush time and the running
   * timer's elapsed seconds. Does nothing without an active session.
   */
  flush(): FlushResult {
    return this.store.transaction(() => {
      const flushedAt = new Date();
      const session = this.store.getActiveSession();
      if (!session) {
        return { flushed: false, flushedAt };
      }

      const timer = runningTimer(session, flushedAt);
      this.store.updateSession(session.id, {
        lastFlushedAt: flushedAt,
        timerCheckpointSeconds: timer ? timer.elapsedSeconds : null,
      });
      return {
        flushed: true,
        sessionId: session.id,
        flushedAt,
        timerCheckpointSeconds: timer?.elapsedSeconds,
      };
    }, 'flush');
  }

  totalTime(issueId: number): number {
    if (!this.store.issueExists(issueId)) {
      throw new NotFoundError('issue', issueId);
    }
    return this.store.getTotalSeconds(issueId);
  }

  history(limit: number = DEFAULT_HISTORY_LIMIT): Session[] {
    return this.store.listSessions(Math.max(1, Math.floor(limit)));
  }

  private recordEntry(session: Session, timer: RunningTimer, now: Date): TimeEntry {
    return this.store.insertTimeEntry({
      issueId: timer.issueId,
      sessionId: session.id,
      startedAt: timer.startedAt,
      endedAt: now,
    });
  }

  private clearTimer(sessionId: number): void {
    this.store.updateSession(sessionId, {
      timerIssueId: null,
      timerStartedAt: null,
      timerCheckpointSeconds: null,
    });
  }
}
