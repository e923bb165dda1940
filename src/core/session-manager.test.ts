import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Store } from './store.js';
import { IssueGraph } from './issue-graph.js';
import { SessionManager } from './session-manager.js';
import { AlreadyActiveError, NoActiveSessionError, NotFoundError } from './errors.js';

describe('SessionManager', () => {
  let store: Store;
  let graph: IssueGraph;
  let sessions: SessionManager;
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-03-01T10:00:00.000Z'));

    tempDir = mkdtempSync(join(tmpdir(), 'waypost-session-'));
    dbPath = join(tempDir, 'issues.db');
    store = new Store(dbPath);
    graph = new IssueGraph(store);
    sessions = new SessionManager(store);
  });

  afterEach(() => {
    vi.useRealTimers();
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('start and end', () => {
    it('should start a session without a handoff the first time', () => {
      const { session, handoff } = sessions.start();

      expect(session.id).toBe(1);
      expect(session.startedAt.toISOString()).toBe('2024-03-01T10:00:00.000Z');
      expect(session.endedAt).toBeUndefined();
      expect(handoff).toBeUndefined();
    });

    it('should refuse a second active session, also from another connection', () => {
      sessions.start();
      const other = new Store(dbPath);
      try {
        expect(() => sessions.start()).toThrow(AlreadyActiveError);
        expect(() => new SessionManager(other).start()).toThrow(AlreadyActiveError);

        expect(other.getActiveSession()?.id).toBe(1);
        expect(sessions.history()).toHaveLength(1);
      } finally {
        other.close();
      }
    });

    it('should hand the notes of the last session to the next one', () => {
      const issue = graph.create({ title: 'Refactor parser' });
      sessions.start();
      sessions.work(issue.id);

      vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'));
      const ended = sessions.end('Parser half done');

      expect(ended.endedAt?.toISOString()).toBe('2024-03-01T12:00:00.000Z');
      expect(ended.handoffNotes).toBe('Parser half done');

      expect(sessions.status()).toEqual({
        active: false,
        handoff: {
          sessionId: 1,
          endedAt: new Date('2024-03-01T12:00:00.000Z'),
          notes: 'Parser half done',
          workingOnId: issue.id,
        },
      });

      const next = sessions.start();
      expect(next.session.id).toBe(2);
      expect(next.handoff?.notes).toBe('Parser half done');
      expect(next.handoff?.workingOnId).toBe(issue.id);
    });

    it('should store empty notes when none are given', () => {
      sessions.start();
      expect(sessions.end().handoffNotes).toBe('');
    });

    it('should fail to end without an active session', () => {
      expect(() => sessions.end('notes')).toThrow(NoActiveSessionError);
    });
  });

  describe('work', () => {
    it('should require an active session and an existing issue', () => {
      const issue = graph.create({ title: 'Task' });
      expect(() => sessions.work(issue.id)).toThrow(NoActiveSessionError);

      sessions.start();
      expect(() => sessions.work(99)).toThrow(NotFoundError);
      expect(sessions.work(issue.id).workingOnId).toBe(issue.id);

      const status = sessions.status();
      expect(status.active).toBe(true);
      expect(status.workingOn?.title).toBe('Task');
    });
  });

  describe('timer', () => {
    it('should record time when switching and stopping timers', () => {
      const first = graph.create({ title: 'First' });
      const second = graph.create({ title: 'Second' });
      sessions.start();

      sessions.startTimer(first.id);
      vi.setSystemTime(new Date('2024-03-01T10:05:00.000Z'));
      expect(sessions.status().timer).toEqual({
        issueId: first.id,
        startedAt: new Date('2024-03-01T10:00:00.000Z'),
        elapsedSeconds: 300,
      });

      const switched = sessions.startTimer(second.id);
      expect(switched.stopped?.issueId).toBe(first.id);
      expect(switched.stopped?.durationSeconds).toBe(300);
      expect(switched.timer.elapsedSeconds).toBe(0);

      // Restarting the running timer keeps it going
      vi.setSystemTime(new Date('2024-03-01T10:06:00.000Z'));
      const same = sessions.startTimer(second.id);
      expect(same.stopped).toBeUndefined();
      expect(same.timer.elapsedSeconds).toBe(60);

      vi.setSystemTime(new Date('2024-03-01T10:10:00.000Z'));
      expect(sessions.stopTimer()?.durationSeconds).toBe(300);
      expect(sessions.stopTimer()).toBeNull();

      expect(sessions.totalTime(first.id)).toBe(300);
      expect(sessions.totalTime(second.id)).toBe(300);
    });

    it('should close the running timer when the session ends', () => {
      const issue = graph.create({ title: 'Task' });
      sessions.start();
      sessions.startTimer(issue.id);

      vi.setSystemTime(new Date('2024-03-01T10:02:00.000Z'));
      sessions.end();

      expect(sessions.totalTime(issue.id)).toBe(120);
      expect(store.getSession(1)?.timerIssueId).toBeUndefined();
    });

    it('should require an active session', () => {
      const issue = graph.create({ title: 'Task' });
      expect(() => sessions.startTimer(issue.id)).toThrow(NoActiveSessionError);
      expect(() => sessions.stopTimer()).toThrow(NoActiveSessionError);
    });

    it('should report a missing issue for total time', () => {
      expect(() => sessions.totalTime(5)).toThrow(NotFoundError);
    });
  });

  describe('flush', () => {
    it('should do nothing without an active session', () => {
      const result = sessions.flush();
      expect(result.flushed).toBe(false);
      expect(result.sessionId).toBeUndefined();
    });

    it('should checkpoint the running timer', () => {
      const issue = graph.create({ title: 'Task' });
      sessions.start();
      sessions.startTimer(issue.id);

      vi.setSystemTime(new Date('2024-03-01T10:01:30.000Z'));
      const result = sessions.flush();

      expect(result).toEqual({
        flushed: true,
        sessionId: 1,
        flushedAt: new Date('2024-03-01T10:01:30.000Z'),
        timerCheckpointSeconds: 90,
      });

      const session = store.getSession(1);
      expect(session?.lastFlushedAt?.toISOString()).toBe('2024-03-01T10:01:30.000Z');
      expect(session?.timerCheckpointSeconds).toBe(90);
    });
  });

  describe('history', () => {
    it('should list the newest sessions first', () => {
      sessions.start();
      sessions.end('one');
      sessions.start();
      sessions.end('two');
      sessions.start();

      expect(sessions.history().map((s) => s.id)).toEqual([3, 2, 1]);
      expect(sessions.history(2).map((s) => s.id)).toEqual([3, 2]);
    });
  });
});
