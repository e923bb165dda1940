import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Store } from './store.js';
import { IssueGraph } from './issue-graph.js';
import { SessionManager } from './session-manager.js';
import { buildContextSummary } from './summary.js';

describe('buildContextSummary', () => {
  let store: Store;
  let graph: IssueGraph;
  let sessions: SessionManager;
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'waypost-summary-'));
    store = new Store(join(tempDir, 'issues.db'));
    graph = new IssueGraph(store);
    sessions = new SessionManager(store);
  });

  afterEach(() => {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should summarize an empty workspace', () => {
    const summary = buildContextSummary({ graph, sessions });

    expect(summary).toMatchObject({
      session: { active: false },
      next: null,
      ready: [],
      readyTotal: 0,
      blocked: [],
      blockedTotal: 0,
      openTotal: 0,
    });
    expect(summary.daemon).toBeUndefined();
  });

  it('should cap the lists but report the totals', () => {
    const blocker = graph.create({ title: 'Blocker', priority: 'critical' });
    for (let n = 1; n <= 3; n++) {
      const issue = graph.create({ title: `Waiting ${n}` });
      graph.block(issue.id, blocker.id);
    }
    graph.create({ title: 'Free' });
    sessions.start();

    const summary = buildContextSummary({ graph, sessions }, 1);

    expect(summary.session.active).toBe(true);
    expect(summary.next?.issue.id).toBe(blocker.id);
    expect(summary.ready.map((i) => i.id)).toEqual([blocker.id]);
    expect(summary.readyTotal).toBe(2);
    expect(summary.blocked.map((b) => b.issue.id)).toEqual([2]);
    expect(summary.blockedTotal).toBe(3);
    expect(summary.openTotal).toBe(5);
  });
});
