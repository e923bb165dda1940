import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Store } from './store.js';
import { IssueGraph } from './issue-graph.js';
import { Milestones } from './milestones.js';
import { NotFoundError, ValidationError } from './errors.js';

describe('Milestones', () => {
  let store: Store;
  let graph: IssueGraph;
  let milestones: Milestones;
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'waypost-milestone-'));
    store = new Store(join(tempDir, 'issues.db'));
    graph = new IssueGraph(store);
    milestones = new Milestones(store);
  });

  afterEach(() => {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create milestones with a trimmed name', () => {
    const milestone = milestones.create('  v1.0 ', 'First release');

    expect(milestone).toMatchObject({ id: 1, name: 'v1.0', description: 'First release', status: 'open' });
    expect(() => milestones.create(' ')).toThrow(ValidationError);
  });

  it('should track progress of attached issues', () => {
    const milestone = milestones.create('v1.0');
    const a = graph.create({ title: 'A' });
    const b = graph.create({ title: 'B' });
    graph.close(a.id);

    expect(milestones.add(milestone.id, [a.id, b.id])).toEqual([a.id, b.id]);
    expect(milestones.add(milestone.id, [a.id])).toEqual([]);

    const detail = milestones.get(milestone.id);
    expect(detail.issues.map((i) => i.id)).toEqual([a.id, b.id]);
    expect(detail.progress).toEqual({ closed: 1, total: 2 });
    expect(graph.show(b.id).milestoneIds).toEqual([milestone.id]);
  });

  it('should attach nothing when one issue is missing', () => {
    const milestone = milestones.create('v1.0');
    const a = graph.create({ title: 'A' });

    expect(() => milestones.add(milestone.id, [a.id, 42])).toThrow(NotFoundError);
    expect(milestones.get(milestone.id).issues).toEqual([]);
  });

  it('should remove issues, close and delete', () => {
    const milestone = milestones.create('v1.0');
    const a = graph.create({ title: 'A' });
    milestones.add(milestone.id, [a.id]);

    expect(milestones.remove(milestone.id, a.id)).toBe(true);
    expect(milestones.remove(milestone.id, a.id)).toBe(false);

    const closed = milestones.close(milestone.id);
    expect(closed.status).toBe('closed');
    expect(closed.closedAt).toBeInstanceOf(Date);
    expect(milestones.list('open')).toEqual([]);
    expect(milestones.list('closed').map((m) => m.id)).toEqual([milestone.id]);

    milestones.delete(milestone.id);
    expect(() => milestones.get(milestone.id)).toThrow(NotFoundError);
    expect(graph.get(a.id).title).toBe('A');
  });

  it('should drop memberships when an issue is deleted', () => {
    const milestone = milestones.create('v1.0');
    const a = graph.create({ title: 'A' });
    milestones.add(milestone.id, [a.id]);

    graph.delete(a.id);

    expect(milestones.get(milestone.id).progress).toEqual({ closed: 0, total: 0 });
  });
});
