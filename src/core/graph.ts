import { PRIORITY_WEIGHT } from '../types/index.js';
import type {
  Issue,
  DependencyEdge,
  BlockedIssue,
  TreeNode,
  SubissueProgress,
  Recommendation,
} from '../types/index.js';

/**
 * Pure graph views over a snapshot of issues and dependency edges.
 * Nothing here touches the store, so the same snapshot always yields the same answer.
 */

export const MAX_ALTERNATIVES = 3;

export type NeighbourLookup = (id: number) => readonly number[];

/**
 * True if adding "issueId is blocked by blockerId" would close a cycle:
 * a breadth-first walk from the blocker along existing "is blocked by"
 * edges reaches issueId.
 */
export function wouldCreateCycle(blockersOf: NeighbourLookup, issueId: number, blockerId: number): boolean {
  if (issueId === blockerId) return true;

  const queue: number[] = [blockerId];
  const visited = new Set<number>([blockerId]);

  for (let head = 0; head < queue.length; head++) {
    for (const next of blockersOf(queue[head])) {
      if (next === issueId) return true;
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }

  return false;
}

/**
 * True if making `parentId` the parent of `issueId` would put the issue
 * under itself: the walk up from the new parent reaches the issue.
 */
export function wouldCreateHierarchyCycle(
  parentOf: (id: number) => number | undefined,
  issueId: number,
  parentId: number
): boolean {
  const seen = new Set<number>();
  let current: number | undefined = parentId;

  while (current !== undefined && !seen.has(current)) {
    if (current === issueId) return true;
    seen.add(current);
    current = parentOf(current);
  }

  return false;
}

export function compareByPriorityThenId(a: Pick<Issue, 'id' | 'priority'>, b: Pick<Issue, 'id' | 'priority'>): number {
  const diff = PRIORITY_WEIGHT[b.priority] - PRIORITY_WEIGHT[a.priority];
  if (diff !== 0) return diff;
  return a.id - b.id;
}

function compareForNext(a: Issue, b: Issue): number {
  const diff = PRIORITY_WEIGHT[b.priority] - PRIORITY_WEIGHT[a.priority];
  if (diff !== 0) return diff;
  const age = a.createdAt.getTime() - b.createdAt.getTime();
  if (age !== 0) return age;
  return a.id - b.id;
}

function blockersByIssue(edges: readonly DependencyEdge[]): Map<number, number[]> {
  const byIssue = new Map<number, number[]>();
  for (const edge of edges) {
    const list = byIssue.get(edge.issueId) ?? [];
    list.push(edge.blockerId);
    byIssue.set(edge.issueId, list);
  }
  return byIssue;
}

function openBlockersOf(issue: Issue, byId: Map<number, Issue>, blockers: Map<number, number[]>): Issue[] {
  const result: Issue[] = [];
  for (const blockerId of blockers.get(issue.id) ?? []) {
    const blocker = byId.get(blockerId);
    if (blocker && blocker.status === 'open') {
      result.push(blocker);
    }
  }
  return result.sort((a, b) => a.id - b.id);
}

/**
 * Open issues with no open blocker, highest priority first, then by id.
 */
export function readyIssues(issues: readonly Issue[], edges: readonly DependencyEdge[]): Issue[] {
  const byId = new Map(issues.map((i) => [i.id, i]));
  const blockers = blockersByIssue(edges);

  return issues
    .filter((issue) => issue.status === 'open' && !issue.archived)
    .filter((issue) => openBlockersOf(issue, byId, blockers).length === 0)
    .sort(compareByPriorityThenId);
}

/**
 * Open issues with at least one open blocker, each with those blockers, by id.
 */
export function blockedIssues(issues: readonly Issue[], edges: readonly DependencyEdge[]): BlockedIssue[] {
  const byId = new Map(issues.map((i) => [i.id, i]));
  const blockers = blockersByIssue(edges);

  const result: BlockedIssue[] = [];
  for (const issue of [...issues].sort((a, b) => a.id - b.id)) {
    if (issue.status !== 'open' || issue.archived) continue;
    const open = openBlockersOf(issue, byId, blockers);
    if (open.length > 0) {
      result.push({ issue, blockers: open });
    }
  }
  return result;
}

/**
 * Forest of the given issues. An issue whose parent is not in the input
 * becomes a root, so filtering by status never drops a subtree's survivors.
 */
export function buildTree(issues: readonly Issue[]): TreeNode[] {
  const present = new Set(issues.map((i) => i.id));
  const childrenOf = new Map<number, Issue[]>();
  const roots: Issue[] = [];

  for (const issue of [...issues].sort((a, b) => a.id - b.id)) {
    if (issue.parentId !== undefined && present.has(issue.parentId)) {
      const list = childrenOf.get(issue.parentId) ?? [];
      list.push(issue);
      childrenOf.set(issue.parentId, list);
    } else {
      roots.push(issue);
    }
  }

  const build = (issue: Issue): TreeNode => ({
    issue,
    children: (childrenOf.get(issue.id) ?? []).map(build),
  });

  return roots.map(build);
}

export function subissueProgress(children: readonly Issue[]): SubissueProgress | undefined {
  if (children.length === 0) return undefined;
  return {
    closed: children.filter((c) => c.status === 'closed').length,
    total: children.length,
  };
}

/**
 * Pick what to work on next from the ready set: highest priority, then the
 * oldest, then the lowest id. Returns null when nothing is ready.
 */
export function pickNext(
  ready: readonly Issue[],
  childrenOf: (id: number) => readonly Issue[] = () => []
): Recommendation | null {
  if (ready.length === 0) return null;

  const [top, ...rest] = [...ready].sort(compareForNext);
  return {
    issue: top,
    progress: subissueProgress(childrenOf(top.id)),
    alternatives: rest.slice(0, MAX_ALTERNATIVES),
  };
}

/**
 * All descendants of `rootId`, children before grandchildren.
 */
export function descendantIds(childIdsOf: NeighbourLookup, rootId: number): number[] {
  const result: number[] = [];
  const queue: number[] = [rootId];
  const seen = new Set<number>([rootId]);

  for (let head = 0; head < queue.length; head++) {
    for (const child of childIdsOf(queue[head])) {
      if (seen.has(child)) continue;
      seen.add(child);
      result.push(child);
      queue.push(child);
    }
  }

  return result;
}
