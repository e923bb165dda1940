import { describe, it, expect } from 'vitest';
import { formatDuration, formatProgress, truncate, padRight, renderTree } from './format.js';
import type { Issue, TreeNode } from '../types/index.js';

function issue(id: number, title: string, overrides: Partial<Issue> = {}): Issue {
  const at = new Date('2024-01-01T00:00:00.000Z');
  return { id, title, status: 'open', priority: 'medium', archived: false, labels: [], createdAt: at, updatedAt: at, ...overrides };
}

describe('format', () => {
  it('should format durations', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(59.9)).toBe('59s');
    expect(formatDuration(3600)).toBe('1h');
    expect(formatDuration(3725)).toBe('1h 2m 5s');
    expect(formatDuration(-5)).toBe('0s');
  });

  it('should format subissue progress', () => {
    expect(formatProgress({ closed: 2, total: 5 })).toBe('2/5');
    expect(formatProgress(undefined)).toBe('');
  });

  it('should truncate and pad ignoring colour codes', () => {
    expect(truncate('abcdef', 4)).toBe('abc…');
    expect(truncate('abc', 4)).toBe('abc');
    expect(padRight('\x1b[32mok\x1b[39m', 4)).toBe('\x1b[32mok\x1b[39m  ');
  });

  it('should render a tree with indentation and status marks', () => {
    const tree: TreeNode[] = [
      {
        issue: issue(1, 'Epic', { priority: 'high' }),
        children: [
          { issue: issue(2, 'Done part', { status: 'closed' }), children: [] },
          { issue: issue(3, 'Open part'), children: [{ issue: issue(4, 'Leaf', { priority: 'low' }), children: [] }] },
        ],
      },
    ];

    expect(renderTree(tree)).toEqual([
      '[ ] #1 high - Epic',
      '  [x] #2 medium - Done part',
      '  [ ] #3 medium - Open part',
      '    [ ] #4 low - Leaf',
    ]);
  });
});
