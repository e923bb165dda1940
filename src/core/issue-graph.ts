import { Store } from './store.js';
import {
  ValidationError,
  NotFoundError,
  CycleDetectedError,
  HasChildrenError,
} from './errors.js';
import {
  wouldCreateCycle,
  wouldCreateHierarchyCycle,
  readyIssues,
  blockedIssues,
  buildTree,
  pickNext,
  descendantIds,
} from './graph.js';
import { logger } from '../utils/logger.js';
import { isPriority } from '../types/index.js';
import type {
  Issue,
  Priority,
  IssueCreateInput,
  IssueUpdateInput,
  IssueListFilter,
  Comment,
  StatusChange,
  BlockedIssue,
  TreeNode,
  Recommendation,
  IssueDetail,
  StatusFilter,
} from '../types/index.js';

export const DEFAULT_TITLE_MAX_LENGTH = 256;
export const DESCRIPTION_MAX_LENGTH = 65536;
export const COMMENT_MAX_LENGTH = 65536;
export const LABEL_MAX_LENGTH = 64;

export interface IssueGraphOptions {
  titleMaxLength?: number;
}

export interface DeleteOptions {
  cascade?: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Issue records, hierarchy and blocking edges. Every write validates and
 * mutates inside one store transaction; views read a consistent snapshot.
 */
export class IssueGraph {
  private titleMaxLength: number;

  constructor(
    private store: Store,
    options: IssueGraphOptions = {}
  ) {
    this.titleMaxLength = options.titleMaxLength ?? DEFAULT_TITLE_MAX_LENGTH;
  }

  // ============ Validation ============

  private validateTitle(title: string): string {
    const trimmed = title.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('title', 'non-empty', 'Title cannot be empty');
    }
    if (trimmed.length > this.titleMaxLength) {
      throw new ValidationError(
        'title',
        `max ${this.titleMaxLength} characters`,
        `Title is ${trimmed.length} characters; the limit is ${this.titleMaxLength}`
      );
    }
    return trimmed;
  }

  private validateDescription(description: string): string {
    if (description.length > DESCRIPTION_MAX_LENGTH) {
      throw new ValidationError('description', `max ${DESCRIPTION_MAX_LENGTH} characters`);
    }
    return description;
  }

  private validatePriority(priority: string): Priority {
    if (!isPriority(priority)) {
      throw new ValidationError(
        'priority',
        'one of low, medium, high, critical',
        `Unknown priority "${priority}"; use low, medium, high or critical`
      );
    }
    return priority;
  }

  private validateLabel(label: string): string {
    if (label.length === 0 || /\s/.test(label)) {
      throw new ValidationError('label', 'non-empty, no whitespace', `Invalid label "${label}"`);
    }
    if (label.length > LABEL_MAX_LENGTH) {
      throw new ValidationError('label', `max ${LABEL_MAX_LENGTH} characters`);
    }
    return label;
  }

  private requireIssue(id: number): Issue {
    const issue = this.store.getIssue(id);
    if (!issue) {
      throw new NotFoundError('issue', id);
    }
    return issue;
  }

  private requireExists(id: number, entity: 'issue' | 'parent' | 'blocker' = 'issue'): void {
    if (!this.store.issueExists(id)) {
      throw new NotFoundError(entity, id);
    }
  }

  // ============ Issue Lifecycle ============

  create(input: IssueCreateInput): Issue {
    const title = this.validateTitle(input.title);
    const description = input.description !== undefined ? this.validateDescription(input.description) : undefined;
    const priority = this.validatePriority(input.priority ?? 'medium');

    const issue = this.store.transaction(() => {
      if (input.parentId !== undefined) {
        this.requireExists(input.parentId, 'parent');
      }
      const id = this.store.insertIssue({ title, description, priority, parentId: input.parentId });
      return this.requireIssue(id);
    }, 'create');

    logger.debug('Created issue', { id: issue.id, parentId: issue.parentId });
    return issue;
  }

  update(id: number, input: IssueUpdateInput): Issue {
    const fields: { title?: string; description?: string; priority?: Priority } = {};
    if (input.title !== undefined) fields.title = this.validateTitle(input.title);
    if (input.description !== undefined) fields.description = this.validateDescription(input.description);
    if (input.priority !== undefined) fields.priority = this.validatePriority(input.priority);

    return this.store.transaction(() => {
      this.requireExists(id);
      this.store.updateIssueFields(id, fields);
      return this.requireIssue(id);
    }, 'update');
  }

  close(id: number): StatusChange {
    return this.setStatus(id, 'closed');
  }

  reopen(id: number): StatusChange {
    return this.setStatus(id, 'open');
  }

  private setStatus(id: number, status: 'open' | 'closed'): StatusChange {
    return this.store.transaction(() => {
      const current = this.requireIssue(id);
      if (current.status === status) {
        return { issue: current, changed: false };
      }
      this.store.setIssueStatus(id, status);
      return { issue: this.requireIssue(id), changed: true };
    }, status === 'closed' ? 'close' : 'reopen');
  }

  /**
   * Delete an issue with its comments, labels, edges and memberships.
   * Subissues block the delete unless `cascade` is set. Returns every id removed.
   */
  delete(id: number, options: DeleteOptions = {}): number[] {
    const deleted = this.store.transaction(() => {
      this.requireExists(id);
      const childIds = this.store.getChildIds(id);
      if (childIds.length > 0 && !options.cascade) {
        throw new HasChildrenError(id, childIds);
      }

      const descendants = descendantIds((parent) => this.store.getChildIds(parent), id);
      // Deepest first, so no row is removed before its children
      for (const descendant of [...descendants].reverse()) {
        this.store.deleteIssueRow(descendant);
      }
      this.store.deleteIssueRow(id);
      return [id, ...descendants];
    }, 'delete');

    logger.debug('Deleted issues', { ids: deleted });
    return deleted;
  }

  get(id: number): Issue {
    return this.requireIssue(id);
  }

  show(id: number): IssueDetail {
    const issue = this.requireIssue(id);
    return {
      issue,
      comments: this.store.getComments(id),
      blockers: this.store.getIssuesByIds(this.store.getBlockerIds(id)),
      blocking: this.store.getIssuesByIds(this.store.getBlockingIds(id)),
      children: this.store.getChildIssues(id),
      milestoneIds: this.store.getIssueMilestoneIds(id),
      totalSeconds: this.store.getTotalSeconds(id),
    };
  }

  // ============ Labels & Comments ============

  addLabel(id: number, label: string): boolean {
    const valid = this.validateLabel(label);
    return this.store.transaction(() => {
      this.requireExists(id);
      return this.store.addLabel(id, valid);
    }, 'label');
  }

  removeLabel(id: number, label: string): boolean {
    return this.store.transaction(() => {
      this.requireExists(id);
      return this.store.removeLabel(id, label);
    }, 'unlabel');
  }

  addComment(id: number, text: string): Comment {
    if (text.trim().length === 0) {
      throw new ValidationError('comment', 'non-empty', 'Comment cannot be empty');
    }
    if (text.length > COMMENT_MAX_LENGTH) {
      throw new ValidationError('comment', `max ${COMMENT_MAX_LENGTH} characters`);
    }
    return this.store.transaction(() => {
      this.requireExists(id);
      return this.store.insertComment(id, text);
    }, 'comment');
  }

  // ============ Dependencies ============

  /**
   * Record that `id` is blocked by `blockerId`. The reachability check and
   * the insert share one immediate transaction.
   */
  block(id: number, blockerId: number): boolean {
    if (id === blockerId) {
      throw new ValidationError('blocker', 'differs from issue', `Issue #${id} cannot block itself`);
    }

    return this.store.transaction(() => {
      this.requireExists(id);
      this.requireExists(blockerId, 'blocker');

      if (this.store.getBlockerIds(id).includes(blockerId)) {
        return false;
      }
      if (wouldCreateCycle((issueId) => this.store.getBlockerIds(issueId), id, blockerId)) {
        throw new CycleDetectedError('dependency', id, blockerId);
      }
      return this.store.insertDependency(id, blockerId);
    }, 'block');
  }

  unblock(id: number, blockerId: number): boolean {
    return this.store.transaction(() => {
      this.requireExists(id);
      this.requireExists(blockerId, 'blocker');
      return this.store.deleteDependency(id, blockerId);
    }, 'unblock');
  }

  // ============ Hierarchy ============

  move(id: number, parentId: number | null): Issue {
    return this.store.transaction(() => {
      this.requireExists(id);
      if (parentId !== null) {
        this.requireExists(parentId, 'parent');
        if (wouldCreateHierarchyCycle((child) => this.store.getParentId(child), id, parentId)) {
          throw new CycleDetectedError('hierarchy', id, parentId);
        }
      }
      this.store.setParent(id, parentId);
      return this.requireIssue(id);
    }, 'move');
  }

  // ============ Archive ============

  archive(id: number): Issue {
    return this.store.transaction(() => {
      const issue = this.requireIssue(id);
      if (issue.status !== 'closed') {
        throw new ValidationError('status', 'closed', `Issue #${id} must be closed before it can be archived`);
      }
      if (!issue.archived) {
        this.store.setArchived(id, true);
      }
      return this.requireIssue(id);
    }, 'archive');
  }

  unarchive(id: number): Issue {
    return this.store.transaction(() => {
      const issue = this.requireIssue(id);
      if (issue.archived) {
        this.store.setArchived(id, false);
      }
      return this.requireIssue(id);
    }, 'unarchive');
  }

  archiveOlderThan(days: number): number {
    if (!Number.isFinite(days) || days < 0) {
      throw new ValidationError('days', 'non-negative number');
    }
    const cutoff = new Date(Date.now() - days * DAY_MS);
    return this.store.transaction(() => this.store.archiveClosedBefore(cutoff), 'archive');
  }

  // ============ Views ============

  list(filter: IssueListFilter = {}): Issue[] {
    const priority = filter.priority !== undefined ? this.validatePriority(filter.priority) : undefined;
    return this.store.listIssues({
      status: filter.status ?? 'all',
      label: filter.label,
      priority,
      includeArchived: filter.includeArchived,
    });
  }

  ready(): Issue[] {
    return readyIssues(this.store.listIssues({ status: 'all' }), this.store.listDependencies());
  }

  blocked(): BlockedIssue[] {
    return blockedIssues(this.store.listIssues({ status: 'all' }), this.store.listDependencies());
  }

  tree(options: { status?: StatusFilter } = {}): TreeNode[] {
    return buildTree(this.store.listIssues({ status: options.status ?? 'all' }));
  }

  next(): Recommendation | null {
    return pickNext(this.ready(), (id) => this.store.getChildIssues(id));
  }
}
