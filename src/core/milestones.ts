import { Store } from './store.js';
import { NotFoundError, ValidationError } from './errors.js';
import type { Milestone, MilestoneStatus, MilestoneWithProgress } from '../types/index.js';

export const MILESTONE_NAME_MAX_LENGTH = 256;

export class Milestones {
  constructor(private store: Store) {}

  private requireMilestone(id: number): Milestone {
    const milestone = this.store.getMilestone(id);
    if (!milestone) {
      throw new NotFoundError('milestone', id);
    }
    return milestone;
  }

  create(name: string, description?: string): Milestone {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('name', 'non-empty', 'Milestone name cannot be empty');
    }
    if (trimmed.length > MILESTONE_NAME_MAX_LENGTH) {
      throw new ValidationError('name', `max ${MILESTONE_NAME_MAX_LENGTH} characters`);
    }

    return this.store.transaction(() => {
      const id = this.store.insertMilestone(trimmed, description);
      return this.requireMilestone(id);
    }, 'milestone create');
  }

  list(status?: MilestoneStatus): Milestone[] {
    return this.store.listMilestones(status);
  }

  get(id: number): MilestoneWithProgress {
    const milestone = this.requireMilestone(id);
    const issues = this.store.getIssuesByIds(this.store.getMilestoneIssueIds(id));
    return {
      ...milestone,
      issues,
      progress: {
        closed: issues.filter((i) => i.status === 'closed').length,
        total: issues.length,
      },
    };
  }

  /**
   * Attach issues to a milestone. Returns the ids that were newly added;
   * ids already attached are skipped.
   */
  add(milestoneId: number, issueIds: number[]): number[] {
    return this.store.transaction(() => {
      this.requireMilestone(milestoneId);
      for (const issueId of issueIds) {
        if (!this.store.issueExists(issueId)) {
          throw new NotFoundError('issue', issueId);
        }
      }
      return issueIds.filter((issueId) => this.store.addMilestoneIssue(milestoneId, issueId));
    }, 'milestone add');
  }

  remove(milestoneId: number, issueId: number): boolean {
    return this.store.transaction(() => {
      this.requireMilestone(milestoneId);
      return this.store.removeMilestoneIssue(milestoneId, issueId);
    }, 'milestone remove');
  }

  close(id: number): Milestone {
    return this.store.transaction(() => {
      const milestone = this.requireMilestone(id);
      if (milestone.status !== 'closed') {
        this.store.setMilestoneStatus(id, 'closed');
      }
      return this.requireMilestone(id);
    }, 'milestone close');
  }

  delete(id: number): void {
    this.store.transaction(() => {
      this.requireMilestone(id);
      this.store.deleteMilestone(id);
    }, 'milestone delete');
  }
}
