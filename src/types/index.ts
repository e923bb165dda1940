// Issue types
export type IssueStatus = 'open' | 'closed';

export type Priority = 'low' | 'medium' | 'high' | 'critical';

export const PRIORITIES: readonly Priority[] = ['low', 'medium', 'high', 'critical'];

// Higher weight sorts first in ready/next views
export const PRIORITY_WEIGHT: Record<Priority, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

export type StatusFilter = IssueStatus | 'all';

export interface Issue {
  id: number;
  title: string;
  description?: string;
  status: IssueStatus;
  priority: Priority;
  archived: boolean;
  parentId?: number;
  labels: string[];
  createdAt: Date;
  updatedAt: Date;
  closedAt?: Date;
}

export interface IssueCreateInput {
  title: string;
  description?: string;
  priority?: string;
  parentId?: number;
}

export interface IssueUpdateInput {
  title?: string;
  description?: string;
  priority?: string;
}

export interface IssueListFilter {
  status?: StatusFilter;
  label?: string;
  priority?: string;
  includeArchived?: boolean;
}

export interface Comment {
  id: number;
  issueId: number;
  content: string;
  createdAt: Date;
}

// Dependency edge: `issueId` cannot be ready while `blockerId` is open
export interface DependencyEdge {
  issueId: number;
  blockerId: number;
}

export interface StatusChange {
  issue: Issue;
  changed: boolean;
}

export interface BlockedIssue {
  issue: Issue;
  blockers: Issue[];
}

export interface TreeNode {
  issue: Issue;
  children: TreeNode[];
}

export interface SubissueProgress {
  closed: number;
  total: number;
}

export interface Recommendation {
  issue: Issue;
  progress?: SubissueProgress;
  alternatives: Issue[];
}

export interface IssueDetail {
  issue: Issue;
  comments: Comment[];
  blockers: Issue[];
  blocking: Issue[];
  children: Issue[];
  milestoneIds: number[];
  totalSeconds: number;
}

// Milestones
export type MilestoneStatus = 'open' | 'closed';

export interface Milestone {
  id: number;
  name: string;
  description?: string;
  status: MilestoneStatus;
  createdAt: Date;
  closedAt?: Date;
}

export interface MilestoneWithProgress extends Milestone {
  issues: Issue[];
  progress: SubissueProgress;
}

// Sessions
export interface Session {
  id: number;
  startedAt: Date;
  endedAt?: Date;
  workingOnId?: number;
  handoffNotes?: string;
  timerIssueId?: number;
  timerStartedAt?: Date;
  lastFlushedAt?: Date;
  timerCheckpointSeconds?: number;
}

export interface Handoff {
  sessionId: number;
  endedAt: Date;
  notes: string;
  workingOnId?: number;
}

export interface SessionStartResult {
  session: Session;
  handoff?: Handoff;
}

export interface TimeEntry {
  id: number;
  issueId: number;
  sessionId?: number;
  startedAt: Date;
  endedAt: Date;
  durationSeconds: number;
}

export interface RunningTimer {
  issueId: number;
  startedAt: Date;
  elapsedSeconds: number;
}

export interface TimerStartResult {
  session: Session;
  timer: RunningTimer;
  stopped?: TimeEntry;
}

export interface SessionStatusReport {
  active: boolean;
  session?: Session;
  workingOn?: Issue;
  timer?: RunningTimer;
  handoff?: Handoff;
}

export interface FlushResult {
  flushed: boolean;
  sessionId?: number;
  flushedAt: Date;
  timerCheckpointSeconds?: number;
}

// Config types
export interface StoreConfig {
  busyTimeoutMs: number;
  busyRetries: number;
}

export interface DaemonConfig {
  flushIntervalSeconds: number;
  staleMultiplier: number;
}

export interface IssuesConfig {
  titleMaxLength: number;
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
}

export interface WaypostConfig {
  store: StoreConfig;
  daemon: DaemonConfig;
  issues: IssuesConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}
