import type { IssueGraph } from './issue-graph.js';
import type { SessionManager } from './session-manager.js';
import type { DaemonStatus } from '../daemon/types.js';
import type {
  Issue,
  BlockedIssue,
  Recommendation,
  SessionStatusReport,
} from '../types/index.js';

export const DEFAULT_SUMMARY_LIMIT = 10;

export interface ContextSummary {
  generatedAt: string;
  session: SessionStatusReport;
  next: Recommendation | null;
  ready: Issue[];
  readyTotal: number;
  blocked: BlockedIssue[];
  blockedTotal: number;
  openTotal: number;
  daemon?: DaemonStatus;
}

export interface SummarySources {
  graph: IssueGraph;
  sessions: SessionManager;
  daemonStatus?: () => DaemonStatus;
}

/**
 * Read-only snapshot for tools that prime an agent's context at the start
 * of a conversation.
 */
export function buildContextSummary(sources: SummarySources, limit: number = DEFAULT_SUMMARY_LIMIT): ContextSummary {
  const ready = sources.graph.ready();
  const blocked = sources.graph.blocked();

  return {
    generatedAt: new Date().toISOString(),
    session: sources.sessions.status(),
    next: sources.graph.next(),
    ready: ready.slice(0, limit),
    readyTotal: ready.length,
    blocked: blocked.slice(0, limit),
    blockedTotal: blocked.length,
    openTotal: sources.graph.list({ status: 'open' }).length,
    daemon: sources.daemonStatus?.(),
  };
}
