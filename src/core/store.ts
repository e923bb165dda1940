import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { migrate, readSchemaVersion, SCHEMA_VERSION } from './migrations.js';
import { BusyError, CorruptStoreError, UnsupportedSchemaError } from './errors.js';
import { logger } from '../utils/logger.js';
import type {
  Issue,
  IssueStatus,
  Priority,
  Comment,
  DependencyEdge,
  Milestone,
  MilestoneStatus,
  Session,
  TimeEntry,
  StatusFilter,
} from '../types/index.js';

export interface StoreOptions {
  busyTimeoutMs?: number;
  busyRetries?: number;
}

export interface IssueRowInput {
  title: string;
  description?: string;
  priority: Priority;
  parentId?: number;
}

export interface IssueRowFilter {
  status?: StatusFilter;
  label?: string;
  priority?: Priority;
  includeArchived?: boolean;
}

export interface SessionRowUpdate {
  endedAt?: Date;
  workingOnId?: number | null;
  handoffNotes?: string;
  timerIssueId?: number | null;
  timerStartedAt?: Date | null;
  lastFlushedAt?: Date;
  timerCheckpointSeconds?: number | null;
}

export interface TimeEntryInput {
  issueId: number;
  sessionId?: number;
  startedAt: Date;
  endedAt: Date;
}

const DEFAULT_BUSY_TIMEOUT_MS = 5000;
const DEFAULT_BUSY_RETRIES = 3;

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_BUSY_RECOVERY', 'SQLITE_LOCKED']);

export function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isBusyError(error: unknown): boolean {
  const code = sqliteCode(error);
  return code !== undefined && BUSY_CODES.has(code);
}

export function isCorruptionError(error: unknown): boolean {
  const code = sqliteCode(error);
  return code !== undefined && (code === 'SQLITE_NOTADB' || code.startsWith('SQLITE_CORRUPT'));
}

function openError(dbPath: string, error: unknown): unknown {
  if (isCorruptionError(error)) {
    return new CorruptStoreError(dbPath, [error instanceof Error ? error.message : String(error)]);
  }
  if (isBusyError(error)) {
    return new BusyError('open', 1);
  }
  return error;
}

function timestamp(): string {
  return new Date().toISOString();
}

/**
 * SQLite adapter shared by the issue graph, session manager and daemon.
 * Every writer goes through `transaction()`, which takes the write lock up front
 * (BEGIN IMMEDIATE) and turns lock contention into a retryable BusyError.
 */
export class Store {
  private db: Database.Database;
  private busyRetries: number;
  readonly path: string;

  constructor(dbPath: string, options: StoreOptions = {}) {
    this.path = dbPath;
    this.busyRetries = options.busyRetries ?? DEFAULT_BUSY_RETRIES;

    // Ensure directory exists
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    try {
      this.db = new Database(dbPath);
    } catch (error) {
      throw openError(dbPath, error);
    }

    try {
      this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS}`);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');

      const problems = this.checkIntegrity();
      if (problems.length > 0) {
        throw new CorruptStoreError(dbPath, problems);
      }

      this.initSchema();
    } catch (error) {
      this.db.close();
      throw openError(dbPath, error);
    }
  }

  private initSchema(): void {
    const version = readSchemaVersion(this.db);
    if (version > SCHEMA_VERSION) {
      throw new UnsupportedSchemaError(version, SCHEMA_VERSION);
    }

    const applied = migrate(this.db);
    if (applied.length > 0) {
      logger.debug('Applied store migrations', { path: this.path, versions: applied });
    }
  }

  // ============ Transactions ============

  /**
   * Run `fn` atomically. Checks made inside `fn` see the same snapshot the
   * writes commit against, so check-then-act races between processes are impossible.
   */
  transaction<T>(fn: () => T, operation: string = 'transaction'): T {
    const run = this.db.transaction(fn);
    if (this.db.inTransaction) {
      // Nested calls become savepoints inside the outer transaction
      return run();
    }
    return this.withBusyRetry(operation, () => run.immediate());
  }

  begin(): void {
    this.withBusyRetry('begin', () => this.db.exec('BEGIN IMMEDIATE'));
  }

  commit(): void {
    this.withBusyRetry('commit', () => this.db.exec('COMMIT'));
  }

  rollback(): void {
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  private withBusyRetry<T>(operation: string, fn: () => T): T {
    for (let attempt = 1; ; attempt++) {
      try {
        return fn();
      } catch (error) {
        if (!isBusyError(error)) throw error;
        if (attempt > this.busyRetries) {
          throw new BusyError(operation, attempt);
        }
        // SQLite's busy handler already waited busy_timeout before failing
        logger.debug('Store busy, retrying', { operation, attempt });
      }
    }
  }

  // ============ Health ============

  schemaVersion(): number {
    return readSchemaVersion(this.db);
  }

  checkIntegrity(): string[] {
    const rows = this.db.prepare<[], { quick_check: string }>('PRAGMA quick_check').all();
    return rows.map((r) => r.quick_check).filter((result) => result !== 'ok');
  }

  // ============ Issue Methods ============

  insertIssue(input: IssueRowInput): number {
    const now = timestamp();
    const result = this.db
      .prepare(
        `INSERT INTO issues (title, description, priority, parent_id, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, 'open', ?, ?)`
      )
      .run(input.title, input.description ?? null, input.priority, input.parentId ?? null, now, now);
    return Number(result.lastInsertRowid);
  }

  getIssue(id: number): Issue | undefined {
    const row = this.db.prepare<[number], IssueRow>('SELECT * FROM issues WHERE id = ?').get(id);
    return row ? this.rowToIssue(row, this.getLabels(id)) : undefined;
  }

  issueExists(id: number): boolean {
    return this.db.prepare<[number], { id: number }>('SELECT id FROM issues WHERE id = ?').get(id) !== undefined;
  }

  listIssues(filter: IssueRowFilter = {}): Issue[] {
    let query = 'SELECT DISTINCT i.* FROM issues i';
    const params: unknown[] = [];
    const conditions: string[] = [];

    if (filter.label !== undefined) {
      query += ' JOIN labels l ON l.issue_id = i.id';
      conditions.push('l.label = ?');
      params.push(filter.label);
    }

    if (filter.status && filter.status !== 'all') {
      conditions.push('i.status = ?');
      params.push(filter.status);
    }

    if (filter.priority) {
      conditions.push('i.priority = ?');
      params.push(filter.priority);
    }

    if (!filter.includeArchived) {
      conditions.push('i.archived = 0');
    }

    if (conditions.length > 0) {
      query += ' WHERE ' + conditions.join(' AND ');
    }

    query += ' ORDER BY i.id';

    const rows = this.db.prepare<unknown[], IssueRow>(query).all(...params);
    return this.rowsToIssues(rows);
  }

  getIssuesByIds(ids: number[]): Issue[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => '?').join(',');
    const rows = this.db
      .prepare<number[], IssueRow>(`SELECT * FROM issues WHERE id IN (${placeholders}) ORDER BY id`)
      .all(...ids);
    return this.rowsToIssues(rows);
  }

  getChildIds(parentId: number): number[] {
    return this.db
      .prepare<[number], { id: number }>('SELECT id FROM issues WHERE parent_id = ? ORDER BY id')
      .all(parentId)
      .map((r) => r.id);
  }

  getChildIssues(parentId: number): Issue[] {
    const rows = this.db
      .prepare<[number], IssueRow>('SELECT * FROM issues WHERE parent_id = ? ORDER BY id')
      .all(parentId);
    return this.rowsToIssues(rows);
  }

  getParentId(id: number): number | undefined {
    const row = this.db
      .prepare<[number], { parent_id: number | null }>('SELECT parent_id FROM issues WHERE id = ?')
      .get(id);
    return row?.parent_id ?? undefined;
  }

  updateIssueFields(id: number, fields: { title?: string; description?: string; priority?: Priority }): void {
    const parts: string[] = ['updated_at = ?'];
    const values: unknown[] = [timestamp()];

    if (fields.title !== undefined) {
      parts.push('title = ?');
      values.push(fields.title);
    }
    if (fields.description !== undefined) {
      parts.push('description = ?');
      values.push(fields.description);
    }
    if (fields.priority !== undefined) {
      parts.push('priority = ?');
      values.push(fields.priority);
    }

    values.push(id);
    this.db.prepare(`UPDATE issues SET ${parts.join(', ')} WHERE id = ?`).run(...values);
  }

  setIssueStatus(id: number, status: IssueStatus): void {
    const now = timestamp();
    if (status === 'closed') {
      this.db
        .prepare("UPDATE issues SET status = 'closed', closed_at = ?, updated_at = ? WHERE id = ?")
        .run(now, now, id);
    } else {
      this.db
        .prepare("UPDATE issues SET status = 'open', closed_at = NULL, archived = 0, updated_at = ? WHERE id = ?")
        .run(now, id);
    }
  }

  setArchived(id: number, archived: boolean): void {
    this.db
      .prepare('UPDATE issues SET archived = ?, updated_at = ? WHERE id = ?')
      .run(archived ? 1 : 0, timestamp(), id);
  }

  archiveClosedBefore(cutoff: Date): number {
    const result = this.db
      .prepare(
        "UPDATE issues SET archived = 1, updated_at = ? WHERE status = 'closed' AND archived = 0 AND closed_at < ?"
      )
      .run(timestamp(), cutoff.toISOString());
    return result.changes;
  }

  setParent(id: number, parentId: number | null): void {
    this.db.prepare('UPDATE issues SET parent_id = ?, updated_at = ? WHERE id = ?').run(parentId, timestamp(), id);
  }

  deleteIssueRow(id: number): boolean {
    const result = this.db.prepare('DELETE FROM issues WHERE id = ?').run(id);
    return result.changes > 0;
  }

  // ============ Label Methods ============

  addLabel(issueId: number, label: string): boolean {
    const result = this.db.prepare('INSERT OR IGNORE INTO labels (issue_id, label) VALUES (?, ?)').run(issueId, label);
    return result.changes > 0;
  }

  removeLabel(issueId: number, label: string): boolean {
    const result = this.db.prepare('DELETE FROM labels WHERE issue_id = ? AND label = ?').run(issueId, label);
    return result.changes > 0;
  }

  getLabels(issueId: number): string[] {
    return this.db
      .prepare<[number], { label: string }>('SELECT label FROM labels WHERE issue_id = ? ORDER BY rowid')
      .all(issueId)
      .map((r) => r.label);
  }

  // ============ Comment Methods ============

  insertComment(issueId: number, content: string): Comment {
    const result = this.db
      .prepare('INSERT INTO comments (issue_id, content, created_at) VALUES (?, ?, ?)')
      .run(issueId, content, timestamp());
    const row = this.db
      .prepare<[number], CommentRow>('SELECT * FROM comments WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`Comment ${String(result.lastInsertRowid)} vanished after insert`);
    }
    return this.rowToComment(row);
  }

  getComments(issueId: number): Comment[] {
    return this.db
      .prepare<[number], CommentRow>('SELECT * FROM comments WHERE issue_id = ? ORDER BY id')
      .all(issueId)
      .map((r) => this.rowToComment(r));
  }

  // ============ Dependency Methods ============

  insertDependency(issueId: number, blockerId: number): boolean {
    const result = this.db
      .prepare('INSERT OR IGNORE INTO dependencies (issue_id, blocker_id) VALUES (?, ?)')
      .run(issueId, blockerId);
    return result.changes > 0;
  }

  deleteDependency(issueId: number, blockerId: number): boolean {
    const result = this.db
      .prepare('DELETE FROM dependencies WHERE issue_id = ? AND blocker_id = ?')
      .run(issueId, blockerId);
    return result.changes > 0;
  }

  getBlockerIds(issueId: number): number[] {
    return this.db
      .prepare<[number], { blocker_id: number }>(
        'SELECT blocker_id FROM dependencies WHERE issue_id = ? ORDER BY blocker_id'
      )
      .all(issueId)
      .map((r) => r.blocker_id);
  }

  getBlockingIds(blockerId: number): number[] {
    return this.db
      .prepare<[number], { issue_id: number }>(
        'SELECT issue_id FROM dependencies WHERE blocker_id = ? ORDER BY issue_id'
      )
      .all(blockerId)
      .map((r) => r.issue_id);
  }

  listDependencies(): DependencyEdge[] {
    return this.db
      .prepare<[], { issue_id: number; blocker_id: number }>(
        'SELECT issue_id, blocker_id FROM dependencies ORDER BY issue_id, blocker_id'
      )
      .all()
      .map((r) => ({ issueId: r.issue_id, blockerId: r.blocker_id }));
  }

  // ============ Milestone Methods ============

  insertMilestone(name: string, description?: string): number {
    const result = this.db
      .prepare("INSERT INTO milestones (name, description, status, created_at) VALUES (?, ?, 'open', ?)")
      .run(name, description ?? null, timestamp());
    return Number(result.lastInsertRowid);
  }

  getMilestone(id: number): Milestone | undefined {
    const row = this.db.prepare<[number], MilestoneRow>('SELECT * FROM milestones WHERE id = ?').get(id);
    return row ? this.rowToMilestone(row) : undefined;
  }

  listMilestones(status?: MilestoneStatus): Milestone[] {
    const rows = status
      ? this.db.prepare<[string], MilestoneRow>('SELECT * FROM milestones WHERE status = ? ORDER BY id').all(status)
      : this.db.prepare<[], MilestoneRow>('SELECT * FROM milestones ORDER BY id').all();
    return rows.map((r) => this.rowToMilestone(r));
  }

  addMilestoneIssue(milestoneId: number, issueId: number): boolean {
    const result = this.db
      .prepare('INSERT OR IGNORE INTO milestone_issues (milestone_id, issue_id) VALUES (?, ?)')
      .run(milestoneId, issueId);
    return result.changes > 0;
  }

  removeMilestoneIssue(milestoneId: number, issueId: number): boolean {
    const result = this.db
      .prepare('DELETE FROM milestone_issues WHERE milestone_id = ? AND issue_id = ?')
      .run(milestoneId, issueId);
    return result.changes > 0;
  }

  getMilestoneIssueIds(milestoneId: number): number[] {
    return this.db
      .prepare<[number], { issue_id: number }>(
        'SELECT issue_id FROM milestone_issues WHERE milestone_id = ? ORDER BY issue_id'
      )
      .all(milestoneId)
      .map((r) => r.issue_id);
  }

  getIssueMilestoneIds(issueId: number): number[] {
    return this.db
      .prepare<[number], { milestone_id: number }>(
        'SELECT milestone_id FROM milestone_issues WHERE issue_id = ? ORDER BY milestone_id'
      )
      .all(issueId)
      .map((r) => r.milestone_id);
  }

  setMilestoneStatus(id: number, status: MilestoneStatus): void {
    this.db
      .prepare('UPDATE milestones SET status = ?, closed_at = ? WHERE id = ?')
      .run(status, status === 'closed' ? timestamp() : null, id);
  }

  deleteMilestone(id: number): boolean {
    const result = this.db.prepare('DELETE FROM milestones WHERE id = ?').run(id);
    return result.changes > 0;
  }

  // ============ Session Methods ============

  insertSession(startedAt: Date): Session {
    const result = this.db.prepare('INSERT INTO sessions (started_at) VALUES (?)').run(startedAt.toISOString());
    const session = this.getSession(Number(result.lastInsertRowid));
    if (!session) {
      throw new Error(`Session ${String(result.lastInsertRowid)} vanished after insert`);
    }
    return session;
  }

  getSession(id: number): Session | undefined {
    const row = this.db.prepare<[number], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
    return row ? this.rowToSession(row) : undefined;
  }

  getActiveSession(): Session | undefined {
    const row = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions WHERE ended_at IS NULL ORDER BY id DESC LIMIT 1')
      .get();
    return row ? this.rowToSession(row) : undefined;
  }

  getLastEndedSession(): Session | undefined {
    const row = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions WHERE ended_at IS NOT NULL ORDER BY id DESC LIMIT 1')
      .get();
    return row ? this.rowToSession(row) : undefined;
  }

  listSessions(limit: number): Session[] {
    return this.db
      .prepare<[number], SessionRow>('SELECT * FROM sessions ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map((r) => this.rowToSession(r));
  }

  updateSession(id: number, updates: SessionRowUpdate): void {
    const parts: string[] = [];
    const values: unknown[] = [];

    if (updates.endedAt !== undefined) {
      parts.push('ended_at = ?');
      values.push(updates.endedAt.toISOString());
    }
    if (updates.workingOnId !== undefined) {
      parts.push('active_issue_id = ?');
      values.push(updates.workingOnId);
    }
    if (updates.handoffNotes !== undefined) {
      parts.push('handoff_notes = ?');
      values.push(updates.handoffNotes);
    }
    if (updates.timerIssueId !== undefined) {
      parts.push('timer_issue_id = ?');
      values.push(updates.timerIssueId);
    }
    if (updates.timerStartedAt !== undefined) {
      parts.push('timer_started_at = ?');
      values.push(updates.timerStartedAt ? updates.timerStartedAt.toISOString() : null);
    }
    if (updates.lastFlushedAt !== undefined) {
      parts.push('last_flushed_at = ?');
      values.push(updates.lastFlushedAt.toISOString());
    }
    if (updates.timerCheckpointSeconds !== undefined) {
      parts.push('timer_checkpoint_seconds = ?');
      values.push(updates.timerCheckpointSeconds);
    }

    if (parts.length === 0) return;

    values.push(id);
    this.db.prepare(`UPDATE sessions SET ${parts.join(', ')} WHERE id = ?`).run(...values);
  }

  // ============ Time Entry Methods ============

  insertTimeEntry(input: TimeEntryInput): TimeEntry {
    const durationSeconds = Math.max(0, Math.floor((input.endedAt.getTime() - input.startedAt.getTime()) / 1000));
    const result = this.db
      .prepare(
        `INSERT INTO time_entries (issue_id, session_id, started_at, ended_at, duration_seconds)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        input.issueId,
        input.sessionId ?? null,
        input.startedAt.toISOString(),
        input.endedAt.toISOString(),
        durationSeconds
      );

    return {
      id: Number(result.lastInsertRowid),
      issueId: input.issueId,
      sessionId: input.sessionId,
      startedAt: input.startedAt,
      endedAt: input.endedAt,
      durationSeconds,
    };
  }

  getTotalSeconds(issueId: number): number {
    const row = this.db
      .prepare<[number], { total: number }>(
        'SELECT COALESCE(SUM(duration_seconds), 0) AS total FROM time_entries WHERE issue_id = ?'
      )
      .get(issueId);
    return row?.total ?? 0;
  }

  // ============ Utility ============

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ============ Row Converters ============

  private rowsToIssues(rows: IssueRow[]): Issue[] {
    if (rows.length === 0) return [];

    const ids = rows.map((r) => r.id);
    const placeholders = ids.map(() => '?').join(',');
    const labelRows = this.db
      .prepare<number[], { issue_id: number; label: string }>(
        `SELECT issue_id, label FROM labels WHERE issue_id IN (${placeholders}) ORDER BY rowid`
      )
      .all(...ids);

    const labelsByIssue = new Map<number, string[]>();
    for (const { issue_id, label } of labelRows) {
      const list = labelsByIssue.get(issue_id) ?? [];
      list.push(label);
      labelsByIssue.set(issue_id, list);
    }

    return rows.map((r) => this.rowToIssue(r, labelsByIssue.get(r.id) ?? []));
  }

  private rowToIssue(row: IssueRow, labels: string[]): Issue {
    return {
      id: row.id,
      title: row.title,
      description: row.description ?? undefined,
      status: row.status === 'closed' ? 'closed' : 'open',
      priority: toPriority(row.priority),
      archived: row.archived === 1,
      parentId: row.parent_id ?? undefined,
      labels,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      closedAt: row.closed_at ? new Date(row.closed_at) : undefined,
    };
  }

  private rowToComment(row: CommentRow): Comment {
    return {
      id: row.id,
      issueId: row.issue_id,
      content: row.content,
      createdAt: new Date(row.created_at),
    };
  }

  private rowToMilestone(row: MilestoneRow): Milestone {
    return {
      id: row.id,
      name: row.name,
      description: row.description ?? undefined,
      status: row.status === 'closed' ? 'closed' : 'open',
      createdAt: new Date(row.created_at),
      closedAt: row.closed_at ? new Date(row.closed_at) : undefined,
    };
  }

  private rowToSession(row: SessionRow): Session {
    return {
      id: row.id,
      startedAt: new Date(row.started_at),
      endedAt: row.ended_at ? new Date(row.ended_at) : undefined,
      workingOnId: row.active_issue_id ?? undefined,
      handoffNotes: row.handoff_notes ?? undefined,
      timerIssueId: row.timer_issue_id ?? undefined,
      timerStartedAt: row.timer_started_at ? new Date(row.timer_started_at) : undefined,
      lastFlushedAt: row.last_flushed_at ? new Date(row.last_flushed_at) : undefined,
      timerCheckpointSeconds: row.timer_checkpoint_seconds ?? undefined,
    };
  }
}

function toPriority(value: string): Priority {
  switch (value) {
    case 'low':
    case 'medium':
    case 'high':
    case 'critical':
      return value;
    default:
      return 'medium';
  }
}

// Row types for SQLite
interface IssueRow {
  id: number;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  archived: number;
  parent_id: number | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

interface CommentRow {
  id: number;
  issue_id: number;
  content: string;
  created_at: string;
}

interface MilestoneRow {
  id: number;
  name: string;
  description: string | null;
  status: string;
  created_at: string;
  closed_at: string | null;
}

interface SessionRow {
  id: number;
  started_at: string;
  ended_at: string | null;
  active_issue_id: number | null;
  handoff_notes: string | null;
  timer_issue_id: number | null;
  timer_started_at: string | null;
  last_flushed_at: string | null;
  timer_checkpoint_seconds: number | null;
}
