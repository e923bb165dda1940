import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}

// Migrations are append-only: never edit a released entry, add a new version instead.
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'issues, labels, dependencies, comments, sessions, time entries',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS issues (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          description TEXT,
          status TEXT NOT NULL DEFAULT 'open',
          priority TEXT NOT NULL DEFAULT 'medium',
          parent_id INTEGER REFERENCES issues(id) ON DELETE CASCADE,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          closed_at TEXT
        );

        CREATE TABLE IF NOT EXISTS labels (
          issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
          label TEXT NOT NULL,
          PRIMARY KEY (issue_id, label)
        );

        -- blocker_id blocks issue_id
        CREATE TABLE IF NOT EXISTS dependencies (
          issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
          blocker_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
          PRIMARY KEY (issue_id, blocker_id),
          CHECK (issue_id <> blocker_id)
        );

        CREATE TABLE IF NOT EXISTS comments (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
          content TEXT NOT NULL,
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS sessions (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          started_at TEXT NOT NULL,
          ended_at TEXT,
          active_issue_id INTEGER REFERENCES issues(id) ON DELETE SET NULL,
          handoff_notes TEXT
        );

        CREATE TABLE IF NOT EXISTS time_entries (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
          started_at TEXT NOT NULL,
          ended_at TEXT,
          duration_seconds INTEGER
        );

        CREATE INDEX IF NOT EXISTS idx_issues_status ON issues(status);
        CREATE INDEX IF NOT EXISTS idx_issues_priority ON issues(priority);
        CREATE INDEX IF NOT EXISTS idx_issues_parent ON issues(parent_id);
        CREATE INDEX IF NOT EXISTS idx_labels_issue ON labels(issue_id);
        CREATE INDEX IF NOT EXISTS idx_comments_issue ON comments(issue_id);
        CREATE INDEX IF NOT EXISTS idx_deps_blocker ON dependencies(blocker_id);
        CREATE INDEX IF NOT EXISTS idx_time_entries_issue ON time_entries(issue_id);
      `);
    },
  },
  {
    version: 2,
    description: 'archive flag and milestones',
    up: (db) => {
      db.exec(`
        ALTER TABLE issues ADD COLUMN archived INTEGER NOT NULL DEFAULT 0;
        CREATE INDEX IF NOT EXISTS idx_issues_archived ON issues(archived);

        CREATE TABLE IF NOT EXISTS milestones (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          description TEXT,
          status TEXT NOT NULL DEFAULT 'open',
          created_at TEXT NOT NULL,
          closed_at TEXT
        );

        CREATE TABLE IF NOT EXISTS milestone_issues (
          milestone_id INTEGER NOT NULL REFERENCES milestones(id) ON DELETE CASCADE,
          issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
          PRIMARY KEY (milestone_id, issue_id)
        );
      `);
    },
  },
  {
    version: 3,
    description: 'session timer fields, daemon flush checkpoint, single active session',
    up: (db) => {
      db.exec(`
        ALTER TABLE sessions ADD COLUMN timer_issue_id INTEGER REFERENCES issues(id) ON DELETE SET NULL;
        ALTER TABLE sessions ADD COLUMN timer_started_at TEXT;
        ALTER TABLE sessions ADD COLUMN last_flushed_at TEXT;
        ALTER TABLE sessions ADD COLUMN timer_checkpoint_seconds INTEGER;
        ALTER TABLE time_entries ADD COLUMN session_id INTEGER REFERENCES sessions(id) ON DELETE SET NULL;
      `);

      // Older stores could hold several unended sessions; keep only the newest one open.
      db.prepare(
        `UPDATE sessions SET ended_at = started_at
         WHERE ended_at IS NULL AND id <> (SELECT MAX(id) FROM sessions WHERE ended_at IS NULL)`
      ).run();

      db.exec(`
        CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_single_active
          ON sessions((ended_at IS NULL)) WHERE ended_at IS NULL;
      `);
    },
  },
];

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export function readSchemaVersion(db: Database.Database): number {
  const version = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration above the stored version, up to `target`.
 * Each step runs in its own transaction together with the version bump.
 */
export function migrate(db: Database.Database, target: number = SCHEMA_VERSION): number[] {
  const applied: number[] = [];
  const current = readSchemaVersion(db);

  for (const migration of MIGRATIONS) {
    if (migration.version <= current || migration.version > target) continue;

    db.transaction(() => {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    }).immediate();

    applied.push(migration.version);
  }

  return applied;
}
