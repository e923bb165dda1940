import Database from 'better-sqlite3';
import { existsSync, renameSync } from 'fs';
import { Store, isCorruptionError } from './store.js';
import { logger } from '../utils/logger.js';

export type RecoveryAction = 'healthy' | 'reindexed' | 'reinitialized';

export interface RecoveryReport {
  action: RecoveryAction;
  path: string;
  problems: string[];
  quarantinedPath?: string;
  salvaged: Record<string, number>;
  lostTables: string[];
  skippedRows: number;
  droppedOrphans: number;
  dataLoss: boolean;
}

// Parents before children so salvaged rows find their references
export const SALVAGE_TABLES = [
  'issues',
  'labels',
  'dependencies',
  'comments',
  'milestones',
  'milestone_issues',
  'sessions',
  'time_entries',
] as const;

type SqlRow = Record<string, unknown>;

function integrityProblems(db: Database.Database): string[] {
  return db
    .prepare<[], { quick_check: string }>('PRAGMA quick_check')
    .all()
    .map((r) => r.quick_check)
    .filter((result) => result !== 'ok');
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Probe the file in place: REINDEX repairs index-only damage. Returns the
 * problems still present afterwards, or those that stopped the probe.
 */
function tryInPlace(path: string): { problems: string[]; reindexed: boolean } {
  let db: Database.Database | undefined;
  try {
    db = new Database(path);
    const before = integrityProblems(db);
    if (before.length === 0) {
      return { problems: [], reindexed: false };
    }
    logger.warn('Store failed its integrity check, rebuilding indexes', { path, problems: before.length });
    db.exec('REINDEX');
    const after = integrityProblems(db);
    return { problems: after.length === 0 ? before : after, reindexed: after.length === 0 };
  } catch (error) {
    if (!isCorruptionError(error)) throw error;
    return { problems: [describe(error)], reindexed: false };
  } finally {
    db?.close();
  }
}

function quarantine(path: string): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-');
  const target = `${path}.corrupt-${stamp}`;
  renameSync(path, target);
  for (const suffix of ['-wal', '-shm']) {
    if (existsSync(path + suffix)) {
      renameSync(path + suffix, target + suffix);
    }
  }
  return target;
}

function columnsOf(db: Database.Database, table: string): string[] {
  return db
    .prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)')
    .all(table)
    .map((r) => r.name);
}

function salvageTable(
  source: Database.Database,
  dest: Database.Database,
  table: string
): { read: number; inserted: number } {
  const sourceColumns = new Set(columnsOf(source, table));
  const columns = columnsOf(dest, table).filter((c) => sourceColumns.has(c));
  if (columns.length === 0) {
    throw new Error(`table ${table} is missing`);
  }

  const list = columns.map((c) => `"${c}"`).join(', ');
  const rows = source.prepare<[], SqlRow>(`SELECT ${list} FROM "${table}"`).all();
  const insert = dest.prepare<unknown[]>(
    `INSERT OR IGNORE INTO "${table}" (${list}) VALUES (${columns.map(() => '?').join(', ')})`
  );

  let inserted = 0;
  dest.transaction(() => {
    for (const row of rows) {
      inserted += insert.run(...columns.map((c) => row[c])).changes;
    }
  })();
  return { read: rows.length, inserted };
}

function dropOrphans(db: Database.Database): number {
  const orphans = db.prepare<[], { table: string; rowid: number | null }>('PRAGMA foreign_key_check').all();
  let dropped = 0;
  for (const orphan of orphans) {
    if (orphan.rowid === null) continue;
    dropped += db.prepare(`DELETE FROM "${orphan.table}" WHERE rowid = ?`).run(orphan.rowid).changes;
  }
  return dropped;
}

// Keeps AUTOINCREMENT counters past ids that were deleted before the damage
function salvageSequences(source: Database.Database, dest: Database.Database): void {
  try {
    const rows = source.prepare<[], { name: string; seq: number }>('SELECT name, seq FROM sqlite_sequence').all();
    const raise = dest.prepare('UPDATE sqlite_sequence SET seq = MAX(seq, ?) WHERE name = ?');
    const insert = dest.prepare('INSERT INTO sqlite_sequence (name, seq) VALUES (?, ?)');
    dest.transaction(() => {
      for (const row of rows) {
        if (raise.run(row.seq, row.name).changes === 0) {
          insert.run(row.name, row.seq);
        }
      }
    })();
  } catch (error) {
    logger.warn('Could not salvage id sequences', { error: describe(error) });
  }
}

export type SalvageTally = Pick<RecoveryReport, 'salvaged' | 'lostTables' | 'skippedRows' | 'droppedOrphans'>;

/**
 * Copy every readable row of `source` into the fresh store `dest`, then its
 * id sequences, then drop rows whose references did not survive.
 */
export function salvageInto(source: Database.Database, dest: Database.Database, tally: SalvageTally): void {
  dest.pragma('foreign_keys = OFF');

  for (const table of SALVAGE_TABLES) {
    try {
      const { read, inserted } = salvageTable(source, dest, table);
      tally.salvaged[table] = inserted;
      tally.skippedRows += read - inserted;
    } catch (error) {
      logger.warn('Could not salvage table', { table, error: describe(error) });
      tally.lostTables.push(table);
    }
  }

  salvageSequences(source, dest);
  tally.droppedOrphans = dropOrphans(dest);
}

/**
 * Bring a damaged store back to a usable state. Index damage is repaired in
 * place; anything worse moves the file aside, creates a fresh store and
 * copies every readable row across. `dataLoss` is set whenever a table or
 * row could not be carried over.
 */
export function recoverStore(path: string): RecoveryReport {
  const report: RecoveryReport = {
    action: 'healthy',
    path,
    problems: [],
    salvaged: {},
    lostTables: [],
    skippedRows: 0,
    droppedOrphans: 0,
    dataLoss: false,
  };

  if (!existsSync(path)) {
    new Store(path).close();
    return report;
  }

  const probe = tryInPlace(path);
  report.problems = probe.problems;
  if (probe.problems.length === 0) {
    return report;
  }
  if (probe.reindexed) {
    report.action = 'reindexed';
    return report;
  }

  report.action = 'reinitialized';
  report.quarantinedPath = quarantine(path);
  logger.warn('Quarantined damaged store', { path, quarantinedPath: report.quarantinedPath });

  new Store(path).close();

  let source: Database.Database | undefined;
  const dest = new Database(path);
  try {
    source = new Database(report.quarantinedPath, { fileMustExist: true });
    salvageInto(source, dest, report);
  } catch (error) {
    if (!isCorruptionError(error)) throw error;
    logger.warn('Quarantined store is unreadable', { error: describe(error) });
    for (const table of SALVAGE_TABLES) {
      if (!(table in report.salvaged) && !report.lostTables.includes(table)) {
        report.lostTables.push(table);
      }
    }
  } finally {
    source?.close();
    dest.close();
  }

  report.dataLoss = report.lostTables.length > 0 || report.skippedRows > 0 || report.droppedOrphans > 0;
  return report;
}
