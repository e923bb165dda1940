import chalk from 'chalk';
import { Store } from '../core/store.js';
import { IssueGraph } from '../core/issue-graph.js';
import { Milestones } from '../core/milestones.js';
import { SessionManager } from '../core/session-manager.js';
import { ValidationError, isWaypostError } from '../core/errors.js';
import { loadConfig, getDbPath } from '../utils/config.js';
import { requireWorkspaceDir } from '../utils/workspace.js';
import { setJsonMode, setLogLevel } from '../utils/logger.js';
import type { WaypostConfig } from '../types/index.js';

export interface JsonOption {
  json?: boolean;
}

export interface CommandContext {
  dir: string;
  config: WaypostConfig;
  store: Store;
  graph: IssueGraph;
  milestones: Milestones;
  sessions: SessionManager;
}

export function openContext(cwd: string = process.cwd()): CommandContext {
  const dir = requireWorkspaceDir(cwd);
  const config = loadConfig(dir);
  setLogLevel(config.logging.level);

  const store = new Store(getDbPath(dir), config.store);
  return {
    dir,
    config,
    store,
    graph: new IssueGraph(store, { titleMaxLength: config.issues.titleMaxLength }),
    milestones: new Milestones(store),
    sessions: new SessionManager(store),
  };
}

/**
 * Open the workspace, run `fn`, and always close the store.
 */
export function withContext<T>(fn: (ctx: CommandContext) => T): T {
  const ctx = openContext();
  try {
    return fn(ctx);
  } finally {
    ctx.store.close();
  }
}

export function reportError(error: unknown, json?: boolean): void {
  const message = error instanceof Error ? error.message : String(error);

  if (json) {
    const payload = isWaypostError(error) ? error.toJSON() : { message };
    console.log(JSON.stringify({ error: payload }));
  } else {
    console.error(chalk.red(`Error: ${message}`));
  }
  process.exitCode = 1;
}

/**
 * Run a command body: JSON mode is set up front and every failure is
 * reported the same way with exit code 1.
 */
export async function runCommand(options: JsonOption, fn: () => void | Promise<void>): Promise<void> {
  const json = options.json === true;
  setJsonMode(json);
  try {
    await fn();
  } catch (error) {
    reportError(error, json);
  }
}

export function parseId(value: string, field: string = 'id'): number {
  const trimmed = value.trim().replace(/^#/, '');
  const id = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(field, 'positive integer', `Invalid ${field} "${value}"`);
  }
  return id;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
