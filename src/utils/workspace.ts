import { existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { CONFIG_FILE, DEFAULT_CONFIG } from './config.js';

export const WORKSPACE_DIR = '.waypost';

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find the .waypost directory by walking up from `cwd`.
 * WAYPOST_DIR overrides the search when set.
 */
export function findWorkspaceDir(cwd: string = process.cwd()): string | undefined {
  const override = process.env.WAYPOST_DIR;
  if (override) {
    return resolve(cwd, override);
  }

  let current = resolve(cwd);
  for (;;) {
    const candidate = join(current, WORKSPACE_DIR);
    if (isDirectory(candidate)) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

export class WorkspaceNotFoundError extends Error {
  constructor(public cwd: string) {
    super(`No ${WORKSPACE_DIR} directory found from ${cwd}; run "waypost init" first`);
    this.name = 'WorkspaceNotFoundError';
  }
}

export function requireWorkspaceDir(cwd: string = process.cwd()): string {
  const dir = findWorkspaceDir(cwd);
  if (!dir) {
    throw new WorkspaceNotFoundError(cwd);
  }
  return dir;
}

export interface InitResult {
  dir: string;
  created: boolean;
}

/**
 * Create .waypost in `cwd` with a default config.json. An existing
 * workspace is left untouched.
 */
export function initWorkspace(cwd: string = process.cwd()): InitResult {
  const dir = join(resolve(cwd), WORKSPACE_DIR);
  if (existsSync(dir)) {
    return { dir, created: false };
  }

  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, CONFIG_FILE), JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', 'utf-8');
  return { dir, created: true };
}
