import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { NodeProcessControl, isProcessRunning } from './spawner.js';
import { getDaemonLogPath } from '../utils/config.js';

describe('NodeProcessControl', () => {
  let workspaceDir: string;

  beforeEach(() => {
    workspaceDir = mkdtempSync(join(tmpdir(), 'waypost-spawn-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(workspaceDir, { recursive: true, force: true });
  });

  it('should see the current process as running', () => {
    expect(isProcessRunning(process.pid)).toBe(true);
  });

  it('should throw and log when the executable cannot be spawned', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const control = new NodeProcessControl({ entry: 'cli.js', execPath: join(workspaceDir, 'missing-node') });

    expect(() => control.spawnDaemon({ workspaceDir, token: 'test-token' })).toThrow('Failed to spawn daemon process');
    expect(existsSync(getDaemonLogPath(workspaceDir))).toBe(true);

    await vi.waitFor(() => {
      expect(errors).toHaveBeenCalledTimes(1);
    });
    expect(errors.mock.calls[0][0]).toContain('Daemon process failed to start');
  });
});
