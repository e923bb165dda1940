import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import express from 'express';
import { mkdtempSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { attachStore, createServer } from './index.js';
import { Store } from '../core/store.js';
import { IssueGraph } from '../core/issue-graph.js';
import { DaemonCoordinator, MemoryHeartbeatStore } from '../daemon/index.js';
import { getDbPath } from '../utils/config.js';

describe('server', () => {
  let root: string;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    root = mkdtempSync(join(tmpdir(), 'waypost-server-'));
    const workspaceDir = join(root, '.waypost');
    mkdirSync(workspaceDir);

    const store = new Store(getDbPath(workspaceDir));
    const graph = new IssueGraph(store);
    const api = graph.create({ title: 'Ship API', priority: 'critical' });
    const docs = graph.create({ title: 'Write docs', priority: 'high' });
    graph.block(docs.id, api.id);
    store.close();

    const coordinator = new DaemonCoordinator({
      heartbeat: new MemoryHeartbeatStore(),
      processes: { spawnDaemon: () => 1, isRunning: () => false, terminate: () => false },
      workspaceDir,
      flushIntervalMs: 1000,
      staleMultiplier: 3,
    });

    const app = createServer({ workspaceDir, port: 0, host: '127.0.0.1', coordinator });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    rmSync(root, { recursive: true, force: true });
  });

  async function get(path: string): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}${path}`);
    return { status: response.status, body: await response.json() };
  }

  it('should answer health checks', async () => {
    const { status, body } = await get('/api/health');
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });

  it('should list issues', async () => {
    const { status, body } = await get('/api/issues?status=open');
    expect(status).toBe(200);
    expect(body).toMatchObject([
      { id: 1, title: 'Ship API', priority: 'critical' },
      { id: 2, title: 'Write docs', priority: 'high' },
    ]);
  });

  it('should serve the ready, blocked and next views', async () => {
    expect((await get('/api/issues/ready')).body).toMatchObject([{ id: 1 }]);
    expect((await get('/api/issues/blocked')).body).toMatchObject([{ issue: { id: 2 }, blockers: [{ id: 1 }] }]);
    expect((await get('/api/issues/next')).body).toMatchObject({ issue: { id: 1 }, alternatives: [] });
  });

  it('should show issue detail', async () => {
    const { status, body } = await get('/api/issues/2');
    expect(status).toBe(200);
    expect(body).toMatchObject({ issue: { id: 2 }, blockers: [{ id: 1 }], comments: [], totalSeconds: 0 });
  });

  it('should map core errors to HTTP statuses', async () => {
    expect(await get('/api/issues/99')).toEqual({
      status: 404,
      body: { error: { code: 'NOT_FOUND', message: 'Issue #99 not found', retryable: false } },
    });
    expect((await get('/api/issues/abc')).status).toBe(400);
    expect((await get('/api/issues?status=pending')).status).toBe(400);
  });

  it('should summarize session, work and daemon state', async () => {
    const { body } = await get('/api/summary');
    expect(body).toMatchObject({
      session: { active: false },
      readyTotal: 1,
      blockedTotal: 1,
      openTotal: 2,
      daemon: { state: 'stopped', staleAfterMs: 3000 },
    });
    expect((await get('/api/daemon')).body).toEqual({ state: 'stopped', staleAfterMs: 3000 });
  });
});

describe('attachStore', () => {
  it('should close the store when the client aborts before a response', async () => {
    const root = mkdtempSync(join(tmpdir(), 'waypost-abort-'));
    const store = new Store(join(root, 'issues.db'));
    const close = vi.spyOn(store, 'close');

    let onRequest: () => void = () => {};
    const requested = new Promise<void>((resolve) => {
      onRequest = resolve;
    });

    const app = express();
    app.use(attachStore(() => store));
    app.get('/hang', () => {
      onRequest();
    });

    const server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }

    try {
      const controller = new AbortController();
      const pending = fetch(`http://127.0.0.1:${address.port}/hang`, { signal: controller.signal }).catch(
        () => 'aborted'
      );
      await requested;
      controller.abort();

      expect(await pending).toBe('aborted');
      await vi.waitFor(() => {
        expect(close).toHaveBeenCalledTimes(1);
      });
    } finally {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      rmSync(root, { recursive: true, force: true });
    }
  });
});
