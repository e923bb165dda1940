import express, { Express, Request, RequestHandler, Response, NextFunction } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { issuesRouter } from './routes/issues.js';
import { Store } from '../core/store.js';
import { IssueGraph } from '../core/issue-graph.js';
import { SessionManager } from '../core/session-manager.js';
import { buildContextSummary } from '../core/summary.js';
import { isWaypostError, type WaypostError } from '../core/errors.js';
import { createCoordinator, type DaemonCoordinator } from '../daemon/index.js';
import { loadConfig, getDbPath } from '../utils/config.js';
import { logger } from '../utils/logger.js';

export interface ServerOptions {
  workspaceDir: string;
  port: number;
  host: string;
  coordinator?: DaemonCoordinator;
}

// Extend Express Request to include store
declare global {
  namespace Express {
    interface Request {
      store: Store;
    }
  }
}

function statusFor(error: WaypostError): number {
  switch (error.code) {
    case 'VALIDATION':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'BUSY':
      return 503;
    default:
      return 500;
  }
}

/**
 * Open a store for each request, closed on 'close', which fires after a
 * normal response and after a client abort.
 */
export function attachStore(open: () => Store): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    req.store = open();
    res.once('close', () => {
      req.store.close();
    });
    next();
  };
}

/**
 * Read-only JSON views over the workspace store.
 */
export function createServer(options: ServerOptions): Express {
  const app = express();
  const config = loadConfig(options.workspaceDir);
  const coordinator = options.coordinator ?? createCoordinator(options.workspaceDir);

  // Middleware
  app.use(cors());

  app.use(attachStore(() => new Store(getDbPath(options.workspaceDir), config.store)));

  app.use('/api/issues', issuesRouter);

  app.get('/api/summary', (req: Request, res: Response) => {
    res.json(
      buildContextSummary({
        graph: new IssueGraph(req.store, { titleMaxLength: config.issues.titleMaxLength }),
        sessions: new SessionManager(req.store),
        daemonStatus: () => coordinator.status(),
      })
    );
  });

  app.get('/api/session', (req: Request, res: Response) => {
    res.json(new SessionManager(req.store).status());
  });

  app.get('/api/daemon', (_req: Request, res: Response) => {
    res.json(coordinator.status());
  });

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isWaypostError(err)) {
      res.status(statusFor(err)).json({ error: err.toJSON() });
      return;
    }
    logger.error('Server error', { error: err.message });
    res.status(500).json({ error: { message: err.message } });
  });

  return app;
}

export async function startServer(options: ServerOptions): Promise<Server> {
  const app = createServer(options);

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => {
      console.log(`Server running at http://${options.host}:${options.port}`);
      console.log('');
      console.log('API Endpoints:');
      console.log('  GET    /api/summary             Context summary');
      console.log('  GET    /api/session             Session status');
      console.log('  GET    /api/daemon              Daemon status');
      console.log('  GET    /api/issues              List issues (?status=&label=&priority=)');
      console.log('  GET    /api/issues/ready        Ready issues');
      console.log('  GET    /api/issues/blocked      Blocked issues');
      console.log('  GET    /api/issues/tree         Issue tree');
      console.log('  GET    /api/issues/next         Recommended next issue');
      console.log('  GET    /api/issues/:id          Issue detail');
      console.log('');
      resolve(server);
    });
    server.on('error', reject);
  });
}
