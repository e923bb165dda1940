import { startServer } from '../server/index.js';
import { requireWorkspaceDir } from '../utils/workspace.js';
import { loadConfig } from '../utils/config.js';
import { runCommand } from './context.js';

export interface ServeOptions {
  port?: string;
  host?: string;
}

export async function serve(options: ServeOptions): Promise<void> {
  await runCommand({}, async () => {
    const workspaceDir = requireWorkspaceDir();
    const config = loadConfig(workspaceDir);
    const port = options.port !== undefined ? Number(options.port) : config.server.port;
    const host = options.host ?? config.server.host;

    console.log('Starting waypost server...\n');

    const server = await startServer({ workspaceDir, port, host });

    const shutdown = (): void => {
      console.log('\nShutting down...');
      server.close();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
