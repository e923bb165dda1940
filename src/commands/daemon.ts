import chalk from 'chalk';
import ora from 'ora';
import { createCoordinator, runDaemon } from '../daemon/index.js';
import { requireWorkspaceDir } from '../utils/workspace.js';
import { ValidationError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { runCommand, printJson, parseId, type JsonOption } from './context.js';
import { formatDuration } from './format.js';

export interface DaemonStartOptions extends JsonOption {
  hostPid?: string;
  detachHost?: boolean;
}

export interface DaemonRunOptions {
  token?: string;
  hostPid?: string;
}

export async function startDaemon(options: DaemonStartOptions): Promise<void> {
  await runCommand(options, () => {
    const coordinator = createCoordinator(requireWorkspaceDir());
    // By default the daemon lives as long as the shell that launched the CLI
    const hostPid = options.detachHost
      ? undefined
      : options.hostPid !== undefined
        ? parseId(options.hostPid, 'host pid')
        : process.ppid;

    if (options.json) {
      printJson({ success: true, ...coordinator.start(hostPid) });
      return;
    }

    const spinner = ora('Starting daemon...').start();
    try {
      const result = coordinator.start(hostPid);
      spinner.succeed(`Daemon started (PID: ${result.pid})${result.reclaimed ? chalk.dim(' after reclaiming a stale heartbeat') : ''}`);
    } catch (error) {
      spinner.fail('Failed to start daemon');
      throw error;
    }
  });
}

export async function stopDaemon(options: JsonOption): Promise<void> {
  await runCommand(options, () => {
    const coordinator = createCoordinator(requireWorkspaceDir());

    if (options.json) {
      printJson({ success: true, ...coordinator.stop() });
      return;
    }

    const spinner = ora('Stopping daemon...').start();
    try {
      const result = coordinator.stop();
      spinner.succeed(
        result.signalled ? `Daemon stopped (PID: ${result.pid})` : `Removed heartbeat of exited daemon (PID: ${result.pid})`
      );
    } catch (error) {
      spinner.fail('Failed to stop daemon');
      throw error;
    }
  });
}

export async function daemonStatus(options: JsonOption): Promise<void> {
  await runCommand(options, () => {
    const status = createCoordinator(requireWorkspaceDir()).status();

    if (options.json) {
      printJson(status);
      return;
    }

    const color = { running: chalk.green, stale: chalk.yellow, stopped: chalk.dim }[status.state];
    console.log(`Daemon: ${color(status.state)}`);
    if (status.record) {
      console.log(chalk.dim(`  PID: ${status.record.pid}`));
      console.log(chalk.dim(`  Started: ${new Date(status.record.startedAt).toLocaleString()}`));
    }
    if (status.ageMs !== undefined) {
      console.log(chalk.dim(`  Last heartbeat: ${formatDuration(status.ageMs / 1000)} ago`));
    }
    if (status.reason) {
      console.log(chalk.dim(`  ${status.reason}`));
    }
  });
}

/**
 * Foreground body of the spawned daemon process.
 */
export async function runDaemonProcess(options: DaemonRunOptions): Promise<void> {
  await runCommand({}, async () => {
    if (!options.token) {
      throw new ValidationError('token', 'required', 'daemon run needs --token; use "waypost daemon start"');
    }
    const reason = await runDaemon(requireWorkspaceDir(), {
      token: options.token,
      hostPid: options.hostPid !== undefined ? parseId(options.hostPid, 'host pid') : undefined,
    });
    logger.info('Daemon exited', { reason });
  });
}
