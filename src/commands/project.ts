import chalk from 'chalk';
import { Store } from '../core/store.js';
import { recoverStore } from '../core/recovery.js';
import { buildContextSummary } from '../core/summary.js';
import { createCoordinator } from '../daemon/index.js';
import { initWorkspace, requireWorkspaceDir } from '../utils/workspace.js';
import { getDbPath } from '../utils/config.js';
import { runCommand, withContext, printJson, type JsonOption } from './context.js';
import { issueLine } from './format.js';
import { logger } from '../utils/logger.js';

export async function initProject(options: JsonOption): Promise<void> {
  await runCommand(options, () => {
    const result = initWorkspace();
    // Opening the store creates the database and applies migrations
    new Store(getDbPath(result.dir)).close();

    if (options.json) {
      printJson({ success: true, ...result });
      return;
    }
    console.log(
      result.created
        ? chalk.green(`Initialized waypost in ${result.dir}`)
        : chalk.dim(`Already initialized: ${result.dir}`)
    );
  });
}

export async function recoverProject(options: JsonOption): Promise<void> {
  await runCommand(options, () => {
    const report = recoverStore(getDbPath(requireWorkspaceDir()));

    if (options.json) {
      printJson(report);
      return;
    }

    switch (report.action) {
      case 'healthy':
        console.log(chalk.green('Store is healthy; nothing to do.'));
        return;
      case 'reindexed':
        console.log(chalk.green('Rebuilt damaged indexes; no data was lost.'));
        return;
      case 'reinitialized':
        console.log(chalk.yellow(`Damaged store moved to ${report.quarantinedPath ?? '(unknown)'}`));
        for (const [table, count] of Object.entries(report.salvaged)) {
          console.log(chalk.dim(`  ${table}: ${count} row(s) salvaged`));
        }
        if (report.lostTables.length > 0) {
          console.log(chalk.red(`  Lost tables: ${report.lostTables.join(', ')}`));
        }
        if (report.dataLoss) {
          logger.failure('Some data could not be recovered.');
        } else {
          logger.success('All rows recovered.');
        }
    }
  });
}

/**
 * Compact overview for priming an agent's context.
 */
export async function showContext(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ dir, graph, sessions }) => {
      const coordinator = createCoordinator(dir);
      const summary = buildContextSummary({ graph, sessions, daemonStatus: () => coordinator.status() });

      if (options.json) {
        printJson(summary);
        return;
      }

      const { session } = summary;
      if (session.active && session.session) {
        console.log(chalk.bold(`Session #${session.session.id} active`));
        if (session.workingOn) console.log(`  Working on: ${issueLine(session.workingOn)}`);
      } else {
        console.log(chalk.dim('No active session. Use "waypost session start" to begin.'));
        if (session.handoff?.notes) console.log(`  Last handoff: ${session.handoff.notes}`);
      }

      console.log(chalk.bold(`\nReady (${summary.readyTotal}):`));
      for (const issue of summary.ready) console.log(`  ${issueLine(issue)}`);
      console.log(chalk.bold(`\nBlocked (${summary.blockedTotal}):`));
      for (const { issue, blockers } of summary.blocked) {
        console.log(`  ${issueLine(issue)} ${chalk.dim(`blocked by ${blockers.map((b) => `#${b.id}`).join(', ')}`)}`);
      }
      if (summary.daemon) console.log(chalk.dim(`\nDaemon: ${summary.daemon.state}`));
    })
  );
}
