import chalk from 'chalk';
import { ValidationError } from '../core/errors.js';
import { withContext, runCommand, parseId, printJson, type JsonOption } from './context.js';
import { printIssueTable } from './format.js';
import { logger } from '../utils/logger.js';

export async function archiveIssue(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issue = graph.archive(parseId(id));
      if (options.json) {
        printJson({ success: true, issue });
        return;
      }
      logger.issue(issue.id, 'archived', issue.title);
    })
  );
}

export async function unarchiveIssue(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issue = graph.unarchive(parseId(id));
      if (options.json) {
        printJson({ success: true, issue });
        return;
      }
      logger.issue(issue.id, issue.status, issue.title);
    })
  );
}

export async function archiveOlder(days: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const parsed = Number(days);
      if (!Number.isFinite(parsed)) {
        throw new ValidationError('days', 'number', `Invalid number of days "${days}"`);
      }
      const count = graph.archiveOlderThan(parsed);
      if (options.json) {
        printJson({ success: true, archived: count });
        return;
      }
      console.log(
        count > 0
          ? chalk.green(`Archived ${count} issue(s) closed more than ${parsed} day(s) ago`)
          : chalk.dim('Nothing to archive.')
      );
    })
  );
}

export async function listArchived(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const archived = graph.list({ status: 'closed', includeArchived: true }).filter((issue) => issue.archived);
      if (options.json) {
        printJson(archived);
        return;
      }
      if (archived.length === 0) {
        console.log(chalk.dim('No archived issues.'));
        return;
      }
      printIssueTable(archived);
    })
  );
}
