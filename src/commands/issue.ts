import chalk from 'chalk';
import { ValidationError } from '../core/errors.js';
import { withContext, runCommand, parseId, printJson, type JsonOption } from './context.js';
import { formatStatus, formatPriority, formatDuration, printIssueTable, issueLine } from './format.js';
import type { Issue, StatusFilter } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface CreateOptions extends JsonOption {
  description?: string;
  priority?: string;
  parent?: string;
}

export interface ListOptions extends JsonOption {
  status?: string;
  label?: string;
  priority?: string;
  archived?: boolean;
}

export interface UpdateOptions extends JsonOption {
  title?: string;
  description?: string;
  priority?: string;
}

export interface DeleteCommandOptions extends JsonOption {
  cascade?: boolean;
}

export function parseStatusFilter(value: string | undefined): StatusFilter {
  switch (value) {
    case undefined:
    case 'all':
      return 'all';
    case 'open':
    case 'closed':
      return value;
    default:
      throw new ValidationError('status', 'open, closed or all', `Unknown status "${value}"; use open, closed or all`);
  }
}

function printCreated(issue: Issue): void {
  console.log(chalk.green('Created issue:'));
  console.log(`  ID: ${chalk.cyan(`#${issue.id}`)}`);
  console.log(`  Title: ${issue.title}`);
  console.log(`  Priority: ${formatPriority(issue.priority)}`);
  if (issue.parentId !== undefined) {
    console.log(`  Parent: ${chalk.dim(`#${issue.parentId}`)}`);
  }
}

export async function createIssue(title: string, options: CreateOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issue = graph.create({
        title,
        description: options.description,
        priority: options.priority,
        parentId: options.parent !== undefined ? parseId(options.parent, 'parent') : undefined,
      });

      if (options.json) {
        printJson({ success: true, issue });
        return;
      }
      printCreated(issue);
    })
  );
}

export async function createSubissue(parent: string, title: string, options: CreateOptions): Promise<void> {
  await createIssue(title, { ...options, parent });
}

export async function listIssues(options: ListOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issues = graph.list({
        status: parseStatusFilter(options.status),
        label: options.label,
        priority: options.priority,
        includeArchived: options.archived,
      });

      if (options.json) {
        printJson(issues);
        return;
      }
      if (issues.length === 0) {
        console.log(chalk.dim('No issues found.'));
        return;
      }
      printIssueTable(issues);
    })
  );
}

export async function showIssue(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const detail = graph.show(parseId(id));

      if (options.json) {
        printJson(detail);
        return;
      }

      const { issue } = detail;
      console.log(`\n${chalk.bold(`#${issue.id}`)} ${chalk.bold(issue.title)}`);
      console.log(`  Status:   ${formatStatus(issue.status, issue.archived)}`);
      console.log(`  Priority: ${formatPriority(issue.priority)}`);
      if (issue.parentId !== undefined) console.log(`  Parent:   #${issue.parentId}`);
      if (issue.labels.length > 0) console.log(`  Labels:   ${chalk.cyan(issue.labels.join(', '))}`);
      console.log(`  Created:  ${chalk.dim(issue.createdAt.toLocaleString())}`);
      if (issue.closedAt) console.log(`  Closed:   ${chalk.dim(issue.closedAt.toLocaleString())}`);
      if (detail.milestoneIds.length > 0) {
        console.log(`  Milestones: ${detail.milestoneIds.map((m) => `#${m}`).join(', ')}`);
      }
      if (detail.totalSeconds > 0) console.log(`  Time:     ${formatDuration(detail.totalSeconds)}`);

      if (issue.description) {
        console.log(`\n${issue.description}`);
      }

      if (detail.blockers.length > 0) {
        console.log(chalk.bold('\nBlocked by:'));
        for (const blocker of detail.blockers) console.log(`  ${issueLine(blocker)} ${formatStatus(blocker.status)}`);
      }
      if (detail.blocking.length > 0) {
        console.log(chalk.bold('\nBlocking:'));
        for (const blocked of detail.blocking) console.log(`  ${issueLine(blocked)}`);
      }
      if (detail.children.length > 0) {
        console.log(chalk.bold('\nSubissues:'));
        for (const child of detail.children) console.log(`  ${issueLine(child)} ${formatStatus(child.status)}`);
      }
      if (detail.comments.length > 0) {
        console.log(chalk.bold(`\nComments (${detail.comments.length}):`));
        for (const comment of detail.comments) {
          console.log(`  ${chalk.dim(comment.createdAt.toLocaleString())}`);
          console.log(`  ${comment.content.split('\n').join('\n  ')}`);
        }
      }
      console.log('');
    })
  );
}

export async function updateIssue(id: string, options: UpdateOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issue = graph.update(parseId(id), {
        title: options.title,
        description: options.description,
        priority: options.priority,
      });

      if (options.json) {
        printJson({ success: true, issue });
        return;
      }
      console.log(chalk.green(`Updated #${issue.id}`));
    })
  );
}

export async function closeIssue(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const result = graph.close(parseId(id));
      if (options.json) {
        printJson(result);
        return;
      }
      if (result.changed) {
        logger.issue(result.issue.id, 'closed', result.issue.title);
      } else {
        console.log(chalk.dim(`#${result.issue.id} is already closed`));
      }
    })
  );
}

export async function reopenIssue(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const result = graph.reopen(parseId(id));
      if (options.json) {
        printJson(result);
        return;
      }
      if (result.changed) {
        logger.issue(result.issue.id, 'open', result.issue.title);
      } else {
        console.log(chalk.dim(`#${result.issue.id} is already open`));
      }
    })
  );
}

export async function deleteIssue(id: string, options: DeleteCommandOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const deleted = graph.delete(parseId(id), { cascade: options.cascade });
      if (options.json) {
        printJson({ success: true, deleted });
        return;
      }
      logger.success(`Deleted ${deleted.map((d) => `#${d}`).join(', ')}`);
    })
  );
}

export async function addComment(id: string, text: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const comment = graph.addComment(parseId(id), text);
      if (options.json) {
        printJson({ success: true, comment });
        return;
      }
      console.log(chalk.green(`Added comment to #${comment.issueId}`));
    })
  );
}

export async function addLabel(id: string, label: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issueId = parseId(id);
      const added = graph.addLabel(issueId, label);
      if (options.json) {
        printJson({ success: true, added });
        return;
      }
      console.log(added ? chalk.green(`Labelled #${issueId} ${label}`) : chalk.dim(`#${issueId} already has ${label}`));
    })
  );
}

export async function removeLabel(id: string, label: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issueId = parseId(id);
      const removed = graph.removeLabel(issueId, label);
      if (options.json) {
        printJson({ success: true, removed });
        return;
      }
      console.log(removed ? chalk.green(`Removed ${label} from #${issueId}`) : chalk.dim(`#${issueId} has no ${label}`));
    })
  );
}

export async function moveIssue(id: string, parent: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const parentId = parent === 'none' || parent === 'root' ? null : parseId(parent, 'parent');
      const issue = graph.move(parseId(id), parentId);
      if (options.json) {
        printJson({ success: true, issue });
        return;
      }
      console.log(
        chalk.green(parentId === null ? `Moved #${issue.id} to the top level` : `Moved #${issue.id} under #${parentId}`)
      );
    })
  );
}
