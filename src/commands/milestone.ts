import chalk from 'chalk';
import { withContext, runCommand, parseId, printJson, type JsonOption } from './context.js';
import { issueLine, formatStatus, formatProgress } from './format.js';
import { ValidationError } from '../core/errors.js';
import type { MilestoneStatus } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface MilestoneCreateOptions extends JsonOption {
  description?: string;
}

export interface MilestoneListOptions extends JsonOption {
  status?: string;
}

function parseMilestoneStatus(value: string | undefined): MilestoneStatus | undefined {
  switch (value) {
    case undefined:
    case 'all':
      return undefined;
    case 'open':
    case 'closed':
      return value;
    default:
      throw new ValidationError('status', 'open, closed or all', `Unknown status "${value}"; use open, closed or all`);
  }
}

export async function createMilestone(name: string, options: MilestoneCreateOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const milestone = milestones.create(name, options.description);
      if (options.json) {
        printJson({ success: true, milestone });
        return;
      }
      logger.success(`Created milestone #${milestone.id}: ${milestone.name}`);
    })
  );
}

export async function listMilestones(options: MilestoneListOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const list = milestones.list(parseMilestoneStatus(options.status)).map((m) => milestones.get(m.id));
      if (options.json) {
        printJson(list);
        return;
      }
      if (list.length === 0) {
        console.log(chalk.dim('No milestones.'));
        return;
      }
      for (const milestone of list) {
        console.log(
          `#${milestone.id} ${milestone.name} ${formatStatus(milestone.status)} ${chalk.dim(formatProgress(milestone.progress))}`
        );
      }
    })
  );
}

export async function showMilestone(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const milestone = milestones.get(parseId(id, 'milestone'));
      if (options.json) {
        printJson(milestone);
        return;
      }
      console.log(`\n${chalk.bold(`Milestone #${milestone.id}`)} ${chalk.bold(milestone.name)} ${formatStatus(milestone.status)}`);
      if (milestone.description) console.log(milestone.description);
      console.log(chalk.dim(`Progress: ${milestone.progress.closed}/${milestone.progress.total} closed`));
      for (const issue of milestone.issues) {
        console.log(`  ${issueLine(issue)} ${formatStatus(issue.status)}`);
      }
    })
  );
}

export async function addToMilestone(id: string, issues: string[], options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const milestoneId = parseId(id, 'milestone');
      const added = milestones.add(
        milestoneId,
        issues.map((issue) => parseId(issue))
      );
      if (options.json) {
        printJson({ success: true, added });
        return;
      }
      console.log(chalk.green(`Added ${added.length} issue(s) to milestone #${milestoneId}`));
    })
  );
}

export async function removeFromMilestone(id: string, issue: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const milestoneId = parseId(id, 'milestone');
      const issueId = parseId(issue);
      const removed = milestones.remove(milestoneId, issueId);
      if (options.json) {
        printJson({ success: true, removed });
        return;
      }
      console.log(
        removed
          ? chalk.green(`Removed #${issueId} from milestone #${milestoneId}`)
          : chalk.dim(`#${issueId} is not in milestone #${milestoneId}`)
      );
    })
  );
}

export async function closeMilestone(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const milestone = milestones.close(parseId(id, 'milestone'));
      if (options.json) {
        printJson({ success: true, milestone });
        return;
      }
      logger.success(`Closed milestone #${milestone.id}`);
    })
  );
}

export async function deleteMilestone(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ milestones }) => {
      const milestoneId = parseId(id, 'milestone');
      milestones.delete(milestoneId);
      if (options.json) {
        printJson({ success: true, deleted: milestoneId });
        return;
      }
      logger.success(`Deleted milestone #${milestoneId}`);
    })
  );
}
