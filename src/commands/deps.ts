import chalk from 'chalk';
import { withContext, runCommand, parseId, printJson, type JsonOption } from './context.js';
import { parseStatusFilter } from './issue.js';
import { issueLine, renderTree, formatProgress } from './format.js';

export async function blockIssue(id: string, blocker: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issueId = parseId(id);
      const blockerId = parseId(blocker, 'blocker');
      const added = graph.block(issueId, blockerId);
      if (options.json) {
        printJson({ success: true, added });
        return;
      }
      console.log(
        added
          ? chalk.green(`#${issueId} is now blocked by #${blockerId}`)
          : chalk.dim(`#${issueId} was already blocked by #${blockerId}`)
      );
    })
  );
}

export async function unblockIssue(id: string, blocker: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const issueId = parseId(id);
      const blockerId = parseId(blocker, 'blocker');
      const removed = graph.unblock(issueId, blockerId);
      if (options.json) {
        printJson({ success: true, removed });
        return;
      }
      console.log(
        removed
          ? chalk.green(`#${issueId} is no longer blocked by #${blockerId}`)
          : chalk.dim(`#${issueId} was not blocked by #${blockerId}`)
      );
    })
  );
}

export async function showBlocked(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const blocked = graph.blocked();
      if (options.json) {
        printJson(blocked);
        return;
      }
      if (blocked.length === 0) {
        console.log(chalk.dim('No blocked issues.'));
        return;
      }
      for (const { issue, blockers } of blocked) {
        console.log(issueLine(issue));
        for (const blocker of blockers) {
          console.log(`  ${chalk.red('blocked by')} ${issueLine(blocker)}`);
        }
      }
    })
  );
}

export async function showReady(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const ready = graph.ready();
      if (options.json) {
        printJson(ready);
        return;
      }
      if (ready.length === 0) {
        console.log(chalk.dim('No issues ready to work on.'));
        return;
      }
      console.log(chalk.bold('Ready issues:'));
      for (const issue of ready) {
        console.log(`  ${issueLine(issue)}`);
      }
    })
  );
}

export async function showNext(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const next = graph.next();
      if (options.json) {
        printJson(next);
        return;
      }
      if (!next) {
        console.log(chalk.dim('No issues ready to work on.'));
        console.log(chalk.dim('Use "waypost list" to see all issues or "waypost blocked" to see blocked issues.'));
        return;
      }

      console.log(`Next: ${issueLine(next.issue)}`);
      if (next.progress) {
        console.log(chalk.dim(`       Progress: ${formatProgress(next.progress)} subissues complete`));
      }
      console.log(chalk.dim(`\nRun: waypost session work ${next.issue.id}`));

      if (next.alternatives.length > 0) {
        console.log('\nAlso ready:');
        for (const alternative of next.alternatives) {
          console.log(`  ${issueLine(alternative)}`);
        }
      }
    })
  );
}

export interface TreeOptions extends JsonOption {
  status?: string;
}

export async function showTree(options: TreeOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ graph }) => {
      const tree = graph.tree({ status: parseStatusFilter(options.status) });
      if (options.json) {
        printJson(tree);
        return;
      }
      if (tree.length === 0) {
        console.log(chalk.dim('No issues found.'));
        return;
      }
      for (const line of renderTree(tree)) {
        console.log(line);
      }
      console.log(chalk.dim('\nLegend: [ ] open, [x] closed'));
    })
  );
}
