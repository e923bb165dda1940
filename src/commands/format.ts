import chalk from 'chalk';
import type { Issue, IssueStatus, Priority, TreeNode, SubissueProgress } from '../types/index.js';

export function padRight(str: string, len: number): string {
  // Strip ANSI codes for length calculation
  const plainStr = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - plainStr.length);
  return str + ' '.repeat(padding);
}

export function truncate(str: string, len: number): string {
  if (str.length <= len) return str;
  return str.slice(0, len - 1) + '…';
}

export function formatStatus(status: IssueStatus, archived: boolean = false): string {
  if (archived) return chalk.gray('archived');
  return status === 'open' ? chalk.green(status) : chalk.dim(status);
}

export function formatPriority(priority: Priority): string {
  const indicators: Record<Priority, string> = {
    low: chalk.dim('○○○'),
    medium: chalk.yellow('●○○'),
    high: chalk.yellow('●●○'),
    critical: chalk.red('●●●'),
  };
  return indicators[priority] + ' ' + priority;
}

/**
 * 3725 -> "1h 2m 5s"; zero units are left out except a lone "0s".
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;

  const parts: string[] = [];
  if (h > 0) parts.push(`${h}h`);
  if (m > 0) parts.push(`${m}m`);
  if (s > 0 || parts.length === 0) parts.push(`${s}s`);
  return parts.join(' ');
}

export function formatProgress(progress: SubissueProgress | undefined): string {
  return progress ? `${progress.closed}/${progress.total}` : '';
}

export function issueLine(issue: Issue): string {
  const labels = issue.labels.length > 0 ? ' ' + chalk.cyan(issue.labels.map((l) => `[${l}]`).join('')) : '';
  return `${chalk.dim('#')}${issue.id} ${chalk.dim(`[${issue.priority}]`)} ${issue.title}${labels}`;
}

/**
 * Indented lines for a forest, "[ ]" for open and "[x]" for closed.
 */
export function renderTree(nodes: readonly TreeNode[], depth: number = 0): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    const icon = node.issue.status === 'closed' ? 'x' : ' ';
    lines.push(`${'  '.repeat(depth)}[${icon}] #${node.issue.id} ${node.issue.priority} - ${node.issue.title}`);
    lines.push(...renderTree(node.children, depth + 1));
  }
  return lines;
}

export function printIssueTable(issues: readonly Issue[]): void {
  console.log(
    chalk.bold(padRight('ID', 7) + padRight('Title', 42) + padRight('Status', 10) + padRight('Priority', 14) + 'Parent')
  );
  console.log(chalk.dim('─'.repeat(80)));

  for (const issue of issues) {
    console.log(
      chalk.dim(padRight(`#${issue.id}`, 7)) +
        padRight(truncate(issue.title, 40), 42) +
        padRight(formatStatus(issue.status, issue.archived), 10) +
        padRight(formatPriority(issue.priority), 14) +
        chalk.dim(issue.parentId !== undefined ? `#${issue.parentId}` : '-')
    );
  }

  console.log(chalk.dim(`\n${issues.length} issue(s)`));
}
