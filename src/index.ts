#!/usr/bin/env node

import { Command } from 'commander';
import {
  createIssue,
  createSubissue,
  listIssues,
  showIssue,
  updateIssue,
  closeIssue,
  reopenIssue,
  deleteIssue,
  addComment,
  addLabel,
  removeLabel,
  moveIssue,
} from './commands/issue.js';
import { blockIssue, unblockIssue, showBlocked, showReady, showNext, showTree } from './commands/deps.js';
import { archiveIssue, unarchiveIssue, archiveOlder, listArchived } from './commands/archive.js';
import {
  createMilestone,
  listMilestones,
  showMilestone,
  addToMilestone,
  removeFromMilestone,
  closeMilestone,
  deleteMilestone,
} from './commands/milestone.js';
import {
  startSession,
  endSession,
  sessionStatus,
  workOn,
  sessionHistory,
  startTimer,
  stopTimer,
  timerStatus,
  showTime,
} from './commands/session.js';
import { startDaemon, stopDaemon, daemonStatus, runDaemonProcess } from './commands/daemon.js';
import { initProject, recoverProject, showContext } from './commands/project.js';
import { serve } from './commands/serve.js';
import { reportError } from './commands/context.js';

const program = new Command();

program
  .name('waypost')
  .description('Local issue tracker that keeps an AI coding agent oriented across sessions')
  .version('0.1.0');

program
  .command('init')
  .description('Create a .waypost workspace in the current directory')
  .option('--json', 'Output in JSON format')
  .action(initProject);

// ============ Issues ============

program
  .command('create <title>')
  .description('Create an issue')
  .option('-d, --description <text>', 'Issue description')
  .option('-p, --priority <priority>', 'low, medium, high or critical', 'medium')
  .option('--parent <id>', 'Parent issue')
  .option('--json', 'Output in JSON format')
  .action(createIssue);

program
  .command('subissue <parent> <title>')
  .description('Create a subissue under a parent issue')
  .option('-d, --description <text>', 'Issue description')
  .option('-p, --priority <priority>', 'low, medium, high or critical', 'medium')
  .option('--json', 'Output in JSON format')
  .action(createSubissue);

program
  .command('list')
  .description('List issues')
  .option('-s, --status <status>', 'open, closed or all', 'all')
  .option('-l, --label <label>', 'Only issues with this label')
  .option('-p, --priority <priority>', 'Only issues with this priority')
  .option('--archived', 'Include archived issues')
  .option('--json', 'Output in JSON format')
  .action(listIssues);

program
  .command('show <id>')
  .description('Show issue details')
  .option('--json', 'Output in JSON format')
  .action(showIssue);

program
  .command('update <id>')
  .description('Update an issue')
  .option('-t, --title <title>', 'New title')
  .option('-d, --description <text>', 'New description')
  .option('-p, --priority <priority>', 'New priority')
  .option('--json', 'Output in JSON format')
  .action(updateIssue);

program
  .command('close <id>')
  .description('Close an issue')
  .option('--json', 'Output in JSON format')
  .action(closeIssue);

program
  .command('reopen <id>')
  .description('Reopen a closed issue')
  .option('--json', 'Output in JSON format')
  .action(reopenIssue);

program
  .command('delete <id>')
  .description('Delete an issue')
  .option('--cascade', 'Also delete all subissues')
  .option('--json', 'Output in JSON format')
  .action(deleteIssue);

program
  .command('comment <id> <text>')
  .description('Add a comment to an issue')
  .option('--json', 'Output in JSON format')
  .action(addComment);

program
  .command('label <id> <label>')
  .description('Add a label to an issue')
  .option('--json', 'Output in JSON format')
  .action(addLabel);

program
  .command('unlabel <id> <label>')
  .description('Remove a label from an issue')
  .option('--json', 'Output in JSON format')
  .action(removeLabel);

program
  .command('move <id> <parent>')
  .description('Move an issue under another ("none" for top level)')
  .option('--json', 'Output in JSON format')
  .action(moveIssue);

// ============ Dependencies & Views ============

program
  .command('block <id> <blocker>')
  .description('Mark an issue as blocked by another')
  .option('--json', 'Output in JSON format')
  .action(blockIssue);

program
  .command('unblock <id> <blocker>')
  .description('Remove a blocking relation')
  .option('--json', 'Output in JSON format')
  .action(unblockIssue);

program
  .command('blocked')
  .description('List blocked issues with their open blockers')
  .option('--json', 'Output in JSON format')
  .action(showBlocked);

program
  .command('ready')
  .description('List issues ready to work on')
  .option('--json', 'Output in JSON format')
  .action(showReady);

program
  .command('next')
  .description('Recommend the next issue to work on')
  .option('--json', 'Output in JSON format')
  .action(showNext);

program
  .command('tree')
  .description('Show the issue hierarchy')
  .option('-s, --status <status>', 'open, closed or all', 'all')
  .option('--json', 'Output in JSON format')
  .action(showTree);

// ============ Archive ============

const archive = program.command('archive').description('Archive closed issues');

archive
  .command('add <id>')
  .description('Archive a closed issue')
  .option('--json', 'Output in JSON format')
  .action(archiveIssue);

archive
  .command('remove <id>')
  .description('Unarchive an issue')
  .option('--json', 'Output in JSON format')
  .action(unarchiveIssue);

archive
  .command('older <days>')
  .description('Archive issues closed more than <days> days ago')
  .option('--json', 'Output in JSON format')
  .action(archiveOlder);

archive
  .command('list')
  .description('List archived issues')
  .option('--json', 'Output in JSON format')
  .action(listArchived);

// ============ Milestones ============

const milestone = program.command('milestone').description('Group issues into milestones');

milestone
  .command('create <name>')
  .description('Create a milestone')
  .option('-d, --description <text>', 'Milestone description')
  .option('--json', 'Output in JSON format')
  .action(createMilestone);

milestone
  .command('list')
  .description('List milestones with progress')
  .option('-s, --status <status>', 'open, closed or all', 'all')
  .option('--json', 'Output in JSON format')
  .action(listMilestones);

milestone
  .command('show <id>')
  .description('Show a milestone and its issues')
  .option('--json', 'Output in JSON format')
  .action(showMilestone);

milestone
  .command('add <id> <issues...>')
  .description('Add issues to a milestone')
  .option('--json', 'Output in JSON format')
  .action(addToMilestone);

milestone
  .command('remove <id> <issue>')
  .description('Remove an issue from a milestone')
  .option('--json', 'Output in JSON format')
  .action(removeFromMilestone);

milestone
  .command('close <id>')
  .description('Close a milestone')
  .option('--json', 'Output in JSON format')
  .action(closeMilestone);

milestone
  .command('delete <id>')
  .description('Delete a milestone')
  .option('--json', 'Output in JSON format')
  .action(deleteMilestone);

// ============ Sessions & Timer ============

const session = program.command('session').description('Track work sessions and handoff notes');

session
  .command('start')
  .description('Start a session and show the previous handoff')
  .option('--json', 'Output in JSON format')
  .action(startSession);

session
  .command('end')
  .description('End the active session')
  .option('-n, --notes <notes>', 'Handoff notes for the next session')
  .option('--json', 'Output in JSON format')
  .action(endSession);

session
  .command('status')
  .description('Show the active session')
  .option('--json', 'Output in JSON format')
  .action(sessionStatus);

session
  .command('work <id>')
  .description('Set the issue the session is working on')
  .option('--json', 'Output in JSON format')
  .action(workOn);

session
  .command('history')
  .description('List recent sessions')
  .option('-n, --limit <count>', 'How many sessions to show')
  .option('--json', 'Output in JSON format')
  .action(sessionHistory);

const timer = program.command('timer').description('Track time spent on issues');

timer
  .command('start <id>')
  .description('Start the timer on an issue')
  .option('--json', 'Output in JSON format')
  .action(startTimer);

timer
  .command('stop')
  .description('Stop the running timer')
  .option('--json', 'Output in JSON format')
  .action(stopTimer);

timer
  .command('status')
  .description('Show the running timer')
  .option('--json', 'Output in JSON format')
  .action(timerStatus);

timer
  .command('total <id>')
  .description('Show total time recorded on an issue')
  .option('--json', 'Output in JSON format')
  .action(showTime);

// ============ Daemon ============

const daemon = program.command('daemon').description('Background flush and heartbeat process');

daemon
  .command('start')
  .description('Start the background daemon')
  .option('--host-pid <pid>', 'Stop when this process exits (default: the calling shell)')
  .option('--detach-host', 'Keep running after the calling shell exits')
  .option('--json', 'Output in JSON format')
  .action(startDaemon);

daemon
  .command('stop')
  .description('Stop the background daemon')
  .option('--json', 'Output in JSON format')
  .action(stopDaemon);

daemon
  .command('status')
  .description('Show whether the daemon is running')
  .option('--json', 'Output in JSON format')
  .action(daemonStatus);

daemon
  .command('run', { hidden: true })
  .description('Run the daemon loop in the foreground')
  .option('--token <token>', 'Ownership token written by daemon start')
  .option('--host-pid <pid>', 'Stop when this process exits')
  .action(runDaemonProcess);

// ============ Tooling ============

program
  .command('context')
  .description('Summarize session, ready and blocked work')
  .option('--json', 'Output in JSON format')
  .action(showContext);

program
  .command('serve')
  .description('Serve read-only JSON views over HTTP')
  .option('--port <port>', 'Port to listen on')
  .option('--host <host>', 'Host to bind')
  .action(serve);

program
  .command('recover')
  .description('Repair a damaged store, salvaging what can be read')
  .option('--json', 'Output in JSON format')
  .action(recoverProject);

program.parseAsync().catch((error: unknown) => reportError(error));
