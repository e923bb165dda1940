import chalk from 'chalk';
import { withContext, runCommand, parseId, printJson, type JsonOption } from './context.js';
import { issueLine, formatDuration } from './format.js';
import { logger } from '../utils/logger.js';
import type { Handoff } from '../types/index.js';

export interface SessionEndOptions extends JsonOption {
  notes?: string;
}

export interface SessionHistoryOptions extends JsonOption {
  limit?: string;
}

function printHandoff(handoff: Handoff): void {
  console.log(chalk.bold(`\nPrevious session #${handoff.sessionId} ended ${handoff.endedAt.toLocaleString()}`));
  if (handoff.workingOnId !== undefined) {
    console.log(`  Was working on #${handoff.workingOnId}`);
  }
  if (handoff.notes) {
    console.log(`  Handoff notes:\n    ${handoff.notes.split('\n').join('\n    ')}`);
  }
}

export async function startSession(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const result = sessions.start();
      if (options.json) {
        printJson(result);
        return;
      }
      logger.session('Session started', result.session.id);
      if (result.handoff) {
        printHandoff(result.handoff);
      }
    })
  );
}

export async function endSession(options: SessionEndOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const session = sessions.end(options.notes);
      if (options.json) {
        printJson(session);
        return;
      }
      logger.session('Session ended', session.id, options.notes ? chalk.dim('(handoff notes saved)') : undefined);
    })
  );
}

export async function sessionStatus(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const status = sessions.status();
      if (options.json) {
        printJson(status);
        return;
      }

      if (!status.active || !status.session) {
        console.log(chalk.dim('No active session. Use "waypost session start" to begin.'));
        if (status.handoff) {
          printHandoff(status.handoff);
        }
        return;
      }

      const { session } = status;
      console.log(`${chalk.bold(`Session #${session.id}`)} ${chalk.dim(`started ${session.startedAt.toLocaleString()}`)}`);
      console.log(status.workingOn ? `  Working on: ${issueLine(status.workingOn)}` : chalk.dim('  Not working on an issue'));
      if (status.timer) {
        console.log(`  Timer: #${status.timer.issueId} ${chalk.cyan(formatDuration(status.timer.elapsedSeconds))}`);
      }
      if (session.lastFlushedAt) {
        console.log(chalk.dim(`  Last flushed: ${session.lastFlushedAt.toLocaleString()}`));
      }
    })
  );
}

export async function workOn(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const session = sessions.work(parseId(id));
      if (options.json) {
        printJson(session);
        return;
      }
      logger.session(`Working on #${session.workingOnId ?? id}`, session.id);
    })
  );
}

export async function sessionHistory(options: SessionHistoryOptions): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const history = sessions.history(options.limit !== undefined ? parseId(options.limit, 'limit') : undefined);
      if (options.json) {
        printJson(history);
        return;
      }
      for (const session of history) {
        const state = session.endedAt ? chalk.dim(`ended ${session.endedAt.toLocaleString()}`) : chalk.green('active');
        const working = session.workingOnId !== undefined ? ` #${session.workingOnId}` : '';
        console.log(`#${session.id} ${session.startedAt.toLocaleString()} ${state}${working}`);
      }
    })
  );
}

export async function startTimer(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const result = sessions.startTimer(parseId(id));
      if (options.json) {
        printJson(result);
        return;
      }
      if (result.stopped) {
        console.log(
          chalk.dim(`Stopped timer on #${result.stopped.issueId} after ${formatDuration(result.stopped.durationSeconds)}`)
        );
      }
      console.log(chalk.green(`Timer running on #${result.timer.issueId}`));
    })
  );
}

export async function stopTimer(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const entry = sessions.stopTimer();
      if (options.json) {
        printJson({ stopped: entry });
        return;
      }
      console.log(
        entry
          ? chalk.green(`Stopped timer on #${entry.issueId} after ${formatDuration(entry.durationSeconds)}`)
          : chalk.dim('No timer running.')
      );
    })
  );
}

export async function timerStatus(options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const { timer } = sessions.status();
      if (options.json) {
        printJson({ timer: timer ?? null });
        return;
      }
      console.log(
        timer
          ? `Timer on #${timer.issueId}: ${chalk.cyan(formatDuration(timer.elapsedSeconds))}`
          : chalk.dim('No timer running.')
      );
    })
  );
}

export async function showTime(id: string, options: JsonOption): Promise<void> {
  await runCommand(options, () =>
    withContext(({ sessions }) => {
      const issueId = parseId(id);
      const totalSeconds = sessions.totalTime(issueId);
      if (options.json) {
        printJson({ issueId, totalSeconds });
        return;
      }
      console.log(`#${issueId}: ${formatDuration(totalSeconds)}`);
    })
  );
}
