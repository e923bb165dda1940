import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let currentLevel: LogLevel = parseLevel(process.env.WAYPOST_LOG_LEVEL) ?? 'info';
let jsonMode = false;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return undefined;
  }
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  if (jsonMode) {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...data,
    });
  }

  const timestamp = new Date().toLocaleTimeString();
  const prefix = {
    debug: chalk.gray(`[${timestamp}] DEBUG`),
    info: chalk.blue(`[${timestamp}] INFO`),
    warn: chalk.yellow(`[${timestamp}] WARN`),
    error: chalk.red(`[${timestamp}] ERROR`),
  }[level];

  let output = `${prefix} ${message}`;
  if (data) {
    output += ` ${chalk.gray(JSON.stringify(data))}`;
  }
  return output;
}

export function debug(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('debug')) {
    console.log(formatMessage('debug', message, data));
  }
}

export function info(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('info')) {
    console.log(formatMessage('info', message, data));
  }
}

export function warn(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('warn')) {
    console.warn(formatMessage('warn', message, data));
  }
}

export function error(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('error')) {
    console.error(formatMessage('error', message, data));
  }
}

// Status-specific formatters
export function session(action: string, sessionId: number, details?: string): void {
  if (jsonMode) {
    info(action, { sessionId, details });
  } else {
    console.log(`${chalk.cyan('●')} ${action} ${chalk.dim(`[session #${sessionId}]`)}${details ? ` ${details}` : ''}`);
  }
}

export function issue(id: number, status: string, title?: string): void {
  if (jsonMode) {
    info('Issue status', { id, status, title });
  } else {
    const statusColor =
      {
        open: chalk.green,
        closed: chalk.dim,
        archived: chalk.gray,
        blocked: chalk.red,
      }[status] || chalk.white;

    console.log(`  ${chalk.dim('#')}${id} ${statusColor(status)}${title ? ` ${chalk.dim(title)}` : ''}`);
  }
}

export function success(message: string): void {
  if (jsonMode) {
    info(message, { success: true });
  } else {
    console.log(`${chalk.green('✓')} ${message}`);
  }
}

export function failure(message: string): void {
  if (jsonMode) {
    error(message, { success: false });
  } else {
    console.log(`${chalk.red('✗')} ${message}`);
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  session,
  issue,
  success,
  failure,
  setLevel: setLogLevel,
  setJsonMode,
};
