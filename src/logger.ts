import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

let level: LogLevel = 'warn';

export function setLogLevel(next: LogLevel): void {
  level = next;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return levelOrder[messageLevel] >= levelOrder[level];
}

// stdout carries extracted data, so every log line goes to stderr.
export const logger = {
  debug: (message: string): void => {
    if (shouldLog('debug')) console.error(chalk.gray(message));
  },
  info: (message: string): void => {
    if (shouldLog('info')) console.error(chalk.blue(message));
  },
  warn: (message: string): void => {
    if (shouldLog('warn')) console.error(chalk.yellow(`Warning: ${message}`));
  },
  error: (message: string): void => {
    if (shouldLog('error')) console.error(chalk.red(message));
  }
};
