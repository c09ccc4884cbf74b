import chalk from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function enabled(level: LogLevel) {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(currentLevel);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled('debug')) console.log(chalk.gray(`${prefix} ${message}`));
    },
    info(message) {
      if (enabled('info')) console.log(`${chalk.cyan(prefix)} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(chalk.yellow(`${prefix} ${message}`));
    },
    error(message, err) {
      if (!enabled('error')) return;
      if (err === undefined) {
        console.error(chalk.red(`${prefix} ${message}`));
      } else {
        console.error(chalk.red(`${prefix} ${message}:`), errorMessage(err));
      }
    },
  };
}
