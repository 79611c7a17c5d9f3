import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = (value ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Console logger with a colored `[scope]` prefix. Level is process-wide and
 * read from `LOG_LEVEL` at startup.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...meta) {
      if (enabled('debug')) {
        console.debug(chalk.dim(`${prefix} ${message}`), ...meta);
      }
    },
    info(message, ...meta) {
      if (enabled('info')) {
        console.log(`${chalk.cyan(prefix)} ${message}`, ...meta);
      }
    },
    warn(message, ...meta) {
      if (enabled('warn')) {
        console.warn(`${chalk.yellow(prefix)} ${chalk.yellow(message)}`, ...meta);
      }
    },
    error(message, ...meta) {
      if (enabled('error')) {
        console.error(`${chalk.red.bold(prefix)} ${chalk.red(message)}`, ...meta);
      }
    }
  };
}
