import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

/**
 * Scoped console logger. Warnings and errors go to stderr.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const line = `${chalk.gray(new Date().toISOString())} ${LEVEL_LABEL[level]} ${chalk.magenta(`[${scope}]`)} ${message}`;
    if (level === 'warn' || level === 'error') {
      console.error(line, ...details);
    } else {
      console.log(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  };
}
