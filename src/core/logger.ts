import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'info';

/** Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  return Object.entries(fields)
    .map(([key, value]) => ` ${chalk.dim(key + '=')}${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join('');
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;

  const line = `${message}${formatFields(fields)}`;
  switch (level) {
    case 'debug':
      console.log(chalk.dim(`  • ${line}`));
      break;
    case 'info':
      console.log(`  ${chalk.blue('•')} ${line}`);
      break;
    case 'warn':
      console.warn(chalk.yellow(`  ~ ${line}`));
      break;
    case 'error':
      console.error(chalk.red(`  ✗ ${line}`));
      break;
  }
}

export const logger = {
  debug: (message: string, fields?: LogFields) => write('debug', message, fields),
  info: (message: string, fields?: LogFields) => write('info', message, fields),
  warn: (message: string, fields?: LogFields) => write('warn', message, fields),
  error: (message: string, fields?: LogFields) => write('error', message, fields),
};
