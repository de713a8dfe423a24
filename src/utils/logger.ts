import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

let currentLevel: LogLevel = 'info';

const rank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const paint: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function emit(level: LogLevel, scope: string | undefined, msg: string, args: unknown[]): void {
  if (rank[level] < rank[currentLevel]) return;
  const line = paint[level](`[${level.toUpperCase()}] ${scope ? `[${scope}] ` : ''}${msg}`);
  if (level === 'error') console.error(line, ...args);
  else console.log(line, ...args);
}

export function debug(msg: string, ...args: unknown[]): void {
  emit('debug', undefined, msg, args);
}

export function info(msg: string, ...args: unknown[]): void {
  emit('info', undefined, msg, args);
}

export function warn(msg: string, ...args: unknown[]): void {
  emit('warn', undefined, msg, args);
}

export function error(msg: string, ...args: unknown[]): void {
  emit('error', undefined, msg, args);
}

/**
 * Logger that tags every line with `[scope]`, e.g. the method and id of the
 * request being dispatched.
 */
export function scoped(scope: string): Logger {
  return {
    debug: (msg, ...args) => emit('debug', scope, msg, args),
    info: (msg, ...args) => emit('info', scope, msg, args),
    warn: (msg, ...args) => emit('warn', scope, msg, args),
    error: (msg, ...args) => emit('error', scope, msg, args),
  };
}

/** Message of anything thrown, for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
