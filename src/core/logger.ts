/**
 * Levelled logging to stderr. Stdout stays free for CLI output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}`;
  console.error(line, ...details);
}

export function logDebug(message: string, ...details: unknown[]): void {
  write('debug', message, details);
}

export function logInfo(message: string, ...details: unknown[]): void {
  write('info', message, details);
}

export function logWarn(message: string, ...details: unknown[]): void {
  write('warn', message, details);
}

export function logError(message: string, ...details: unknown[]): void {
  write('error', message, details);
}
