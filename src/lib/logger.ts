/**
 * Logger
 * Leveled console logger shared by every pipeline component
 */

import { env } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_COLORS: Record<LogLevel, string> = {
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
  debug: '\x1b[90m', // gray
};

const RESET = '\x1b[0m';

function isKnownLevel(value: string): value is LogLevel | 'silent' {
  return value in LEVEL_ORDER;
}

let threshold: LogLevel | 'silent' = isKnownLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
}

export function formatLogEntry(level: LogLevel, message: string, args: unknown[], now: Date = new Date()): string {
  const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${extra}`;
}

function log(level: LogLevel, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }

  const entry = `${LOG_COLORS[level]}${formatLogEntry(level, message, args)}${RESET}`;
  if (level === 'error') {
    console.error(entry);
  } else if (level === 'warn') {
    console.warn(entry);
  } else {
    console.log(entry);
  }
}

export const logger = {
  debug: (message: string, ...args: unknown[]) => log('debug', message, args),
  info: (message: string, ...args: unknown[]) => log('info', message, args),
  warn: (message: string, ...args: unknown[]) => log('warn', message, args),
  error: (message: string, ...args: unknown[]) => log('error', message, args),
  setLevel: (level: LogLevel | 'silent') => {
    threshold = level;
  },
  getLevel: (): LogLevel | 'silent' => threshold,
};
