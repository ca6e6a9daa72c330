/**
 * Component-prefixed logging on stderr.
 * stdout carries the MCP stdio protocol and must stay clean.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function createLogger(component: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (messageLevel: Exclude<LogLevel, 'silent'>, message: string, meta: unknown[]) => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    const prefix = messageLevel === 'debug' ? `[DEBUG] [${component}]` : `[${component}]`;
    const marker = messageLevel === 'warn' ? '⚠️ ' : messageLevel === 'error' ? '✗ ' : '';
    console.error(`${prefix} ${marker}${message}`, ...meta);
  };

  return {
    debug: (message, ...meta) => write('debug', message, meta),
    info: (message, ...meta) => write('info', message, meta),
    warn: (message, ...meta) => write('warn', message, meta),
    error: (message, ...meta) => write('error', message, meta),
  };
}
