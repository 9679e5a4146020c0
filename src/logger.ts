/**
 * Console logging for pop3-mailbox
 *
 * Lines are tagged with a bracketed prefix, e.g. "[POP3] Connected".
 */

import type { LogLevel } from './types/config.js';

/**
 * Logging sink used throughout the library
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Creates a logger writing through console
 * 
 * @param prefix - Tag printed in brackets before each message
 * @param level - Minimum level that is written
 */
export function createConsoleLogger(prefix: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const tag = `[${prefix}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(tag, message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(tag, message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(tag, message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(tag, message, ...args);
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createConsoleLogger('', 'silent');
