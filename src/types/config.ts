/**
 * Configuration types for pop3-mailbox
 */

/**
 * Log verbosity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Process configuration, validated from the environment
 */
export interface MailClientConfig {
  /** Absolute path of the host directory file */
  hostsFile: string;
  /** Port override for every connection (default: 110) */
  port?: number;
  /** Connection timeout in milliseconds, 0 disables */
  connTimeout: number;
  /** Per-command timeout in milliseconds, 0 disables */
  commandTimeout: number;
  /** Log verbosity */
  logLevel: LogLevel;
}

/**
 * Internal connection options
 */
export interface ConnectionOptions {
  host: string;
  port: number;
  connTimeout: number;
}
