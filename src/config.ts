/**
 * Process configuration for pop3-mailbox
 *
 * Read once from environment variables and validated with zod.
 */

import * as path from 'path';
import { z } from 'zod';
import type { MailClientConfig } from './types/config.js';
import { StartupFatalError } from './types/errors.js';

/**
 * Default host directory file, resolved against the working directory
 */
export const DEFAULT_HOSTS_FILE = 'hosts.properties';
export const DEFAULT_CONN_TIMEOUT = 30000;
export const DEFAULT_COMMAND_TIMEOUT = 30000;

const schema = z.object({
  POP3_HOSTS_FILE: z.string().min(1).default(DEFAULT_HOSTS_FILE),
  POP3_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  POP3_CONN_TIMEOUT: z.coerce.number().int().min(0).default(DEFAULT_CONN_TIMEOUT),
  POP3_COMMAND_TIMEOUT: z.coerce.number().int().min(0).default(DEFAULT_COMMAND_TIMEOUT),
  POP3_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

/**
 * Loads configuration from environment variables
 * 
 * @param env - Variables to read (default: process.env)
 * @param cwd - Directory relative paths resolve against
 * @returns Validated configuration
 * @throws StartupFatalError if a variable is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): MailClientConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = schema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new StartupFatalError(`Invalid configuration: ${issues}`, 'environment', result.error);
  }

  const parsed = result.data;
  return {
    hostsFile: path.resolve(cwd, parsed.POP3_HOSTS_FILE),
    port: parsed.POP3_PORT,
    connTimeout: parsed.POP3_CONN_TIMEOUT,
    commandTimeout: parsed.POP3_COMMAND_TIMEOUT,
    logLevel: parsed.POP3_LOG_LEVEL,
  };
}
