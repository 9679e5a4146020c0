/**
 * Session context
 *
 * Process-scoped bundle of configuration, logger, host directory and the
 * one MailSession. Callers receive it explicitly; there is no global
 * instance, so several contexts can live side by side.
 */

import { loadConfig } from '../config.js';
import { createConsoleLogger, type Logger } from '../logger.js';
import { loadHostDirectory, type HostDirectory } from '../directory/host-directory.js';
import { Pop3Client } from '../client.js';
import { MailSession } from './orchestrator.js';
import type { MailClientConfig } from '../types/config.js';
import type { MailTransport } from '../types/session.js';

export interface SessionContext {
  readonly config: MailClientConfig;
  readonly logger: Logger;
  readonly directory: HostDirectory;
  readonly session: MailSession;
}

export interface SessionContextOptions {
  /** Ready configuration; read from env when omitted */
  config?: MailClientConfig;
  /** Environment used when config is omitted (default: process.env) */
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Ready directory; loaded from config.hostsFile when omitted */
  directory?: HostDirectory;
  /** Transport; a Pop3Client when omitted */
  transport?: MailTransport;
}

/**
 * Builds the context. Fails with StartupFatalError when configuration or
 * the host directory cannot be loaded; no session exists in that case.
 */
export async function createSessionContext(options: SessionContextOptions = {}): Promise<SessionContext> {
  const config = options.config ?? loadConfig(options.env);
  const logger = options.logger ?? createConsoleLogger('POP3', config.logLevel);

  const directory = options.directory ?? await loadHostDirectory(config.hostsFile);
  logger.debug(`Loaded ${directory.size} host entries`);

  const transport = options.transport ?? new Pop3Client({
    port: config.port,
    connTimeout: config.connTimeout,
    commandTimeout: config.commandTimeout,
    logger
  });

  const session = new MailSession({
    directory,
    transport,
    port: config.port,
    logger
  });

  return { config, logger, directory, session };
}
