/**
 * pop3-mailbox - POP3 mailbox session library
 * 
 * Sign in, list, retrieve and delete messages over a single
 * authenticated POP3 session.
 * 
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Decoding utilities
export * from './encoding/index.js';

// Protocol layer
export * from './protocol/index.js';

// Command layer
export * from './commands/index.js';

// MIME and message parsing
export * from './mime/index.js';

// Transport layer
export * from './transport/index.js';

// Host directory
export * from './directory/index.js';

// Session orchestration
export * from './session/index.js';

// Ambient
export { loadConfig, DEFAULT_HOSTS_FILE } from './config.js';
export { createConsoleLogger, silentLogger, type Logger } from './logger.js';

// Public API
export { Pop3Client, DEFAULT_PORT, type Pop3ClientOptions } from './client.js';
