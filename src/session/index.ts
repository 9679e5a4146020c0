/**
 * Session layer exports for pop3-mailbox
 */

export { MailSession, type MailSessionOptions, type MailSessionEvents } from './orchestrator.js';
export { validateCredentials } from './credentials.js';
export { createSnapshot, markStale, isConsistent } from './snapshot.js';
export { createSessionContext, type SessionContext, type SessionContextOptions } from './context.js';
