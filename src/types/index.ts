/**
 * Type exports for pop3-mailbox
 */

// Configuration types
export type { MailClientConfig, ConnectionOptions, LogLevel } from './config.js';

// Message types
export type { Address, HeaderValue, Headers, Message, MessageListing } from './message.js';

// Protocol types
export type { ResponseStatus, StatusLine, Pop3Response } from './protocol.js';

// Session types
export type {
  SessionState,
  Credentials,
  MailboxSnapshot,
  MailTransport
} from './session.js';

// Error types
export {
  MailClientError,
  CredentialsFormError,
  HostNotFoundError,
  ServerRejectionError,
  TransportError,
  TransportTimeoutError,
  ResponseParseError,
  StartupFatalError,
  SessionStateError,
  isMailClientError
} from './errors.js';

export type { ErrorKind } from './errors.js';
