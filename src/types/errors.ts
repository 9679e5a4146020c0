/**
 * Error types for pop3-mailbox
 */

/**
 * Error categories, one per way a caller can react
 */
export type ErrorKind = 'credentials' | 'host' | 'server' | 'transport' | 'startup' | 'state';

/**
 * Base mail client error class
 */
export class MailClientError extends Error {
  /** Error code */
  code: string;
  /** Error category */
  kind: ErrorKind;

  constructor(message: string, code: string, kind: ErrorKind) {
    super(message);
    this.name = 'MailClientError';
    this.code = code;
    this.kind = kind;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Malformed address or empty secret, detected before any network call
 */
export class CredentialsFormError extends MailClientError {
  override kind: 'credentials' = 'credentials';
  /** Which input was rejected */
  field: 'address' | 'secret';

  constructor(message: string, field: 'address' | 'secret') {
    super(message, 'CREDENTIALS_FORM', 'credentials');
    this.name = 'CredentialsFormError';
    this.field = field;
  }
}

/**
 * Mail domain absent from the host directory
 */
export class HostNotFoundError extends MailClientError {
  override kind: 'host' = 'host';
  /** Domain that was looked up */
  domain: string;

  constructor(domain: string) {
    super(`Cannot find host address for domain "${domain}"`, 'HOST_NOT_FOUND', 'host');
    this.name = 'HostNotFoundError';
    this.domain = domain;
  }
}

/**
 * Server answered a command with -ERR
 */
export class ServerRejectionError extends MailClientError {
  override kind: 'server' = 'server';
  /** Server response text, verbatim */
  serverResponse: string;
  /** Command that was rejected (secrets masked) */
  command?: string;

  constructor(message: string, serverResponse: string, command?: string) {
    super(message, 'SERVER_REJECTION', 'server');
    this.name = 'ServerRejectionError';
    this.serverResponse = serverResponse;
    this.command = command;
  }
}

/**
 * I/O failure while connecting, reading or writing
 */
export class TransportError extends MailClientError {
  override kind: 'transport' = 'transport';
  /** Server host */
  host: string;
  /** Server port */
  port: number;

  constructor(message: string, host: string, port: number, cause?: Error, code: string = 'TRANSPORT_ERROR') {
    super(message, code, 'transport');
    this.name = 'TransportError';
    this.host = host;
    this.port = port;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Connect or command exceeded its time limit
 */
export class TransportTimeoutError extends TransportError {
  /** Operation that timed out */
  operation: string;
  /** Timeout duration in milliseconds */
  timeoutMs: number;

  constructor(message: string, host: string, port: number, operation: string, timeoutMs: number) {
    super(message, host, port, undefined, 'TIMEOUT');
    this.name = 'TransportTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Server sent something that is not a POP3 response
 */
export class ResponseParseError extends MailClientError {
  override kind: 'transport' = 'transport';
  /** Raw data that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string) {
    super(message, 'PARSE_ERROR', 'transport');
    this.name = 'ResponseParseError';
    this.rawData = rawData;
  }
}

/**
 * Configuration or host directory could not be loaded; no session may start
 */
export class StartupFatalError extends MailClientError {
  override kind: 'startup' = 'startup';
  /** File or source that failed to load */
  source: string;

  constructor(message: string, source: string, cause?: unknown) {
    super(message, 'STARTUP_FATAL', 'startup');
    this.name = 'StartupFatalError';
    this.source = source;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Operation not allowed in the session's current state
 */
export class SessionStateError extends MailClientError {
  override kind: 'state' = 'state';
  /** State the session was in */
  state: string;
  /** Operation that was refused */
  operation: string;

  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while session is ${state}`, 'INVALID_STATE', 'state');
    this.name = 'SessionStateError';
    this.state = state;
    this.operation = operation;
  }
}

/**
 * Type guard for errors raised by this library
 */
export function isMailClientError(err: unknown): err is MailClientError {
  return err instanceof MailClientError;
}
