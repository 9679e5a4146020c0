/**
 * Protocol types for pop3-mailbox
 */

/**
 * POP3 status indicator
 */
export type ResponseStatus = '+OK' | '-ERR';

/**
 * Parsed status line
 */
export interface StatusLine {
  /** Response status */
  status: ResponseStatus;
  /** Text after the status indicator */
  text: string;
}

/**
 * Complete POP3 response for a command
 */
export interface Pop3Response {
  /** Response status (always +OK once resolved) */
  status: ResponseStatus;
  /** Status line text */
  text: string;
  /** Body lines of a multi-line response, dot-unstuffed, one character per octet */
  lines: string[];
}
