/**
 * POP3 Command Builder
 * 
 * Builds POP3 commands according to RFC 1939. Commands are returned
 * without the trailing CRLF.
 * 
 * @packageDocumentation
 */

/**
 * Rejects argument text that would break the line framing
 * 
 * @param name - Argument name for the error message
 * @param value - Argument value
 * @returns The value unchanged
 */
function checkArgument(name: string, value: string): string {
  if (/[\r\n\0]/.test(value)) {
    throw new RangeError(`${name} must not contain line breaks or NUL`);
  }
  return value;
}

/**
 * Formats a message number argument
 * 
 * @param seqno - Message sequence number
 * @returns Decimal string
 */
function messageNumber(seqno: number): string {
  if (!Number.isSafeInteger(seqno)) {
    throw new RangeError(`Message number must be an integer, got ${seqno}`);
  }
  return String(seqno);
}

/**
 * Replaces the argument of a PASS command so the secret never reaches
 * errors or logs
 * 
 * @param command - Command line
 * @returns Command safe to record
 */
export function maskCommand(command: string): string {
  return /^PASS\b/i.test(command) ? 'PASS ****' : command;
}

/**
 * CommandBuilder provides static methods to construct POP3 commands
 */
export class CommandBuilder {
  /**
   * Builds a USER command
   * 
   * @param user - Mailbox name
   * @returns USER command string
   */
  static user(user: string): string {
    return `USER ${checkArgument('User', user)}`;
  }

  /**
   * Builds a PASS command
   * 
   * @param password - Password (sent verbatim; spaces allowed)
   * @returns PASS command string
   */
  static pass(password: string): string {
    return `PASS ${checkArgument('Password', password)}`;
  }

  /**
   * Builds a STAT command (drop listing: count and total size)
   */
  static stat(): string {
    return 'STAT';
  }

  /**
   * Builds a LIST command
   * 
   * @param seqno - Single message to list; omit for a multi-line scan listing
   * @returns LIST command string
   */
  static list(seqno?: number): string {
    return seqno === undefined ? 'LIST' : `LIST ${messageNumber(seqno)}`;
  }

  /**
   * Builds a RETR command
   * 
   * @param seqno - Message sequence number
   * @returns RETR command string
   */
  static retr(seqno: number): string {
    return `RETR ${messageNumber(seqno)}`;
  }

  /**
   * Builds a DELE command
   * 
   * @param seqno - Message sequence number
   * @returns DELE command string
   */
  static dele(seqno: number): string {
    return `DELE ${messageNumber(seqno)}`;
  }

  /**
   * Builds a QUIT command (enters UPDATE state, commits deletions)
   */
  static quit(): string {
    return 'QUIT';
  }
}
