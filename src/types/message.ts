/**
 * Message types for pop3-mailbox
 */

/**
 * Represents an email address
 */
export interface Address {
  /** Display name */
  name: string;
  /** Mailbox part (before @) */
  mailbox: string;
  /** Host part (after @) */
  host: string;
}

/**
 * One header value, or every value of a repeated header in order
 */
export type HeaderValue = string | readonly string[];

/**
 * Parsed message headers, keyed by lowercased name
 */
export type Headers = ReadonlyMap<string, HeaderValue>;

/**
 * Size entry from a LIST response
 */
export interface MessageListing {
  /** Sequence number (1-based, server numbering) */
  seqno: number;
  /** Size in octets */
  size: number;
}

/**
 * A retrieved message. Frozen once built.
 */
export interface Message {
  /** Sequence number (1-based, server numbering) */
  readonly seqno: number;
  /** Size in octets as reported by LIST */
  readonly size: number;
  /** All headers */
  readonly headers: Headers;
  /** Subject line */
  readonly subject: string;
  /** From addresses */
  readonly from: readonly Address[];
  /** To addresses */
  readonly to: readonly Address[];
  /** CC addresses */
  readonly cc: readonly Address[];
  /** Date header, null when missing or unparseable */
  readonly date: Date | null;
  /** Message-ID header */
  readonly messageId: string;
  /** Decoded text body */
  readonly text: string;
  /** Raw message as retrieved, one character per octet (`Buffer.from(raw, 'latin1')` restores the bytes) */
  readonly raw: string;
}
