/**
 * POP3 Response Parser
 * 
 * Parses POP3 status lines and the bodies of STAT and LIST responses.
 * 
 * @packageDocumentation
 */

import type { ResponseStatus, StatusLine } from '../types/protocol.js';
import type { MessageListing } from '../types/message.js';
import { ResponseParseError } from '../types/errors.js';

const STATUS_PATTERN = /^(\+OK|-ERR)(?:\s+(.*))?$/i;

/**
 * Multi-line response terminator
 */
export const TERMINATOR = '.';

/**
 * Checks if a line starts with a POP3 status indicator
 * 
 * @param line - The response line to check
 * @returns True for "+OK ..." and "-ERR ..."
 */
export function isStatusLine(line: string): boolean {
  return STATUS_PATTERN.test(line);
}

/**
 * Parses a status line
 * 
 * @param line - e.g. "+OK 2 320" or "-ERR no such message"
 * @returns Parsed status and text
 * @throws ResponseParseError when the line has no status indicator
 */
export function parseStatusLine(line: string): StatusLine {
  const match = line.match(STATUS_PATTERN);
  if (!match) {
    throw new ResponseParseError('Expected +OK or -ERR status line', line);
  }

  const status: ResponseStatus = match[1].toUpperCase() === '+OK' ? '+OK' : '-ERR';
  return { status, text: (match[2] ?? '').trim() };
}

/**
 * Removes byte-stuffing from a multi-line response line
 * 
 * @param line - Line as received
 * @returns Line with one leading "." removed when the server doubled it
 */
export function unstuffLine(line: string): string {
  return line.startsWith('..') ? line.slice(1) : line;
}

function parseNonNegative(value: string | undefined, raw: string, what: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ResponseParseError(`Malformed ${what}`, raw);
  }
  return parseInt(value, 10);
}

/**
 * Parses the text of a STAT response
 * 
 * @param text - e.g. "2 320"
 * @returns Message count and mailbox size in octets
 * @throws ResponseParseError if the text is malformed
 */
export function parseStatResponse(text: string): { count: number; size: number } {
  const [count, size] = text.trim().split(/\s+/);
  return {
    count: parseNonNegative(count, text, 'STAT response'),
    size: parseNonNegative(size, text, 'STAT response'),
  };
}

/**
 * Parses one scan listing line
 * 
 * @param line - e.g. "1 120"
 * @returns Sequence number and size
 * @throws ResponseParseError if the line is malformed
 */
export function parseListingLine(line: string): MessageListing {
  const [seqno, size] = line.trim().split(/\s+/);
  const listing = {
    seqno: parseNonNegative(seqno, line, 'LIST entry'),
    size: parseNonNegative(size, line, 'LIST entry'),
  };
  if (listing.seqno === 0) {
    throw new ResponseParseError('Malformed LIST entry', line);
  }
  return listing;
}

/**
 * Parses the body of a multi-line LIST response
 * 
 * @param lines - Body lines, terminator excluded
 * @returns Listings in server order
 */
export function parseListing(lines: string[]): MessageListing[] {
  return lines
    .filter(line => line.trim().length > 0)
    .map(parseListingLine);
}
