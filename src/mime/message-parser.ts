/**
 * Retrieved message parser
 *
 * Builds the immutable Message model from the raw text of a RETR response.
 *
 * @packageDocumentation
 */

import { getHeader, parseAddressList, decodeWithCharset } from './header-parser.js';
import { parseMimePart, findTextPart } from './multipart-parser.js';
import type { Message, MessageListing } from '../types/message.js';

function parseDate(value: string): Date | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Parses a raw RFC 5322 message
 *
 * A string is taken as text and read as its UTF-8 octets; a Buffer holds
 * the octets as received.
 * 
 * @param source - Message with lines joined by CRLF
 * @param listing - Sequence number and size from LIST
 * @returns Frozen message
 */
export function parseMessage(source: string | Buffer, listing: MessageListing): Message {
  const raw = (typeof source === 'string' ? Buffer.from(source, 'utf8') : source).toString('latin1');
  const root = parseMimePart(raw);
  const headers = root.headers;

  let text = '';
  const textPart = findTextPart(root);
  if (textPart) {
    const body = textPart.body;
    text = decodeWithCharset(body, textPart.contentType.params['charset'] ?? 'utf-8') ?? body.toString('utf-8');
  }

  return Object.freeze({
    seqno: listing.seqno,
    size: listing.size,
    headers,
    subject: getHeader(headers, 'subject'),
    from: Object.freeze(parseAddressList(getHeader(headers, 'from'))),
    to: Object.freeze(parseAddressList(getHeader(headers, 'to'))),
    cc: Object.freeze(parseAddressList(getHeader(headers, 'cc'))),
    date: parseDate(getHeader(headers, 'date')),
    messageId: getHeader(headers, 'message-id'),
    text,
    raw,
  });
}
