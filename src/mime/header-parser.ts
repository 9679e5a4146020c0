/**
 * MIME Header Parser
 * 
 * Parses RFC 5322 message headers including:
 * - Folded headers
 * - Encoded words (RFC 2047)
 * - Address lists
 * 
 * @packageDocumentation
 */

import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import type { Address, HeaderValue, Headers } from '../types/message.js';

/**
 * Decodes RFC 2047 encoded words in header values
 * Format: =?charset?encoding?encoded_text?=
 * 
 * @param value - Header value potentially containing encoded words
 * @returns Decoded header value
 */
export function decodeEncodedWords(value: string): string {
  const encodedWordPattern = /=\?([^?]+)\?([BbQq])\?([^?]*)\?=/g;
  
  return value.replace(encodedWordPattern, (match: string, charset: string, encoding: string, encodedText: string) => {
    const enc = encoding.toUpperCase();
    let decoded: Buffer;
    
    if (enc === 'B') {
      decoded = base64Decode(encodedText);
    } else {
      // Q-encoding: underscores represent spaces
      decoded = quotedPrintableDecode(encodedText.replace(/_/g, ' '));
    }
    
    return decodeWithCharset(decoded, charset) ?? match;
  });
}


/**
 * Decodes a buffer using the specified charset
 * 
 * @param buffer - Buffer to decode
 * @param charset - Character set name
 * @returns Decoded string, or undefined for a charset Node cannot decode
 */
export function decodeWithCharset(buffer: Buffer, charset: string): string | undefined {
  const normalizedCharset = charset.replace(/[-_]/g, '').toLowerCase();
  
  const charsetMap: Record<string, BufferEncoding> = {
    'utf8': 'utf-8',
    'usascii': 'ascii',
    'ascii': 'ascii',
    'utf16': 'utf16le',
    'utf16le': 'utf16le',
    'latin1': 'latin1',
    'iso88591': 'latin1',
    'iso885915': 'latin1',
    'windows1252': 'latin1',
    'cp1252': 'latin1',
  };
  
  const encoding = charsetMap[normalizedCharset];
  if (encoding) {
    return buffer.toString(encoding);
  }

  try {
    return new TextDecoder(charset).decode(buffer);
  } catch (err) {
    if (err instanceof RangeError) {
      // Unsupported label
      return undefined;
    }
    throw err;
  }
}

/**
 * Unfolds folded headers
 * Folded headers have CRLF followed by whitespace
 * 
 * @param headerBlock - Raw header block with potential folding
 * @returns Unfolded header block
 */
export function unfoldHeaders(headerBlock: string): string {
  // Also handle bare LF for compatibility
  return headerBlock
    .replace(/\r\n[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, ' ');
}

/**
 * Read-only view over parsed headers. It has no mutators, and it is
 * frozen along with every repeated-header array it holds.
 */
class FrozenHeaders implements ReadonlyMap<string, HeaderValue> {
  private readonly entriesByName: Map<string, HeaderValue>;

  constructor(source: Map<string, string | string[]>) {
    this.entriesByName = new Map();
    for (const [name, value] of source) {
      this.entriesByName.set(name, typeof value === 'string' ? value : Object.freeze([...value]));
    }
    Object.freeze(this);
  }

  get size(): number {
    return this.entriesByName.size;
  }

  get(name: string): HeaderValue | undefined {
    return this.entriesByName.get(name);
  }

  has(name: string): boolean {
    return this.entriesByName.has(name);
  }

  forEach(
    callback: (value: HeaderValue, name: string, headers: ReadonlyMap<string, HeaderValue>) => void,
    thisArg?: unknown
  ): void {
    this.entriesByName.forEach((value, name) => callback.call(thisArg, value, name, this));
  }

  entries() {
    return this.entriesByName.entries();
  }

  keys() {
    return this.entriesByName.keys();
  }

  values() {
    return this.entriesByName.values();
  }

  [Symbol.iterator]() {
    return this.entriesByName[Symbol.iterator]();
  }
}

/**
 * Parses a header block into key-value pairs
 * 
 * @param headerBlock - Raw header block (headers separated by CRLF)
 * @returns Read-only map of lowercased header names to values
 */
export function parseHeaders(headerBlock: string): Headers {
  const headers = new Map<string, string | string[]>();
  
  const unfolded = unfoldHeaders(headerBlock);
  const lines = unfolded.split(/\r?\n/);
  
  for (const line of lines) {
    if (!line.trim()) continue;
    
    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;
    
    const name = line.substring(0, colonIndex).trim().toLowerCase();
    const value = decodeEncodedWords(line.substring(colonIndex + 1).trim());
    
    // Repeated headers collect into an array
    const existing = headers.get(name);
    if (existing === undefined) {
      headers.set(name, value);
    } else if (typeof existing === 'string') {
      headers.set(name, [existing, value]);
    } else {
      existing.push(value);
    }
  }
  
  return new FrozenHeaders(headers);
}

/**
 * Gets the first value of a header
 * 
 * @param headers - Parsed headers
 * @param name - Header name (any case)
 * @returns Header value or empty string
 */
export function getHeader(headers: Headers, name: string): string {
  const value = headers.get(name.toLowerCase());
  if (value === undefined || typeof value === 'string') {
    return value ?? '';
  }
  return value[0] ?? '';
}

/**
 * Parses a Content-Type header value
 * 
 * @param contentType - Content-Type header value
 * @returns Parsed type, subtype, and parameters
 */
export function parseContentType(contentType: string): {
  type: string;
  subtype: string;
  params: Record<string, string>;
} {
  const params: Record<string, string> = {};
  
  const parts = contentType.split(';').map(p => p.trim());
  
  const [type = 'text', subtype = 'plain'] = (parts[0] || 'text/plain')
    .toLowerCase()
    .split('/');
  
  for (let i = 1; i < parts.length; i++) {
    const param = parts[i];
    const eqIndex = param.indexOf('=');
    if (eqIndex !== -1) {
      const name = param.substring(0, eqIndex).trim().toLowerCase();
      let value = param.substring(eqIndex + 1).trim();
      
      if (value.startsWith('"') && value.endsWith('"')) {
        value = value.slice(1, -1);
      }
      
      params[name] = value;
    }
  }
  
  return { type, subtype, params };
}

/**
 * Splits an address list on commas outside quotes and angle brackets
 */
function splitAddressList(value: string): string[] {
  const items: string[] = [];
  let current = '';
  let inQuotes = false;
  let inAngle = false;

  for (const char of value) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && char === '<') {
      inAngle = true;
    } else if (!inQuotes && char === '>') {
      inAngle = false;
    }

    if (char === ',' && !inQuotes && !inAngle) {
      items.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  items.push(current);

  return items.map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parses a single address, "Name <mailbox@host>" or "mailbox@host"
 * 
 * @param value - One address
 * @returns Parsed address
 */
export function parseAddress(value: string): Address {
  const angle = value.match(/^(.*?)\s*<([^>]*)>\s*$/);
  let name = '';
  let addrSpec = value.trim();

  if (angle) {
    name = angle[1].trim();
    addrSpec = angle[2].trim();
    if (name.startsWith('"') && name.endsWith('"') && name.length >= 2) {
      name = name.slice(1, -1).replace(/\\(.)/g, '$1');
    }
  }

  const atIndex = addrSpec.lastIndexOf('@');
  if (atIndex === -1) {
    return { name, mailbox: addrSpec, host: '' };
  }

  return {
    name,
    mailbox: addrSpec.substring(0, atIndex),
    host: addrSpec.substring(atIndex + 1),
  };
}

/**
 * Parses an address list header (From, To, Cc)
 * 
 * @param value - Header value
 * @returns Parsed addresses, empty for an empty header
 */
export function parseAddressList(value: string): Address[] {
  return splitAddressList(value).map(parseAddress);
}
