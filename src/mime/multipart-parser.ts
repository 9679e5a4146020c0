/**
 * MIME Multipart Parser
 * 
 * Handles multipart boundary detection and part extraction
 * per RFC 2046.
 * 
 * @packageDocumentation
 */

import { parseHeaders, parseContentType, getHeader } from './header-parser.js';
import { base64Decode } from '../encoding/base64.js';
import { quotedPrintableDecode } from '../encoding/quoted-printable.js';
import type { Headers } from '../types/message.js';

/**
 * Represents a parsed MIME part
 */
export interface MimePart {
  /** Part headers */
  headers: Headers;
  /** Content type information */
  contentType: {
    type: string;
    subtype: string;
    params: Record<string, string>;
  };
  /** Content transfer encoding */
  encoding: string;
  /** Raw body content before decoding, one character per octet */
  rawBody: string;
  /** Decoded body octets */
  body: Buffer;
  /** Child parts (for multipart) */
  parts?: MimePart[];
}

/**
 * Splits a raw entity into header block and body at the first empty line
 * 
 * @param raw - Headers, blank line, body
 * @returns Header block and body
 */
export function splitHeaderAndBody(raw: string): { headerBlock: string; body: string } {
  const separatorMatch = raw.match(/\r?\n\r?\n/);

  if (separatorMatch && separatorMatch.index !== undefined) {
    return {
      headerBlock: raw.substring(0, separatorMatch.index),
      body: raw.substring(separatorMatch.index + separatorMatch[0].length),
    };
  }

  // No body, just headers
  return { headerBlock: raw, body: '' };
}

/**
 * Splits a multipart body into individual parts
 * 
 * @param body - Raw multipart body
 * @param boundary - Boundary string (without --)
 * @returns Array of raw part strings
 */
export function splitMultipartBody(body: string, boundary: string): string[] {
  const parts: string[] = [];
  
  const delimiter = `--${boundary}`;
  const closeDelimiter = `--${boundary}--`;
  
  // Skip the preamble
  let startIndex = body.indexOf(delimiter);
  if (startIndex === -1) return parts;
  
  startIndex = body.indexOf('\n', startIndex) + 1;
  if (startIndex === 0) return parts;
  
  while (startIndex < body.length) {
    const endIndex = body.indexOf(delimiter, startIndex);
    if (endIndex === -1) break;
    
    let partContent = body.substring(startIndex, endIndex);
    
    if (partContent.endsWith('\r\n')) {
      partContent = partContent.slice(0, -2);
    } else if (partContent.endsWith('\n')) {
      partContent = partContent.slice(0, -1);
    }
    
    if (partContent.length > 0) {
      parts.push(partContent);
    }
    
    if (body.substring(endIndex, endIndex + closeDelimiter.length) === closeDelimiter) {
      break;
    }
    
    startIndex = body.indexOf('\n', endIndex) + 1;
    if (startIndex === 0) break;
  }
  
  return parts;
}


/**
 * Decodes content based on Content-Transfer-Encoding
 * 
 * @param content - Raw content, one character per octet
 * @param encoding - Content-Transfer-Encoding value
 * @returns Decoded octets
 */
export function decodeContent(content: string, encoding: string): Buffer {
  switch (encoding.toLowerCase()) {
    case 'base64':
      return base64Decode(content);
    case 'quoted-printable':
      return quotedPrintableDecode(content, true);
    default:
      // 7bit, 8bit, binary
      return Buffer.from(content, 'latin1');
  }
}

/**
 * Parses a single MIME part (headers + body)
 *
 * The input holds one character per octet, as read off the wire.
 * Unencoded 8-bit header text is taken as UTF-8.
 * 
 * @param rawPart - Raw part content
 * @returns Parsed MIME part
 */
export function parseMimePart(rawPart: string): MimePart {
  const { headerBlock, body: bodyContent } = splitHeaderAndBody(rawPart);
  const headers = parseHeaders(Buffer.from(headerBlock, 'latin1').toString('utf8'));
  
  const contentType = parseContentType(getHeader(headers, 'content-type') || 'text/plain');
  const encoding = getHeader(headers, 'content-transfer-encoding') || '7bit';
  
  let parts: MimePart[] | undefined;
  let decodedBody: Buffer;
  
  if (contentType.type === 'multipart') {
    decodedBody = Buffer.from(bodyContent, 'latin1');
    const boundary = contentType.params['boundary'];
    if (boundary) {
      parts = splitMultipartBody(bodyContent, boundary).map(p => parseMimePart(p));
    }
  } else {
    decodedBody = decodeContent(bodyContent, encoding);
  }
  
  return {
    headers,
    contentType,
    encoding,
    rawBody: bodyContent,
    body: decodedBody,
    parts,
  };
}

/**
 * Finds the part to show as the message text: the first text/plain leaf,
 * else the first text/* leaf
 * 
 * @param root - Root MIME part
 * @returns Matching part, or undefined when there is none
 */
export function findTextPart(root: MimePart): MimePart | undefined {
  const leaves: MimePart[] = [];
  const collect = (part: MimePart): void => {
    if (part.parts) {
      part.parts.forEach(collect);
    } else {
      leaves.push(part);
    }
  };
  collect(root);

  return leaves.find(p => p.contentType.type === 'text' && p.contentType.subtype === 'plain')
    ?? leaves.find(p => p.contentType.type === 'text');
}
