/**
 * Content decoding utilities for retrieved messages
 * 
 * @packageDocumentation
 */

export { base64Decode } from './base64.js';
export { quotedPrintableDecode, quotedPrintableDecodeToString } from './quoted-printable.js';
