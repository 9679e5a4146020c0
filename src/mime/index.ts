/**
 * MIME Parser Module
 * 
 * Provides message parsing for retrieved mail:
 * - Header parsing with RFC 2047 encoded word support
 * - Multipart boundary detection and part extraction
 * - Message model construction
 * 
 * @packageDocumentation
 */

// Header parsing
export {
  parseHeaders,
  decodeEncodedWords,
  decodeWithCharset,
  unfoldHeaders,
  getHeader,
  parseContentType,
  parseAddress,
  parseAddressList,
} from './header-parser.js';

// Multipart parsing
export {
  splitHeaderAndBody,
  splitMultipartBody,
  parseMimePart,
  findTextPart,
  decodeContent,
} from './multipart-parser.js';

export type { MimePart } from './multipart-parser.js';

// Message model
export { parseMessage } from './message-parser.js';
