/**
 * Protocol layer exports for pop3-mailbox
 */

export {
  isStatusLine,
  parseStatusLine,
  parseStatResponse,
  parseListingLine,
  parseListing,
  unstuffLine,
  TERMINATOR
} from './parser.js';

export { Pop3Protocol, type ExecuteOptions } from './pop3-protocol.js';
