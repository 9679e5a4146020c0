/**
 * Host directory exports for pop3-mailbox
 */

export {
  HostDirectory,
  loadHostDirectory,
  parseHostProperties,
  hostTableSchema,
  type HostTable
} from './host-directory.js';
