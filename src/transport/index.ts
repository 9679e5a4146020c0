/**
 * Transport layer exports for pop3-mailbox
 */

export { Pop3Connection } from './connection.js';
export type { ConnectionState, Pop3ConnectionEvents, LineChannel, MailConnection, SocketOpener } from './connection.js';
