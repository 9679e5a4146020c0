/**
 * Command layer exports for pop3-mailbox
 */

export { CommandBuilder, maskCommand } from './builder.js';
