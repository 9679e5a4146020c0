/**
 * Session types for pop3-mailbox
 */

import type { Message } from './message.js';

/**
 * Session lifecycle states
 */
export type SessionState =
  | 'signedOut'
  | 'authenticating'
  | 'signedIn'
  | 'refreshing'
  | 'mutating'
  | 'ending';

/**
 * Validated sign-in input
 */
export interface Credentials {
  /** Full address, localPart@domain */
  address: string;
  /** Local part, used as the POP3 user name */
  username: string;
  /** Domain part, used for host lookup */
  domain: string;
  /** Password */
  secret: string;
}

/**
 * Cached view of the mailbox as of the last successful refresh
 */
export interface MailboxSnapshot {
  /** Number of messages reported by the server */
  readonly messageCount: number;
  /** Messages in server order */
  readonly messages: readonly Message[];
  /** When the refresh completed */
  readonly refreshedAt: Date;
  /** True once a mutation has made the counts untrustworthy */
  readonly stale: boolean;
}

/**
 * Operations the session orchestrator composes. One connect…disconnect
 * scope at a time.
 */
export interface MailTransport {
  /** Open a session with the server */
  connect(host: string, port?: number): Promise<void>;
  /** Authenticate; rejects when the server refuses the credentials */
  login(username: string, secret: string): Promise<void>;
  /** Number of messages in the mailbox */
  getMessageCount(): Promise<number>;
  /** All messages, ordered by sequence number */
  getMessages(): Promise<Message[]>;
  /** Mark a message for deletion */
  deleteMessage(seqno: number): Promise<void>;
  /** End the protocol session (commits deletions) */
  logout(): Promise<void>;
  /** Close the connection */
  disconnect(): Promise<void>;
}
