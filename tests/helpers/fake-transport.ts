/**
 * In-memory MailTransport for orchestrator tests
 */

import { parseMessage } from '../../src/mime/message-parser.js';
import type { Message } from '../../src/types/message.js';
import type { MailTransport } from '../../src/types/session.js';
import { ServerRejectionError, TransportError } from '../../src/types/errors.js';

export type TransportStep =
  | 'connect'
  | 'login'
  | 'getMessageCount'
  | 'getMessages'
  | 'deleteMessage'
  | 'logout'
  | 'disconnect';

/**
 * Builds a parsed message with a plain text body
 */
export function makeMessage(seqno: number, subject: string = `Message ${seqno}`): Message {
  const raw = [
    `From: Sender ${seqno} <sender${seqno}@example.net>`,
    'To: alice@example.com',
    `Subject: ${subject}`,
    `Message-ID: <m${seqno}@example.net>`,
    '',
    `Body of message ${seqno}`,
  ].join('\r\n');
  return parseMessage(raw, { seqno, size: raw.length });
}

/**
 * Builds messages numbered 1..count
 */
export function makeMessages(count: number): Message[] {
  return Array.from({ length: count }, (_, i) => makeMessage(i + 1));
}

/**
 * Records every call; fails any step listed in `failures`
 */
export class FakeTransport implements MailTransport {
  /** Calls in order, e.g. "connect pop.example.com" */
  calls: string[] = [];
  /** Steps that throw until removed */
  failures: Partial<Record<TransportStep, Error>> = {};
  /** Mailbox content */
  messages: Message[];
  /** STAT count, defaults to messages.length */
  count?: number;
  /** Accepted password */
  password: string;
  connected: boolean = false;
  /** Resolves the next getMessages call when set */
  gate?: Promise<void>;

  constructor(messages: Message[] = [], password: string = 'secret1') {
    this.messages = messages;
    this.password = password;
  }

  /** Number of calls to one step */
  countOf(step: TransportStep): number {
    return this.calls.filter(call => call.split(' ')[0] === step).length;
  }

  private check(step: TransportStep): void {
    const failure = this.failures[step];
    if (failure) {
      throw failure;
    }
  }

  async connect(host: string, port?: number): Promise<void> {
    this.calls.push(port === undefined ? `connect ${host}` : `connect ${host}:${port}`);
    this.check('connect');
    this.connected = true;
  }

  async login(username: string, secret: string): Promise<void> {
    this.calls.push(`login ${username}`);
    this.check('login');
    if (secret !== this.password) {
      throw new ServerRejectionError('Command failed: invalid password', 'invalid password', 'PASS ****');
    }
  }

  async getMessageCount(): Promise<number> {
    this.calls.push('getMessageCount');
    this.check('getMessageCount');
    return this.count ?? this.messages.length;
  }

  async getMessages(): Promise<Message[]> {
    this.calls.push('getMessages');
    if (this.gate) {
      await this.gate;
    }
    this.check('getMessages');
    return [...this.messages];
  }

  async deleteMessage(seqno: number): Promise<void> {
    this.calls.push(`deleteMessage ${seqno}`);
    this.check('deleteMessage');
    if (!this.messages.some(m => m.seqno === seqno)) {
      throw new ServerRejectionError('Command failed: no such message', 'no such message', `DELE ${seqno}`);
    }
  }

  async logout(): Promise<void> {
    this.calls.push('logout');
    this.check('logout');
  }

  async disconnect(): Promise<void> {
    this.calls.push('disconnect');
    this.connected = false;
    this.check('disconnect');
  }
}

/**
 * An I/O failure as the POP3 transport would raise it
 */
export function ioError(message: string = 'Connection reset'): TransportError {
  return new TransportError(message, 'pop.example.com', 110);
}
