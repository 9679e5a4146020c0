/**
 * Pop3Client - transport for pop3-mailbox
 *
 * Implements the MailTransport contract over POP3: connect, authenticate
 * with USER/PASS, inventory with STAT and LIST, fetch with RETR, delete
 * with DELE, and end with QUIT.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { Pop3Connection, type MailConnection } from './transport/connection.js';
import { Pop3Protocol } from './protocol/pop3-protocol.js';
import { parseListing, parseStatResponse } from './protocol/parser.js';
import { CommandBuilder } from './commands/builder.js';
import { parseMessage } from './mime/message-parser.js';
import { silentLogger, type Logger } from './logger.js';
import type { ConnectionOptions } from './types/config.js';
import type { Message, MessageListing } from './types/message.js';
import type { MailTransport } from './types/session.js';
import { TransportError } from './types/errors.js';

/**
 * Default configuration values
 */
export const DEFAULT_PORT = 110;
const DEFAULT_CONN_TIMEOUT = 30000;
const DEFAULT_COMMAND_TIMEOUT = 30000;
const QUIT_TIMEOUT = 5000;

/**
 * Pop3Client options
 */
export interface Pop3ClientOptions {
  /** Port used when connect() gets no override (default: 110) */
  port?: number;
  /** Connection timeout in milliseconds (default: 30000) */
  connTimeout?: number;
  /** Per-command timeout in milliseconds (default: 30000) */
  commandTimeout?: number;
  /** Log sink (default: silent) */
  logger?: Logger;
  /** Connection factory, replaced in tests */
  createConnection?: (options: ConnectionOptions) => MailConnection;
}

/**
 * Pop3Client provides a Promise-based POP3 session, one connection at a time.
 *
 * @example
 * ```typescript
 * const client = new Pop3Client();
 * await client.connect('pop.example.com');
 * await client.login('alice', 'secret');
 * const messages = await client.getMessages();
 * await client.logout();
 * await client.disconnect();
 * ```
 */
export class Pop3Client extends EventEmitter implements MailTransport {
  private options: Required<Omit<Pop3ClientOptions, 'createConnection'>>;
  private createConnection: (options: ConnectionOptions) => MailConnection;
  private connection: MailConnection | null = null;
  private protocol: Pop3Protocol | null = null;
  private _greeting: string = '';

  /**
   * Creates a new Pop3Client. Nothing is opened until connect().
   *
   * @param options - Client options
   */
  constructor(options: Pop3ClientOptions = {}) {
    super();
    this.options = {
      port: options.port ?? DEFAULT_PORT,
      connTimeout: options.connTimeout ?? DEFAULT_CONN_TIMEOUT,
      commandTimeout: options.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT,
      logger: options.logger ?? silentLogger
    };
    this.createConnection = options.createConnection ?? ((opts) => new Pop3Connection(opts));
  }

  /**
   * Whether a connection is open
   */
  get isConnected(): boolean {
    return this.connection?.isConnected ?? false;
  }

  /**
   * Text of the last server greeting
   */
  get greeting(): string {
    return this._greeting;
  }

  /**
   * Opens a connection and waits for the server greeting. On failure the
   * connection is closed again before the error is rethrown.
   *
   * @param host - Server host name or address
   * @param port - Port override
   * @throws TransportError if a connection is already open or the socket fails
   * @throws ServerRejectionError if the server greets with -ERR
   */
  async connect(host: string, port?: number): Promise<void> {
    if (this.connection) {
      throw new TransportError(
        'Cannot connect: a connection is already open',
        this.connection.host,
        this.connection.port,
        undefined,
        'ALREADY_CONNECTED'
      );
    }

    const logger = this.options.logger;
    const connection = this.createConnection({
      host,
      port: port ?? this.options.port,
      connTimeout: this.options.connTimeout
    });

    connection.on('error', (err: Error) => {
      logger.warn(`Connection error: ${err.message}`);
      // The pending command already rejects; only forward to listeners
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
    });
    connection.on('close', () => {
      this.emit('close');
    });

    // Listen before connecting so an early greeting is not lost
    const protocol = new Pop3Protocol(connection, { timeout: this.options.commandTimeout });
    this.connection = connection;
    this.protocol = protocol;

    logger.debug(`Connecting to ${host}:${connection.port}`);
    try {
      await connection.connect();
      const greeting = await protocol.readGreeting();
      this._greeting = greeting.text;
      logger.debug(`Connected: ${greeting.text}`);
    } catch (err) {
      await this.disconnect();
      throw err;
    }
  }

  /**
   * Authenticates with USER and PASS
   *
   * @param username - Mailbox name
   * @param secret - Password
   * @throws ServerRejectionError if the server refuses either command
   */
  async login(username: string, secret: string): Promise<void> {
    const protocol = this.ensureConnected();
    await protocol.executeCommand(CommandBuilder.user(username));
    await protocol.executeCommand(CommandBuilder.pass(secret));
    this.options.logger.debug(`Authenticated as ${username}`);
  }

  /**
   * Number of messages in the mailbox (STAT)
   *
   * @returns Message count
   */
  async getMessageCount(): Promise<number> {
    const protocol = this.ensureConnected();
    const response = await protocol.executeCommand(CommandBuilder.stat());
    return parseStatResponse(response.text).count;
  }

  /**
   * Scan listing of every message (LIST)
   *
   * @returns Sequence numbers and sizes in server order
   */
  async listMessages(): Promise<MessageListing[]> {
    const protocol = this.ensureConnected();
    const response = await protocol.executeCommand(CommandBuilder.list(), { multiline: true });
    return parseListing(response.lines);
  }

  /**
   * Retrieves and parses one message (RETR)
   *
   * @param listing - Entry from listMessages()
   * @returns Parsed message
   * @throws ServerRejectionError if the message does not exist
   */
  async retrieveMessage(listing: MessageListing): Promise<Message> {
    const protocol = this.ensureConnected();
    const response = await protocol.executeCommand(CommandBuilder.retr(listing.seqno), { multiline: true });
    return parseMessage(Buffer.from(response.lines.join('\r\n'), 'latin1'), listing);
  }

  /**
   * Retrieves every message, one RETR at a time
   *
   * @returns Messages ordered by sequence number
   */
  async getMessages(): Promise<Message[]> {
    const listings = await this.listMessages();
    const messages: Message[] = [];
    for (const listing of listings) {
      messages.push(await this.retrieveMessage(listing));
    }
    this.options.logger.debug(`Retrieved ${messages.length} messages`);
    return messages;
  }

  /**
   * Marks a message for deletion (DELE). The server removes it on QUIT.
   *
   * @param seqno - Message sequence number
   * @throws ServerRejectionError if the server has no such message
   */
  async deleteMessage(seqno: number): Promise<void> {
    const protocol = this.ensureConnected();
    await protocol.executeCommand(CommandBuilder.dele(seqno));
    this.options.logger.debug(`Marked message ${seqno} for deletion`);
  }

  /**
   * Sends QUIT. Does nothing when no connection is open.
   */
  async logout(): Promise<void> {
    if (!this.protocol || !this.connection?.isConnected) {
      return;
    }
    await this.protocol.executeCommand(CommandBuilder.quit(), { timeout: QUIT_TIMEOUT });
  }

  /**
   * Closes the connection. Safe to call at any time.
   */
  async disconnect(): Promise<void> {
    const connection = this.connection;
    const protocol = this.protocol;
    this.connection = null;
    this.protocol = null;

    protocol?.dispose();
    if (connection) {
      connection.removeAllListeners();
      // Socket errors can still arrive while the close completes
      connection.on('error', (err: Error) => {
        this.options.logger.debug(`Ignoring connection error during disconnect: ${err.message}`);
      });
      await connection.disconnect();
      this.options.logger.debug(`Disconnected from ${connection.host}`);
    }
  }

  /**
   * Returns the protocol handler, or throws when no connection is open
   */
  private ensureConnected(): Pop3Protocol {
    if (!this.protocol || !this.connection?.isConnected) {
      throw new TransportError(
        'Not connected',
        this.connection?.host ?? '',
        this.connection?.port ?? this.options.port,
        undefined,
        'NOT_CONNECTED'
      );
    }
    return this.protocol;
  }
}
