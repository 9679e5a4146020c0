/**
 * MailSession - session orchestrator for pop3-mailbox
 *
 * Owns the signed-in session and the mailbox snapshot, and composes the
 * transport primitives into sign-in, refresh, delete and shutdown. Each
 * workflow opens one transport session (connect…disconnect) and releases
 * it on every exit path.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import type { HostDirectory } from '../directory/host-directory.js';
import { validateCredentials } from './credentials.js';
import { createSnapshot, isConsistent, markStale } from './snapshot.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Message } from '../types/message.js';
import type { Credentials, MailboxSnapshot, MailTransport, SessionState } from '../types/session.js';
import { SessionStateError } from '../types/errors.js';

/**
 * MailSession events interface for type safety
 */
export interface MailSessionEvents {
  stateChange: (next: SessionState, previous: SessionState) => void;
  snapshot: (snapshot: MailboxSnapshot) => void;
  end: () => void;
}

/**
 * MailSession options
 */
export interface MailSessionOptions {
  /** Domain → server lookup */
  directory: HostDirectory;
  /** Protocol transport */
  transport: MailTransport;
  /** Port override passed to every connect */
  port?: number;
  /** Log sink (default: silent) */
  logger?: Logger;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Session orchestrator. One instance per session context.
 *
 * @example
 * ```typescript
 * const session = new MailSession({
 *   directory: HostDirectory.fromEntries({ 'example.com': 'pop.example.com' }),
 *   transport: new Pop3Client()
 * });
 * await session.signIn('alice@example.com', 'secret');
 * console.log(session.getMessageCount());
 * await session.endSession();
 * ```
 */
export class MailSession extends EventEmitter {
  private readonly directory: HostDirectory;
  private readonly transport: MailTransport;
  private readonly port: number | undefined;
  private readonly logger: Logger;
  private _state: SessionState = 'signedOut';
  private credentials: Credentials | null = null;
  private host: string | null = null;
  private _snapshot: MailboxSnapshot | null = null;
  /** Bumped by endSession so in-flight work cannot commit afterwards */
  private generation: number = 0;

  constructor(options: MailSessionOptions) {
    super();
    this.directory = options.directory;
    this.transport = options.transport;
    this.port = options.port;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Current lifecycle state
   */
  get state(): SessionState {
    return this._state;
  }

  /**
   * Whether a user is signed in (including while an operation runs)
   */
  get isSignedIn(): boolean {
    return this.credentials !== null;
  }

  /**
   * Last installed snapshot, or null before the first refresh
   */
  get snapshot(): MailboxSnapshot | null {
    return this._snapshot;
  }

  /**
   * Messages from the last successful refresh
   */
  getMessages(): readonly Message[] {
    return this._snapshot?.messages ?? [];
  }

  /**
   * Message count from the last successful refresh
   */
  getMessageCount(): number {
    return this._snapshot?.messageCount ?? 0;
  }

  /**
   * Address of the signed-in user
   */
  getAddress(): string | undefined {
    return this.credentials?.address;
  }

  /**
   * Validates the credentials, resolves the server and loads the mailbox.
   * Nothing touches the network until both local checks pass.
   *
   * @param address - localPart@domain
   * @param secret - Password
   * @returns The first snapshot
   * @throws CredentialsFormError if the input is malformed
   * @throws HostNotFoundError if the domain has no server
   * @throws ServerRejectionError if the server refuses a command
   * @throws TransportError on I/O failure
   * @throws SessionStateError unless signed out
   */
  async signIn(address: string, secret: string): Promise<MailboxSnapshot> {
    this.requireState('sign in', 'signedOut');
    const credentials = validateCredentials(address, secret);
    const host = this.directory.resolve(credentials.domain);

    const generation = this.generation;
    this.transition('authenticating');
    try {
      const snapshot = await this.runRefreshCycle(host, credentials);
      this.ensureCurrent(generation, 'complete sign in');

      this.credentials = credentials;
      this.host = host;
      this.installSnapshot(snapshot);
      this.transition('signedIn');
      this.logger.info(`Signed in as ${credentials.address} (${snapshot.messageCount} messages)`);
      return snapshot;
    } catch (err) {
      if (generation === this.generation) {
        this.transition('signedOut');
      }
      this.logger.warn(`Sign in failed for ${credentials.address}: ${errorText(err)}`);
      throw err;
    }
  }

  /**
   * Reloads count and messages. The snapshot is replaced only when the
   * whole cycle succeeds.
   *
   * @returns The new snapshot
   * @throws SessionStateError unless signed in and idle
   */
  async refreshMailbox(): Promise<MailboxSnapshot> {
    const { credentials, host } = this.requireSession('refresh mailbox');

    const generation = this.generation;
    this.transition('refreshing');
    try {
      const snapshot = await this.runRefreshCycle(host, credentials);
      this.ensureCurrent(generation, 'complete refresh');
      this.installSnapshot(snapshot);
      this.logger.info(`Mailbox refreshed (${snapshot.messageCount} messages)`);
      return snapshot;
    } finally {
      if (generation === this.generation) {
        this.transition('signedIn');
      }
    }
  }

  /**
   * Deletes one message by server sequence number. Range is checked by the
   * server. The snapshot is flagged stale afterwards; call refreshMailbox()
   * before relying on counts again.
   *
   * @param sequenceNumber - 1-based sequence number from the last refresh
   * @throws RangeError if the value is not an integer
   * @throws ServerRejectionError if the server has no such message
   */
  async deleteMessage(sequenceNumber: number): Promise<void> {
    const { credentials, host } = this.requireSession('delete message');
    if (!Number.isSafeInteger(sequenceNumber)) {
      throw new RangeError(`Message number must be an integer, got ${sequenceNumber}`);
    }

    const generation = this.generation;
    this.transition('mutating');
    try {
      await this.withTransportSession(host, credentials, (transport) => transport.deleteMessage(sequenceNumber));
      this.ensureCurrent(generation, 'complete delete');
      if (this._snapshot) {
        this.installSnapshot(markStale(this._snapshot));
      }
      this.logger.info(`Deleted message ${sequenceNumber}`);
    } finally {
      if (generation === this.generation) {
        this.transition('signedIn');
      }
    }
  }

  /**
   * Closes any live transport and forgets the session. Never rejects.
   */
  async endSession(): Promise<void> {
    this.generation++;
    this.transition('ending');

    await this.quietly('disconnect', () => this.transport.disconnect(), 'warn');

    this.credentials = null;
    this.host = null;
    this._snapshot = null;
    this.transition('signedOut');
    this.logger.info('Session ended');
    this.emit('end');
  }

  /**
   * connect → login → count → list → logout → disconnect
   */
  private async runRefreshCycle(host: string, credentials: Credentials): Promise<MailboxSnapshot> {
    const snapshot = await this.withTransportSession(host, credentials, async (transport) => {
      const count = await transport.getMessageCount();
      const messages = await transport.getMessages();
      return createSnapshot(count, messages);
    });

    if (!isConsistent(snapshot)) {
      this.logger.warn(
        `Server reported ${snapshot.messageCount} messages but listed ${snapshot.messages.length}`
      );
    }
    return snapshot;
  }

  /**
   * Runs work inside one authenticated transport session. On failure,
   * logout and disconnect are attempted and their errors dropped so the
   * original error reaches the caller.
   */
  private async withTransportSession<T>(
    host: string,
    credentials: Credentials,
    work: (transport: MailTransport) => Promise<T>
  ): Promise<T> {
    const transport = this.transport;
    let needsLogout = false;

    try {
      await transport.connect(host, this.port);
      needsLogout = true;
      await transport.login(credentials.username, credentials.secret);
      const result = await work(transport);
      // QUIT commits deletions, so its failure is the caller's failure
      needsLogout = false;
      await transport.logout();
      return result;
    } catch (err) {
      if (needsLogout) {
        await this.quietly('logout', () => transport.logout());
      }
      throw err;
    } finally {
      await this.quietly('disconnect', () => transport.disconnect());
    }
  }

  /**
   * Runs a cleanup step, logging instead of throwing
   */
  private async quietly(step: string, fn: () => Promise<void>, level: 'debug' | 'warn' = 'debug'): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger[level](`Ignoring ${step} failure during cleanup: ${errorText(err)}`);
    }
  }

  private installSnapshot(snapshot: MailboxSnapshot): void {
    this._snapshot = snapshot;
    this.emit('snapshot', snapshot);
  }

  private transition(next: SessionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.logger.debug(`Session ${previous} -> ${next}`);
    this.emit('stateChange', next, previous);
  }

  private requireState(operation: string, expected: SessionState): void {
    if (this._state !== expected) {
      throw new SessionStateError(operation, this._state);
    }
  }

  private requireSession(operation: string): { credentials: Credentials; host: string } {
    this.requireState(operation, 'signedIn');
    if (!this.credentials || this.host === null) {
      throw new SessionStateError(operation, this._state);
    }
    return { credentials: this.credentials, host: this.host };
  }

  /**
   * Throws if endSession ran while the caller was awaiting the network
   */
  private ensureCurrent(generation: number, operation: string): void {
    if (generation !== this.generation) {
      throw new SessionStateError(operation, this._state);
    }
  }
}
