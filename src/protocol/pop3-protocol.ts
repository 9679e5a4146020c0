/**
 * POP3 Protocol Layer
 * 
 * Wraps the transport connection and provides command execution,
 * line framing, multi-line response collection, and timeout management.
 * POP3 has no tags, so exactly one command may be outstanding.
 * 
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import type { LineChannel } from '../transport/connection.js';
import { isStatusLine, parseStatusLine, unstuffLine, TERMINATOR } from './parser.js';
import { maskCommand } from '../commands/builder.js';
import type { Pop3Response, StatusLine } from '../types/protocol.js';
import {
  ResponseParseError,
  ServerRejectionError,
  TransportError,
  TransportTimeoutError
} from '../types/errors.js';

/**
 * Default timeout for operations in milliseconds
 */
const DEFAULT_TIMEOUT = 30000;

/**
 * Command waiting for its response
 */
interface PendingCommand {
  /** Command as it may appear in errors and logs */
  label: string;
  multiline: boolean;
  resolve: (response: Pop3Response) => void;
  reject: (error: Error) => void;
  timeoutId?: NodeJS.Timeout;
  /** Set once the status line of a multi-line response arrived */
  status?: StatusLine;
  lines: string[];
}

/**
 * Options for a single command
 */
export interface ExecuteOptions {
  /** Response carries a dot-terminated body after +OK */
  multiline?: boolean;
  /** Timeout in milliseconds (0 disables) */
  timeout?: number;
}

/**
 * Pop3Protocol class wrapping a connection
 */
export class Pop3Protocol extends EventEmitter {
  private channel: LineChannel;
  private pending: PendingCommand | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  /** Lines that arrived while no command was waiting */
  private queued: Buffer[] = [];
  /** Set after a timeout; unsolicited lines are dropped until the next command */
  private discarding = false;
  private defaultTimeout: number;
  private readonly onData = (chunk: Buffer) => this.handleData(chunk);
  private readonly onError = (err: Error) => this.failPending(err);
  private readonly onClose = () => {
    this.failPending(new TransportError('Connection closed', this.channel.host, this.channel.port));
    this.emit('close');
  };

  constructor(channel: LineChannel, options?: { timeout?: number }) {
    super();
    this.channel = channel;
    this.defaultTimeout = options?.timeout ?? DEFAULT_TIMEOUT;
    this.channel.on('data', this.onData);
    this.channel.on('error', this.onError);
    this.channel.on('close', this.onClose);
  }

  /**
   * Stop listening to the channel
   */
  dispose(): void {
    this.channel.removeListener('data', this.onData);
    this.channel.removeListener('error', this.onError);
    this.channel.removeListener('close', this.onClose);
    this.failPending(new TransportError('Protocol disposed', this.channel.host, this.channel.port));
    this.buffer = Buffer.alloc(0);
    this.queued = [];
    this.discarding = false;
  }


  /**
   * Handle incoming data, one complete line at a time
   *
   * Lines stay as bytes until their role is known: status lines are
   * UTF-8, body lines are kept one character per octet (latin1) so the
   * MIME layer can decode them in the part's own charset.
   */
  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    let lineEnd: number;
    while ((lineEnd = this.buffer.indexOf(0x0A)) !== -1) {
      let end = lineEnd;
      if (end > 0 && this.buffer[end - 1] === 0x0D) {
        end--;
      }
      const line = this.buffer.subarray(0, end);
      this.buffer = this.buffer.subarray(lineEnd + 1);
      this.processLine(line);
    }
  }

  /**
   * Process a single response line
   */
  private processLine(raw: Buffer): void {
    const pending = this.pending;
    if (!pending) {
      if (!this.discarding) {
        this.queued.push(raw);
      }
      return;
    }

    // Body of a multi-line response
    if (pending.status) {
      const line = raw.toString('latin1');
      if (line === TERMINATOR) {
        this.settle(pending);
        pending.resolve({ status: pending.status.status, text: pending.status.text, lines: pending.lines });
      } else {
        pending.lines.push(unstuffLine(line));
      }
      return;
    }

    const line = raw.toString('utf8');
    if (!isStatusLine(line)) {
      this.settle(pending);
      pending.reject(new ResponseParseError(`Unexpected response to ${pending.label}`, line));
      return;
    }

    const status = parseStatusLine(line);
    if (status.status === '-ERR') {
      this.settle(pending);
      pending.reject(new ServerRejectionError(
        `Command failed: ${status.text}`,
        status.text,
        pending.label
      ));
      return;
    }

    if (pending.multiline) {
      pending.status = status;
      return;
    }

    this.settle(pending);
    pending.resolve({ status: status.status, text: status.text, lines: [] });
  }

  /**
   * Clear the pending slot and its timer
   */
  private settle(pending: PendingCommand): void {
    if (pending.timeoutId) {
      clearTimeout(pending.timeoutId);
    }
    if (this.pending === pending) {
      this.pending = null;
    }
  }

  private failPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.settle(pending);
    pending.reject(err);
  }

  /**
   * Register a waiter, optionally sending a command line first
   */
  private waitFor(label: string, line: string | null, options?: ExecuteOptions): Promise<Pop3Response> {
    return new Promise((resolve, reject) => {
      if (this.pending) {
        reject(new TransportError(
          `Cannot send ${label}: ${this.pending.label} is still waiting for a response`,
          this.channel.host,
          this.channel.port,
          undefined,
          'COMMAND_IN_PROGRESS'
        ));
        return;
      }

      const timeout = options?.timeout ?? this.defaultTimeout;
      const pending: PendingCommand = {
        label,
        multiline: options?.multiline ?? false,
        resolve,
        reject,
        lines: []
      };

      if (timeout > 0) {
        pending.timeoutId = setTimeout(() => {
          this.settle(pending);
          // A late reply belongs to this command, not the next one
          this.queued = [];
          this.discarding = true;
          reject(new TransportTimeoutError(
            `Command timed out after ${timeout}ms: ${label}`,
            this.channel.host,
            this.channel.port,
            label,
            timeout
          ));
        }, timeout);
      }

      this.pending = pending;
      this.discarding = false;

      if (line !== null) {
        try {
          this.channel.sendLine(line);
        } catch (err) {
          this.settle(pending);
          reject(err);
          return;
        }
      }

      // Replay anything the server sent ahead of the waiter
      while (this.queued.length > 0 && this.pending === pending) {
        const next = this.queued.shift();
        if (next !== undefined) {
          this.processLine(next);
        }
      }
    });
  }

  /**
   * Wait for the server greeting sent on connect
   * 
   * @returns The greeting response
   * @throws ServerRejectionError if the server greets with -ERR
   */
  readGreeting(options?: { timeout?: number }): Promise<Pop3Response> {
    return this.waitFor('greeting', null, options);
  }

  /**
   * Execute a POP3 command and wait for its response
   * 
   * @param command - Command line without CRLF
   * @param options - Execution options
   * @returns Promise resolving to the +OK response
   * @throws ServerRejectionError if the server answers -ERR
   * @throws TransportTimeoutError if the response does not arrive in time
   */
  executeCommand(command: string, options?: ExecuteOptions): Promise<Pop3Response> {
    return this.waitFor(maskCommand(command), command, options);
  }

  /**
   * Whether a command is waiting for its response
   */
  hasPendingCommand(): boolean {
    return this.pending !== null;
  }

  /**
   * Set the default timeout for operations
   * 
   * @param timeout - Timeout in milliseconds
   */
  setDefaultTimeout(timeout: number): void {
    this.defaultTimeout = timeout;
  }

  /**
   * Get the default timeout
   */
  getDefaultTimeout(): number {
    return this.defaultTimeout;
  }
}
