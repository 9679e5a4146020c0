/**
 * Transport layer for pop3-mailbox
 * Manages TCP socket connections to POP3 servers
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import type { ConnectionOptions } from '../types/config.js';
import { TransportError, TransportTimeoutError } from '../types/errors.js';

/**
 * Connection state
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting';

/**
 * Pop3Connection events interface for type safety
 */
export interface Pop3ConnectionEvents {
  data: (chunk: Buffer) => void;
  error: (err: Error) => void;
  close: () => void;
  connect: () => void;
}

/**
 * What the protocol layer needs from a connection. Emits the events of
 * Pop3ConnectionEvents.
 */
export interface LineChannel extends EventEmitter {
  readonly host: string;
  readonly port: number;
  /** Write one line, CRLF appended */
  sendLine(line: string): void;
}

/**
 * A channel the client can open and close
 */
export interface MailConnection extends LineChannel {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}

/**
 * Opens the TCP socket, calling onConnect once it is up
 */
export type SocketOpener = (options: net.TcpNetConnectOpts, onConnect: () => void) => net.Socket;

/**
 * Low-level POP3 connection manager
 * Handles TCP socket management and raw data transmission
 */
export class Pop3Connection extends EventEmitter implements MailConnection {
  private socket: net.Socket | null = null;
  private options: ConnectionOptions;
  private _state: ConnectionState = 'disconnected';
  private openSocket: SocketOpener;

  constructor(options: ConnectionOptions, openSocket: SocketOpener = net.createConnection) {
    super();
    this.openSocket = openSocket;
    this.options = {
      host: options.host,
      port: options.port,
      connTimeout: options.connTimeout ?? 30000
    };
  }

  /**
   * Current connection state
   */
  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Whether the connection is currently connected
   */
  get isConnected(): boolean {
    return this._state === 'connected';
  }

  /**
   * Host being connected to
   */
  get host(): string {
    return this.options.host;
  }

  /**
   * Port being connected to
   */
  get port(): number {
    return this.options.port;
  }


  /**
   * Establish connection to the POP3 server
   * @returns Promise that resolves when connected
   * @throws TransportError on connection failure
   * @throws TransportTimeoutError if connection times out
   */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this._state !== 'disconnected') {
        reject(new TransportError(
          `Cannot connect: connection is ${this._state}`,
          this.options.host,
          this.options.port
        ));
        return;
      }

      this._state = 'connecting';
      let timeoutId: NodeJS.Timeout | null = null;
      let settled = false;

      const cleanup = () => {
        if (timeoutId) {
          clearTimeout(timeoutId);
          timeoutId = null;
        }
      };

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        this.socket?.destroy();
        this._state = 'disconnected';
        this.socket = null;
        reject(new TransportError(
          `Connection failed: ${err.message}`,
          this.options.host,
          this.options.port,
          err
        ));
      };

      const onConnect = () => {
        if (settled) return;
        settled = true;
        cleanup();
        this._state = 'connected';
        this.setupSocketListeners();
        this.emit('connect');
        resolve();
      };

      if (this.options.connTimeout > 0) {
        timeoutId = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.socket?.destroy();
          this.socket = null;
          this._state = 'disconnected';
          reject(new TransportTimeoutError(
            `Connection timed out after ${this.options.connTimeout}ms`,
            this.options.host,
            this.options.port,
            'connect',
            this.options.connTimeout
          ));
        }, this.options.connTimeout);
      }

      try {
        this.socket = this.openSocket({
          host: this.options.host,
          port: this.options.port
        }, onConnect);
        this.socket.once('error', onError);
      } catch (err) {
        onError(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }


  /**
   * Setup socket event listeners after connection
   */
  private setupSocketListeners(): void {
    if (!this.socket) return;

    // Remove the one-time error handler from connect
    this.socket.removeAllListeners('error');

    this.socket.on('data', (chunk: Buffer) => {
      this.emit('data', chunk);
    });

    this.socket.on('error', (err: Error) => {
      // A reset while closing only ends the close early; 'close' follows
      if (this._state === 'disconnecting') return;
      this.emit('error', new TransportError(
        `Socket error: ${err.message}`,
        this.options.host,
        this.options.port,
        err
      ));
    });

    this.socket.on('close', () => {
      this._state = 'disconnected';
      this.socket = null;
      this.emit('close');
    });

    this.socket.on('end', () => {
      // Server closed the connection
      this._state = 'disconnected';
    });
  }


  /**
   * Disconnect from the POP3 server
   * @returns Promise that resolves when the socket is closed
   */
  disconnect(): Promise<void> {
    return new Promise((resolve) => {
      const socket = this.socket;
      if (this._state === 'disconnected' || !socket) {
        this._state = 'disconnected';
        resolve();
        return;
      }

      this._state = 'disconnecting';

      if (socket.destroyed) {
        this._state = 'disconnected';
        this.socket = null;
        resolve();
        return;
      }

      // Force destroy if graceful close takes too long
      const forceTimer = setTimeout(() => {
        if (!socket.destroyed) {
          socket.destroy();
        }
      }, 1000);

      socket.once('close', () => {
        clearTimeout(forceTimer);
        this._state = 'disconnected';
        this.socket = null;
        resolve();
      });
      socket.end();
    });
  }

  /**
   * Send raw data to the server
   * @param data - Data to send (string or Buffer)
   * @throws TransportError if not connected
   */
  send(data: string | Buffer): void {
    if (!this.socket || this._state !== 'connected') {
      throw new TransportError(
        'Cannot send data: not connected',
        this.options.host,
        this.options.port
      );
    }

    this.socket.write(data);
  }

  /**
   * Send a line of data (appends CRLF)
   * @param line - Line to send
   * @throws TransportError if not connected
   */
  sendLine(line: string): void {
    this.send(line + '\r\n');
  }
}
