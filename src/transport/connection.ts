import type { Socket } from 'node:net';
import type { Readable, Writable } from 'node:stream';
import { concatBytes } from '../crypto/utils.js';
import { ChannelError } from '../errors.js';

/**
 * Why the inbound side of a connection stopped
 */
export type ConnectionEndReason = 'end' | 'error' | 'closed';

interface PendingRead {
  size: number;
  resolve: (bytes: Uint8Array | null) => void;
}

/**
 * Bidirectional byte stream with exact-length reads.
 *
 * Owned by the peer driver and lent to the handshake and session. A single
 * task drives it, so at most one read may be outstanding.
 */
export class Connection {
  private buffered: Uint8Array = new Uint8Array(0);
  private pending: PendingRead | null = null;
  private ended = false;
  private isClosed = false;
  private reason: ConnectionEndReason | null = null;
  private lastError: Error | null = null;

  constructor(
    private readonly readable: Readable,
    private readonly writable: Writable
  ) {
    readable.on('data', (chunk: Buffer | string) => this.handleData(chunk));
    readable.on('end', () => this.markEnded('end'));
    readable.on('close', () => this.markEnded('closed'));
    readable.on('error', (error: Error) => {
      this.lastError = error;
      this.markEnded('error');
    });

    if (!Object.is(readable, writable)) {
      writable.on('error', (error: Error) => {
        this.lastError = error;
      });
    }
  }

  /**
   * Wrap a connected TCP socket
   */
  static fromSocket(socket: Socket): Connection {
    return new Connection(socket, socket);
  }

  /**
   * Read exactly `size` bytes.
   * Resolves `null` if the stream ends or fails before that many bytes arrive.
   */
  readExact(size: number): Promise<Uint8Array | null> {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid read size: ${size}`);
    }
    if (this.pending) {
      throw new Error('A read is already pending on this connection');
    }
    if (size === 0) {
      return Promise.resolve(new Uint8Array(0));
    }
    if (this.buffered.length >= size) {
      return Promise.resolve(this.consume(size));
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this.pending = { size, resolve };
    });
  }

  /**
   * Write bytes and wait until the stream has accepted them
   */
  write(bytes: Uint8Array): Promise<void> {
    if (this.isClosed || this.writable.destroyed || this.writable.writableEnded) {
      return Promise.reject(
        ChannelError.connectionFailed('write', new Error('connection is closed'))
      );
    }

    return new Promise((resolve, reject) => {
      this.writable.write(bytes, (error) => {
        if (error) {
          this.lastError = error;
          reject(ChannelError.connectionFailed('write', error));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close both directions. Pending and later reads resolve `null`.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.writable.end();
    if (!Object.is(this.readable, this.writable)) {
      this.readable.destroy();
    }
    this.markEnded('closed');
  }

  /** Whether close() has been called */
  get closed(): boolean {
    return this.isClosed;
  }

  /** Why reads stopped, or null while the inbound side is open */
  get endReason(): ConnectionEndReason | null {
    return this.reason;
  }

  /** Last transport error seen, if any */
  get error(): Error | null {
    return this.lastError;
  }

  private handleData(chunk: Buffer | string): void {
    const bytes = typeof chunk === 'string' ? new TextEncoder().encode(chunk) : new Uint8Array(chunk);
    this.buffered = concatBytes(this.buffered, bytes);

    const pending = this.pending;
    if (pending && this.buffered.length >= pending.size) {
      this.pending = null;
      pending.resolve(this.consume(pending.size));
    }
  }

  private markEnded(reason: ConnectionEndReason): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.reason = reason;

    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(null);
    }
  }

  private consume(size: number): Uint8Array {
    const out = this.buffered.slice(0, size);
    this.buffered = this.buffered.slice(size);
    return out;
  }
}
