import { PassThrough } from 'node:stream';
import { vi, type Mock } from 'vitest';
import { Connection } from '../src/transport/connection.js';

/**
 * Two connections wired back to back through in-memory streams
 */
export interface ConnectionPair {
  left: Connection;
  right: Connection;
  /** Raw stream carrying left -> right bytes */
  leftToRight: PassThrough;
  /** Raw stream carrying right -> left bytes */
  rightToLeft: PassThrough;
}

export function createConnectionPair(): ConnectionPair {
  const leftToRight = new PassThrough();
  const rightToLeft = new PassThrough();
  return {
    left: new Connection(rightToLeft, leftToRight),
    right: new Connection(leftToRight, rightToLeft),
    leftToRight,
    rightToLeft,
  };
}

/**
 * A connection plus the raw streams a test drives by hand
 */
export interface ScriptedConnection {
  connection: Connection;
  /** Write here to feed the connection */
  inbound: PassThrough;
  /** Everything the connection writes ends up here */
  outbound: PassThrough;
}

export function createScriptedConnection(): ScriptedConnection {
  const inbound = new PassThrough();
  const outbound = new PassThrough();
  return {
    connection: new Connection(inbound, outbound),
    inbound,
    outbound,
  };
}

/**
 * Collect everything written to a stream until it ends
 */
export async function collect(stream: PassThrough): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return new Uint8Array(Buffer.concat(chunks));
}

/**
 * Logger whose methods are spies
 */
export interface MockLogger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function mockLogger(): MockLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/**
 * Let pending I/O callbacks run
 */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Promise with its resolver exposed
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
