/**
 * Test utilities: in-process stand-ins for connections, HTTP and WebSocket
 * servers.
 */

import type { IncomingMessage } from 'node:http';
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import type { Connection } from '../src/transports/Connection.ts';
import { ReadBuffer } from '../src/transports/ReadBuffer.ts';
import type { HttpClient, HttpRequestInit } from '../src/types.ts';

/**
 * Promise with its settle functions exposed.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Track whether a promise has settled, without affecting it.
 */
export function track<T>(promise: Promise<T>): { readonly settled: boolean; promise: Promise<T> } {
  const state = { settled: false, promise };
  promise.then(
    () => {
      state.settled = true;
    },
    () => {
      state.settled = true;
    }
  );
  return state;
}

/**
 * Scripted connection. Bytes are fed in by the test; writes are recorded.
 */
export class FakeConnection implements Connection {
  readonly connectionId: string;
  readonly written: Uint8Array[] = [];
  readonly readSizes: number[] = [];
  closed = false;
  writeError: Error | null = null;

  private _incoming = new ReadBuffer();

  constructor(connectionId = 'conn-1') {
    this.connectionId = connectionId;
  }

  feed(text: string): void {
    this._incoming.push(Buffer.from(text, 'utf8'));
  }

  fail(err: Error): void {
    this._incoming.end(err);
  }

  writtenText(): string[] {
    return this.written.map((chunk) => Buffer.from(chunk).toString('utf8'));
  }

  read(maxBytes: number, signal?: AbortSignal): Promise<Uint8Array> {
    this.readSizes.push(maxBytes);
    return this._incoming.read(maxBytes, signal);
  }

  async write(data: Uint8Array): Promise<number> {
    if (this.writeError) throw this.writeError;
    this.written.push(data);
    return data.length;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Connection whose reads and writes ignore cancellation and only finish when
 * the test settles them.
 */
export class StubbornConnection implements Connection {
  readonly connectionId = 'stubborn';
  readonly reads: Deferred<Uint8Array>[] = [];
  readonly writes: Deferred<number>[] = [];
  closed = false;

  read(): Promise<Uint8Array> {
    const d = deferred<Uint8Array>();
    this.reads.push(d);
    return d.promise;
  }

  write(): Promise<number> {
    const d = deferred<number>();
    this.writes.push(d);
    return d.promise;
  }

  close(): void {
    this.closed = true;
  }
}

export interface RecordedRequest {
  url: string;
  init: HttpRequestInit;
}

/**
 * HTTP client answering from `handler` and recording every request.
 */
export function recordingHttpClient(
  handler: (url: string, init: HttpRequestInit) => Response | Promise<Response>
): { client: HttpClient; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const client: HttpClient = async (url, init) => {
    requests.push({ url, init });
    return handler(url, init);
  };
  return { client, requests };
}

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

export interface TestServer {
  server: WebSocketServer;
  port: number;
  /** Resolves with the first accepted socket and its upgrade request. */
  connection: Promise<{ socket: WebSocket; request: IncomingMessage }>;
  close: () => Promise<void>;
}

/**
 * Start a loopback WebSocket server on a free port.
 */
export async function startWebSocketServer(): Promise<TestServer> {
  const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`Unexpected server address: ${address}`);
  }

  const connection = new Promise<{ socket: WebSocket; request: IncomingMessage }>((resolve) => {
    server.once('connection', (socket, request) => resolve({ socket, request }));
  });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      for (const client of server.clients) {
        client.terminate();
      }
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { server, port: address.port, connection, close };
}

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
