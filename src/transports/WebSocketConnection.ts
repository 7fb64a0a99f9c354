/**
 * Connection over a `ws` WebSocket.
 *
 * Every incoming frame is appended to the read buffer as raw bytes; the hub
 * protocol finds message boundaries. Outgoing writes are sent as one frame
 * each.
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import createDebug from 'debug';
import { CancelledError, ConnectionError } from '../errors.ts';
import type { Connection } from './Connection.ts';
import { ReadBuffer } from './ReadBuffer.ts';

const debug = createDebug('hublink:ws-connection');

export interface WebSocketConnectionOptions {
  /** Send binary frames instead of text frames (default: false). */
  binary?: boolean;
}

export interface DialOptions extends WebSocketConnectionOptions {
  /** Headers of the upgrade request. */
  headers: Record<string, string>;
  /** Cancels the handshake. */
  signal?: AbortSignal;
}

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

/**
 * Resolve once `ws` completed its handshake.
 */
function waitForOpen(ws: WebSocket, url: string, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const onOpen = () => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      ws.off('error', onError);
      debug('Connected to %s', url);
      resolve();
    };

    const onError = (err: Error) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      ws.off('open', onOpen);
      reject(err);
    };

    const onAbort = () => {
      if (settled) return;
      settled = true;
      ws.off('open', onOpen);
      ws.off('error', onError);
      ws.terminate();
      reject(new CancelledError('WebSocket dial cancelled'));
    };

    ws.once('open', onOpen);
    ws.on('error', onError);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Open a WebSocket connection and resolve once the handshake completed.
 *
 * The connection listens on the socket before it opens, so frames the server
 * sends with the upgrade response are buffered.
 */
export async function dialWebSocket(
  connectionId: string,
  url: string,
  options: DialOptions
): Promise<WebSocketConnection> {
  const { signal } = options;
  if (signal?.aborted) {
    throw new CancelledError('WebSocket dial cancelled');
  }

  debug('Dialing %s', url);
  const ws = new WebSocket(url, { headers: options.headers });
  const connection = new WebSocketConnection(connectionId, ws, { binary: options.binary ?? false });
  await waitForOpen(ws, url, signal);
  return connection;
}

export class WebSocketConnection implements Connection {
  readonly connectionId: string;

  private _ws: WebSocket;
  private _binary: boolean;
  private _incoming = new ReadBuffer();

  /**
   * Listens on `ws` from here on; construct it before the socket opens.
   */
  constructor(connectionId: string, ws: WebSocket, options: WebSocketConnectionOptions = {}) {
    this.connectionId = connectionId;
    this._ws = ws;
    this._binary = options.binary ?? false;

    this._ws.on('message', (data: RawData) => {
      this._incoming.push(toBytes(data));
    });

    this._ws.on('close', (code: number, reason: Buffer) => {
      debug('Connection %s closed (code: %d, reason: %s)', this.connectionId, code, reason.toString());
      this._incoming.end(new ConnectionError(`WebSocket closed (code: ${code})`));
    });

    this._ws.on('error', (err: Error) => {
      debug('Connection %s error: %o', this.connectionId, err);
      this._incoming.end(new ConnectionError(`WebSocket error: ${err.message}`, { cause: err }));
    });
  }

  read(maxBytes: number, signal?: AbortSignal): Promise<Uint8Array> {
    return this._incoming.read(maxBytes, signal);
  }

  write(data: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (this._ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError('WebSocket is not open'));
    }

    return new Promise((resolve, reject) => {
      this._ws.send(data, { binary: this._binary }, (err?: Error) => {
        if (err) {
          reject(new ConnectionError(`WebSocket send failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve(data.length);
      });
    });
  }

  close(): void {
    if (this._ws.readyState === WebSocket.CLOSING || this._ws.readyState === WebSocket.CLOSED) {
      return;
    }
    debug('Closing connection %s', this.connectionId);
    this._ws.close(1000);
  }
}
