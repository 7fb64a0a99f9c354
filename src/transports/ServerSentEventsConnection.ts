/**
 * Connection over Server-Sent Events.
 *
 * Reads come from a long-lived `text/event-stream` response: the `data:`
 * lines of every event become readable bytes. Writes are separate POST
 * requests to the same URL.
 */

import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import createDebug from 'debug';
import { CancelledError, ConnectionError } from '../errors.ts';
import type { HeadersProvider, HttpClient } from '../types.ts';
import type { Connection } from './Connection.ts';
import { ReadBuffer } from './ReadBuffer.ts';

const debug = createDebug('hublink:sse-connection');

export interface ServerSentEventsConnectionOptions {
  connectionId: string;
  /** URL carrying the `id` query parameter; sends are POSTed here. */
  url: string;
  /** Body of the event-stream response. */
  body: ReadableStream<Uint8Array>;
  /** HTTP client for sends (default: global `fetch`). */
  httpClient?: HttpClient;
  headers?: HeadersProvider;
}

export class ServerSentEventsConnection implements Connection {
  readonly connectionId: string;

  private _url: string;
  private _httpClient: HttpClient;
  private _headers: HeadersProvider | undefined;
  private _reader: ReadableStreamDefaultReader<Uint8Array>;
  private _incoming = new ReadBuffer();
  private _decoder = new TextDecoder();
  private _encoder = new TextEncoder();
  private _pending = '';
  private _data: string[] = [];

  constructor(options: ServerSentEventsConnectionOptions) {
    this.connectionId = options.connectionId;
    this._url = options.url;
    this._httpClient = options.httpClient ?? fetch;
    this._headers = options.headers;
    this._reader = options.body.getReader();

    this._pump().catch((err: unknown) => {
      debug('Event stream of %s failed: %o', this.connectionId, err);
      this._incoming.end(
        new ConnectionError(
          `Event stream failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        )
      );
    });
  }

  read(maxBytes: number, signal?: AbortSignal): Promise<Uint8Array> {
    return this._incoming.read(maxBytes, signal);
  }

  async write(data: Uint8Array, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const response = await this._httpClient(this._url, {
      method: 'POST',
      headers: { ...(this._headers ? this._headers() : {}), 'Content-Type': 'text/plain;charset=UTF-8' },
      body: new TextDecoder().decode(data),
      signal,
    });
    // Drain so the underlying socket can be reused.
    await response.text();

    if (response.status !== 200) {
      throw new ConnectionError(`POST ${this._url} -> ${response.status} ${response.statusText}`);
    }
    return data.length;
  }

  close(): void {
    debug('Closing connection %s', this.connectionId);
    this._reader.cancel().catch((err: unknown) => debug('Cancel of event stream failed: %o', err));
  }

  private async _pump(): Promise<void> {
    for (;;) {
      const { value, done } = await this._reader.read();
      if (done) break;
      this._pending += this._decoder.decode(value, { stream: true });
      this._drainLines();
    }
    debug('Event stream of %s ended', this.connectionId);
    this._incoming.end(new ConnectionError('Event stream ended'));
  }

  /**
   * Consume complete lines of `_pending`, dispatching an event on each blank
   * line.
   */
  private _drainLines(): void {
    let newline: number;
    while ((newline = this._pending.indexOf('\n')) !== -1) {
      let line = this._pending.slice(0, newline);
      this._pending = this._pending.slice(newline + 1);
      if (line.endsWith('\r')) line = line.slice(0, -1);

      if (line === '') {
        this._dispatch();
        continue;
      }
      if (line.startsWith(':')) continue; // comment / keep-alive

      const colon = line.indexOf(':');
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? '' : line.slice(colon + 1);
      if (value.startsWith(' ')) value = value.slice(1);

      if (field === 'data') {
        this._data.push(value);
      }
    }
  }

  private _dispatch(): void {
    if (this._data.length === 0) return;
    const payload = this._data.join('\n');
    this._data = [];
    this._incoming.push(this._encoder.encode(payload));
  }
}
