/**
 * Queue of bytes received by a transport, waiting to be read.
 *
 * Transports push whatever arrives (frames, event payloads); readers take at
 * most `maxBytes` at a time in arrival order.
 */

import { CancelledError } from '../errors.ts';

export class ReadBuffer {
  private _chunks: Uint8Array[] = [];
  private _error: Error | null = null;
  private _waiters = new Set<() => void>();

  push(chunk: Uint8Array): void {
    if (this._error || chunk.length === 0) return;
    this._chunks.push(chunk);
    this._wake();
  }

  /**
   * Mark the stream as finished. Buffered bytes stay readable; afterwards
   * every read rejects with `error`. Only the first call counts.
   */
  end(error: Error): void {
    if (this._error) return;
    this._error = error;
    this._wake();
  }

  async read(maxBytes: number, signal?: AbortSignal): Promise<Uint8Array> {
    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const chunk = this._take(maxBytes);
      if (chunk) return chunk;
      if (this._error) throw this._error;
      await this._wait(signal);
    }
  }

  private _take(maxBytes: number): Uint8Array | null {
    const head = this._chunks[0];
    if (!head) return null;

    if (head.length <= maxBytes) {
      this._chunks.shift();
      return head;
    }

    this._chunks[0] = head.subarray(maxBytes);
    return head.subarray(0, maxBytes);
  }

  private _wait(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this._waiters.delete(wake);
        reject(new CancelledError());
      };
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      this._waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private _wake(): void {
    const waiters = [...this._waiters];
    this._waiters.clear();
    for (const wake of waiters) wake();
  }
}
