/**
 * Byte-stream connection established by negotiation.
 *
 * A hub session only ever reads and writes raw bytes through this interface;
 * message framing belongs to the hub protocol.
 */

export interface Connection {
  /**
   * Negotiated connection id, used for correlation.
   */
  readonly connectionId: string;

  /**
   * Read at most `maxBytes` bytes, waiting until some are available.
   *
   * Rejects once the transport is closed and nothing is buffered, or with
   * `CancelledError` when `signal` aborts.
   */
  read(maxBytes: number, signal?: AbortSignal): Promise<Uint8Array>;

  /**
   * Write bytes to the peer.
   *
   * @returns The number of bytes written
   */
  write(data: Uint8Array, signal?: AbortSignal): Promise<number>;

  /**
   * Close the underlying transport.
   */
  close(): void;
}
