/**
 * Hub protocol interface.
 *
 * A protocol knows how one message is laid out on the wire. It never owns a
 * buffer: the session accumulates bytes and asks the protocol whether a whole
 * message is available yet.
 */

import type { Connection } from '../transports/Connection.ts';
import type { TransferFormat } from '../types.ts';
import type { HubMessage } from '../wire.ts';

export type ReadResult =
  | { complete: false }
  | {
      complete: true;
      message: HubMessage;
      /** Number of leading bytes of the buffer the message occupied. */
      consumed: number;
    };

export interface HubProtocol {
  readonly name: string;
  readonly version: number;
  readonly transferFormat: TransferFormat;

  /**
   * Parse the first message of `buffer`, without modifying it.
   *
   * @throws ProtocolError when the leading frame is malformed, with
   *   `consumed` set to the frame's length when its end is known
   */
  readMessage(buffer: Uint8Array): ReadResult;

  /**
   * Serialize one message and write it to `connection`.
   */
  writeMessage(message: HubMessage, connection: Connection, signal?: AbortSignal): Promise<void>;
}
