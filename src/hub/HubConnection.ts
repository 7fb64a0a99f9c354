/**
 * Hub session over one established connection.
 *
 * Frames hub messages through a protocol, tracks the session lifecycle and
 * owns the cancellation scope that `abort()` fires.
 */

import createDebug from 'debug';
import { CancelledError, MessageWriteError, ProtocolError } from '../errors.ts';
import { runCancellable } from '../helpers.ts';
import type { HubProtocol, ReadResult } from '../protocol/HubProtocol.ts';
import type { Connection } from '../transports/Connection.ts';
import type { HubConnectionOptions } from '../types.ts';
import { MessageType } from '../wire.ts';
import type {
  CloseMessage,
  CompletionMessage,
  HubMessage,
  PingMessage,
  SendOnlyInvocationMessage,
  StreamItemMessage,
} from '../wire.ts';

const debug = createDebug('hublink:hub-connection');

export const DEFAULT_MAXIMUM_RECEIVE_MESSAGE_SIZE = 32 * 1024;

export type HubConnectionState = 'idle' | 'connected' | 'closed' | 'aborted';

export class HubConnection {
  /**
   * Caller-owned per-session values. The session itself never reads them.
   */
  readonly items = new Map<string, unknown>();

  private _connection: Connection;
  private _protocol: HubProtocol;
  private _maximumReceiveMessageSize: number;
  private _state: HubConnectionState = 'idle';
  private _abort = new AbortController();

  // Bytes read past the last parsed message. Only the in-flight read touches it.
  private _received: Buffer = Buffer.alloc(0);
  private _receiving = false;

  constructor(connection: Connection, protocol: HubProtocol, options: HubConnectionOptions = {}) {
    const maximumReceiveMessageSize =
      options.maximumReceiveMessageSize ?? DEFAULT_MAXIMUM_RECEIVE_MESSAGE_SIZE;
    if (!Number.isInteger(maximumReceiveMessageSize) || maximumReceiveMessageSize <= 0) {
      throw new RangeError(
        `maximumReceiveMessageSize must be a positive integer, got ${maximumReceiveMessageSize}`
      );
    }

    this._connection = connection;
    this._protocol = protocol;
    this._maximumReceiveMessageSize = maximumReceiveMessageSize;
  }

  get state(): HubConnectionState {
    return this._state;
  }

  get connectionId(): string {
    return this._connection.connectionId;
  }

  /**
   * The session's cancellation scope. Aborted by `abort()`.
   */
  get signal(): AbortSignal {
    return this._abort.signal;
  }

  /**
   * Mark the session connected. Only the first call on an idle session has
   * an effect.
   *
   * @returns Whether this call started the session
   */
  start(): boolean {
    if (this._state !== 'idle') return false;
    this._state = 'connected';
    debug('Started hub connection %s', this.connectionId);
    return true;
  }

  isConnected(): boolean {
    return this._state === 'connected';
  }

  /**
   * Leave the connected state and tell the peer with a close message.
   *
   * Does not cancel in-flight operations: a pending `receive()` keeps
   * waiting until the peer closes or `abort()` is called.
   */
  close(error?: string): Promise<CloseMessage> {
    if (this._state !== 'aborted') {
      this._state = 'closed';
    }
    debug('Closing hub connection %s (error: %s)', this.connectionId, error ?? '');

    const message: CloseMessage = {
      type: MessageType.Close,
      ...(error !== undefined ? { error } : {}),
      allowReconnect: true,
    };
    return this._writeMessage(message);
  }

  /**
   * Cancel every in-flight operation and close the underlying connection.
   */
  abort(): void {
    if (this._state === 'aborted') return;
    this._state = 'aborted';
    debug('Aborting hub connection %s', this.connectionId);
    this._abort.abort(new CancelledError());
    this._connection.close();
  }

  /**
   * Wait for the next complete message.
   *
   * Rejects with the transport or protocol error on failure, or with
   * `CancelledError` after `abort()`, once the pending read has finished.
   */
  async receive(): Promise<HubMessage> {
    if (this._receiving) {
      throw new Error('receive() is already in progress on this hub connection');
    }

    this._receiving = true;
    try {
      return await runCancellable(this._abort.signal, (signal) => this._readMessage(signal));
    } finally {
      this._receiving = false;
    }
  }

  sendInvocation(target: string, ...args: unknown[]): Promise<SendOnlyInvocationMessage> {
    return this._writeMessage({
      type: MessageType.Invocation,
      target,
      arguments: args,
    });
  }

  streamItem(invocationId: string, item: unknown): Promise<StreamItemMessage> {
    return this._writeMessage({
      type: MessageType.StreamItem,
      invocationId,
      item,
    });
  }

  /**
   * Complete an invocation with either an error or a result.
   */
  completion(invocationId: string, result: unknown, error?: string): Promise<CompletionMessage> {
    return this._writeMessage({
      type: MessageType.Completion,
      invocationId,
      ...(error ? { error } : { result }),
    });
  }

  ping(): Promise<PingMessage> {
    return this._writeMessage({ type: MessageType.Ping });
  }

  private async _readMessage(signal: AbortSignal): Promise<HubMessage> {
    for (;;) {
      let result: ReadResult;
      try {
        result = this._protocol.readMessage(this._received);
      } catch (err) {
        // Skip the bad frame so the next receive starts at the following one.
        if (err instanceof ProtocolError && err.consumed > 0) {
          this._received = this._received.subarray(err.consumed);
        }
        throw err;
      }
      if (result.complete) {
        this._received = this._received.subarray(result.consumed);
        return result.message;
      }

      if (signal.aborted) {
        throw new CancelledError();
      }
      const chunk = await this._connection.read(this._maximumReceiveMessageSize, signal);
      this._received = Buffer.concat([this._received, chunk]);
    }
  }

  private async _writeMessage<T extends HubMessage>(message: T): Promise<T> {
    try {
      await runCancellable(this._abort.signal, (signal) =>
        this._protocol.writeMessage(message, this._connection, signal)
      );
    } catch (err) {
      debug('Write of message type %d on %s failed: %o', message.type, this.connectionId, err);
      throw new MessageWriteError(message, err);
    }
    return message;
  }
}
