/**
 * JSON hub protocol: UTF-8 JSON objects, each terminated by the ASCII record
 * separator (0x1E).
 */

import createDebug from 'debug';
import { ProtocolError, ValidationError } from '../errors.ts';
import { hubMessageValidators } from '../validation.ts';
import type { Connection } from '../transports/Connection.ts';
import type { HubMessage } from '../wire.ts';
import type { HubProtocol, ReadResult } from './HubProtocol.ts';

const debug = createDebug('hublink:json-protocol');

export const RECORD_SEPARATOR = 0x1e;

export class JsonHubProtocol implements HubProtocol {
  readonly name = 'json';
  readonly version = 1;
  readonly transferFormat = 'Text' as const;

  private _decoder = new TextDecoder('utf-8', { fatal: true });
  private _encoder = new TextEncoder();

  readMessage(buffer: Uint8Array): ReadResult {
    const end = buffer.indexOf(RECORD_SEPARATOR);
    if (end === -1) {
      return { complete: false };
    }

    const message = this._parse(buffer.subarray(0, end), end + 1);
    return { complete: true, message, consumed: end + 1 };
  }

  async writeMessage(message: HubMessage, connection: Connection, signal?: AbortSignal): Promise<void> {
    const payload = this._encoder.encode(JSON.stringify(message));
    const frame = new Uint8Array(payload.length + 1);
    frame.set(payload);
    frame[payload.length] = RECORD_SEPARATOR;

    debug('Writing message type %d (%d bytes)', message.type, frame.length);
    await connection.write(frame, signal);
  }

  private _parse(frame: Uint8Array, consumed: number): HubMessage {
    let value: unknown;
    try {
      value = JSON.parse(this._decoder.decode(frame));
    } catch (err) {
      throw new ProtocolError(
        `Malformed hub frame: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err, consumed }
      );
    }

    if (typeof value !== 'object' || value === null || !('type' in value) || typeof value.type !== 'number') {
      throw new ProtocolError('Hub frame has no numeric type', { consumed });
    }

    const validator = hubMessageValidators.get(value.type);
    if (!validator) {
      throw new ProtocolError(`Unknown hub message type: ${value.type}`, { consumed });
    }

    try {
      return validator.validate(value);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ProtocolError(`Invalid hub message of type ${value.type}: ${err.message}`, {
          cause: err,
          consumed,
        });
      }
      throw err;
    }
  }
}
