/**
 * Error class tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CancelledError,
  ConnectionError,
  MessageWriteError,
  NegotiationError,
  ProtocolError,
  ValidationError,
  getErrorCode,
  hasErrorCode,
  isCancellation,
} from '../src/errors.ts';

describe('errors', () => {
  it('should carry name and code', () => {
    const err = new NegotiationError('POST x -> 500 Internal Server Error');
    assert.strictEqual(err.name, 'NegotiationError');
    assert.strictEqual(err.code, 'NEGOTIATION_FAILED');
    assert.ok(err instanceof Error);
  });

  it('should default messages', () => {
    assert.strictEqual(new ConnectionError().message, 'Connection failed');
    assert.strictEqual(new CancelledError().message, 'Hub connection aborted');
    assert.strictEqual(new ValidationError('/type: bad').message, 'Validation failed! /type: bad');
  });

  it('should serialize to JSON with its code', () => {
    const json = new ConnectionError('gone').toJSON();
    assert.strictEqual(json.name, 'ConnectionError');
    assert.strictEqual(json.code, 'CONNECTION_FAILED');
    assert.strictEqual(json.message, 'gone');
  });

  it('should keep the failed message on write errors', () => {
    const cause = new ConnectionError('WebSocket is not open');
    const err = new MessageWriteError({ type: 6 }, cause);

    assert.strictEqual(err.message, 'Failed to write message of type 6: WebSocket is not open');
    assert.deepStrictEqual(err.hubMessage, { type: 6 });
    assert.strictEqual(err.cause, cause);
    assert.strictEqual(err.code, 'WRITE_FAILED');
  });

  it('should default the malformed frame length to zero', () => {
    assert.strictEqual(new ProtocolError('bad').consumed, 0);
    assert.strictEqual(new ProtocolError('bad', { consumed: 12 }).consumed, 12);
  });

  it('should read codes only from coded errors', () => {
    assert.strictEqual(getErrorCode(new CancelledError()), 'CANCELLED');
    assert.strictEqual(getErrorCode(new Error('plain')), undefined);
    assert.strictEqual(hasErrorCode('CANCELLED'), false);
  });

  it('should recognise cancellation', () => {
    assert.strictEqual(isCancellation(new CancelledError()), true);
    assert.strictEqual(isCancellation(new MessageWriteError({ type: 6 }, new CancelledError())), true);
    assert.strictEqual(isCancellation(new MessageWriteError({ type: 6 }, new ConnectionError())), false);
    assert.strictEqual(isCancellation(new ConnectionError()), false);
  });
});
