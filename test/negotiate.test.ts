/**
 * Negotiate handshake tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { negotiate } from '../src/negotiate.ts';
import { NegotiationError } from '../src/errors.ts';
import { jsonResponse, recordingHttpClient } from './helpers.ts';

const ADDRESS = 'http://127.0.0.1:5000/chat';

const negotiateBody = {
  connectionId: 'conn-1',
  connectionToken: 'token-1',
  negotiateVersion: 1,
  availableTransports: [
    { transport: 'WebSockets', transferFormats: ['Text', 'Binary'] },
    { transport: 'ServerSentEvents', transferFormats: ['Text'] },
  ],
};

describe('negotiate()', () => {
  it('should POST to the negotiate endpoint', async () => {
    const { client, requests } = recordingHttpClient(() => jsonResponse(negotiateBody));

    await negotiate(ADDRESS, { httpClient: client });

    assert.strictEqual(requests.length, 1);
    assert.strictEqual(requests[0]?.url, 'http://127.0.0.1:5000/chat/negotiate');
    assert.strictEqual(requests[0]?.init.method, 'POST');
    assert.deepStrictEqual(requests[0]?.init.headers, {});
  });

  it('should apply the query string and headers providers once per call', async () => {
    const { client, requests } = recordingHttpClient(() => jsonResponse(negotiateBody));
    let headerCalls = 0;
    let queryCalls = 0;

    await negotiate(ADDRESS, {
      httpClient: client,
      headers: () => {
        headerCalls++;
        return { Authorization: `Bearer token-${headerCalls}` };
      },
      queryString: () => {
        queryCalls++;
        return 'tenant=a&v=2';
      },
    });

    assert.strictEqual(headerCalls, 1);
    assert.strictEqual(queryCalls, 1);
    assert.strictEqual(requests[0]?.url, 'http://127.0.0.1:5000/chat/negotiate?tenant=a&v=2');
    assert.deepStrictEqual(requests[0]?.init.headers, { Authorization: 'Bearer token-1' });
  });

  it('should pass the signal to the HTTP client', async () => {
    const { client, requests } = recordingHttpClient(() => jsonResponse(negotiateBody));
    const controller = new AbortController();

    await negotiate(ADDRESS, { httpClient: client, signal: controller.signal });

    assert.strictEqual(requests[0]?.init.signal, controller.signal);
  });

  it('should return the parsed capabilities', async () => {
    const { client } = recordingHttpClient(() => jsonResponse(negotiateBody));

    const result = await negotiate(ADDRESS, { httpClient: client });

    assert.deepStrictEqual(result, negotiateBody);
    assert.ok(Object.isFrozen(result));
    assert.ok(Object.isFrozen(result.availableTransports));
    assert.ok(Object.isFrozen(result.availableTransports[0]));
  });

  it('should default missing fields', async () => {
    const { client } = recordingHttpClient(() => jsonResponse({ connectionToken: 'only-token' }));

    const result = await negotiate(ADDRESS, { httpClient: client });

    assert.deepStrictEqual(result, {
      connectionId: '',
      connectionToken: 'only-token',
      availableTransports: [],
    });
  });

  it('should fail with method, URL and status on a non-200 response', async () => {
    const response = new Response('server exploded', { status: 500, statusText: 'Internal Server Error' });
    const { client } = recordingHttpClient(() => response);

    await assert.rejects(negotiate(ADDRESS, { httpClient: client }), (err: unknown) => {
      assert.ok(err instanceof NegotiationError);
      assert.strictEqual(err.code, 'NEGOTIATION_FAILED');
      assert.strictEqual(err.message, 'POST http://127.0.0.1:5000/chat/negotiate -> 500 Internal Server Error');
      return true;
    });
    assert.strictEqual(response.bodyUsed, true);
  });

  it('should include the query string in the failure URL', async () => {
    const { client } = recordingHttpClient(() => new Response(null, { status: 401, statusText: 'Unauthorized' }));

    await assert.rejects(negotiate(ADDRESS, { httpClient: client, queryString: () => 'a=1' }), {
      name: 'NegotiationError',
      message: 'POST http://127.0.0.1:5000/chat/negotiate?a=1 -> 401 Unauthorized',
    });
  });

  it('should fail on a body that is not JSON', async () => {
    const { client } = recordingHttpClient(() => new Response('<html>', { status: 200 }));

    await assert.rejects(negotiate(ADDRESS, { httpClient: client }), (err: unknown) => {
      assert.ok(err instanceof NegotiationError);
      assert.ok(err.message.startsWith('Malformed negotiate response from http://127.0.0.1:5000/chat/negotiate: '));
      assert.ok(err.cause instanceof SyntaxError);
      return true;
    });
  });

  it('should fail on a body with the wrong shape', async () => {
    const { client } = recordingHttpClient(() =>
      jsonResponse({ connectionId: 5, availableTransports: [{ transport: 'WebSockets' }] })
    );

    await assert.rejects(negotiate(ADDRESS, { httpClient: client }), (err: unknown) => {
      assert.ok(err instanceof NegotiationError);
      assert.ok(
        err.message.startsWith('Unexpected negotiate response from http://127.0.0.1:5000/chat/negotiate: Validation failed!')
      );
      return true;
    });
  });

  it('should propagate HTTP client failures unwrapped', async () => {
    const failure = new TypeError('fetch failed');
    const { client } = recordingHttpClient(() => Promise.reject(failure));

    await assert.rejects(negotiate(ADDRESS, { httpClient: client }), (err: unknown) => {
      assert.strictEqual(err, failure);
      assert.ok(!(err instanceof NegotiationError));
      return true;
    });
  });
});
