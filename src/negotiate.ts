/**
 * Negotiate handshake.
 *
 * `POST {address}/negotiate` asks the server for a connection id (or token)
 * and the transports it offers.
 */

import createDebug from 'debug';
import { NegotiationError, ValidationError } from './errors.ts';
import { negotiatePayload } from './validation.ts';
import type { NegotiateOptions, NegotiatePayload, NegotiateResponse } from './types.ts';

const debug = createDebug('hublink:negotiate');

/**
 * Build the frozen response from a validated payload.
 */
function toNegotiateResponse(payload: NegotiatePayload): NegotiateResponse {
  const availableTransports = (payload.availableTransports ?? []).map((t) =>
    Object.freeze({
      transport: t.transport,
      transferFormats: Object.freeze([...t.transferFormats]),
    })
  );

  return Object.freeze({
    connectionId: payload.connectionId ?? '',
    ...(payload.connectionToken !== undefined ? { connectionToken: payload.connectionToken } : {}),
    ...(payload.negotiateVersion !== undefined ? { negotiateVersion: payload.negotiateVersion } : {}),
    availableTransports: Object.freeze(availableTransports),
  });
}

/**
 * Perform the negotiate request against `address`.
 *
 * Header and query-string providers are called once, at request time. The
 * response body is always read to the end.
 *
 * @throws NegotiationError on a non-200 status or an unusable body
 */
export async function negotiate(address: string, options: NegotiateOptions = {}): Promise<NegotiateResponse> {
  const httpClient = options.httpClient ?? fetch;

  const url = new URL(`${address}/negotiate`);
  if (options.queryString) {
    url.search = options.queryString();
  }
  const headers = options.headers ? options.headers() : {};

  debug('POST %s', url.href);
  const response = await httpClient(url.href, {
    method: 'POST',
    headers,
    signal: options.signal,
  });
  const body = await response.text();

  if (response.status !== 200) {
    throw new NegotiationError(`POST ${url.href} -> ${response.status} ${response.statusText}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new NegotiationError(
      `Malformed negotiate response from ${url.href}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  let payload: NegotiatePayload;
  try {
    payload = negotiatePayload.validate(parsed);
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new NegotiationError(`Unexpected negotiate response from ${url.href}: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }

  const result = toNegotiateResponse(payload);
  debug(
    'Negotiated connection %s (transports: %s)',
    result.connectionId,
    result.availableTransports.map((t) => t.transport).join(', ')
  );
  return result;
}
