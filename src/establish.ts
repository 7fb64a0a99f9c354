/**
 * Transport selection.
 *
 * Given a negotiate result, opens the best transport the server offers:
 * WebSocket first, then Server-Sent Events. Exactly one transport is tried.
 */

import createDebug from 'debug';
import { TransportError } from './errors.ts';
import { findHeaderKey, getTransferFormats, routingId } from './helpers.ts';
import { ServerSentEventsConnection } from './transports/ServerSentEventsConnection.ts';
import { dialWebSocket } from './transports/WebSocketConnection.ts';
import type { WebSocketConnection } from './transports/WebSocketConnection.ts';
import type { Connection } from './transports/Connection.ts';
import { TransportName } from './types.ts';
import type { EstablishOptions, NegotiateResponse } from './types.ts';

const debug = createDebug('hublink:establish');

/**
 * WebSocket URL and upgrade headers for a negotiated connection.
 *
 * The scheme becomes `wss` for `https` and `ws` otherwise. A bearer token in
 * `Authorization` moves to the `access_token` query parameter and the header
 * is dropped.
 */
export function webSocketTarget(
  connectUrl: URL,
  headers: Record<string, string> | undefined
): { url: URL; headers: Record<string, string> } {
  const url = new URL(connectUrl.href);
  url.protocol = connectUrl.protocol === 'https:' ? 'wss:' : 'ws:';

  const upgradeHeaders = { ...headers };
  const authKey = findHeaderKey(upgradeHeaders, 'Authorization');
  if (authKey !== undefined) {
    const accessToken = (upgradeHeaders[authKey] ?? '').replace(/^Bearer /, '');
    delete upgradeHeaders[authKey];
    url.searchParams.set('access_token', accessToken);
  }

  return { url, headers: upgradeHeaders };
}

/**
 * Open the transport selected from `negotiated`.
 *
 * @param address - The hub address negotiation ran against
 * @returns The connection, or null when the server offers no supported
 *   transport
 * @throws TransportError when the selected transport cannot be opened
 */
export async function establishTransport(
  address: string,
  negotiated: NegotiateResponse,
  options: EstablishOptions = {}
): Promise<Connection | null> {
  const connectUrl = new URL(address);
  connectUrl.searchParams.set('id', routingId(negotiated));

  const webSocketFormats = getTransferFormats(negotiated, TransportName.WebSockets);
  if (webSocketFormats) {
    const target = webSocketTarget(connectUrl, options.headers ? options.headers() : undefined);
    const binary = !webSocketFormats.includes('Text') && webSocketFormats.includes('Binary');

    let connection: WebSocketConnection;
    try {
      connection = await dialWebSocket(negotiated.connectionId, target.url.href, {
        headers: target.headers,
        signal: options.signal,
        binary,
      });
    } catch (err) {
      throw new TransportError(
        `WebSocket dial to ${target.url.origin}${target.url.pathname} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    debug('Using WebSockets for %s', negotiated.connectionId);
    return connection;
  }

  if (getTransferFormats(negotiated, TransportName.ServerSentEvents)) {
    const httpClient = options.httpClient ?? fetch;
    const headers = { ...(options.headers ? options.headers() : {}), Accept: 'text/event-stream' };

    let response: Response;
    try {
      response = await httpClient(connectUrl.href, { method: 'GET', headers, signal: options.signal });
    } catch (err) {
      throw new TransportError(
        `GET ${connectUrl.href} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (response.status !== 200 || !response.body) {
      await response.text();
      throw new TransportError(`GET ${connectUrl.href} -> ${response.status} ${response.statusText}`);
    }

    debug('Using ServerSentEvents for %s', negotiated.connectionId);
    return new ServerSentEventsConnection({
      connectionId: negotiated.connectionId,
      url: connectUrl.href,
      body: response.body,
      httpClient,
      ...(options.headers ? { headers: options.headers } : {}),
    });
  }

  debug('No supported transport offered for %s', negotiated.connectionId);
  return null;
}
