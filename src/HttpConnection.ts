/**
 * One-call connection setup: negotiate, then establish the selected
 * transport with the same options.
 */

import { establishTransport } from './establish.ts';
import { negotiate } from './negotiate.ts';
import type { Connection } from './transports/Connection.ts';
import type { HttpConnectionOptions } from './types.ts';

/**
 * Create a connection to the hub at `address`.
 *
 * `options.signal` cancels negotiation and the transport handshake, not the
 * connection once it is established.
 *
 * @returns The connection, or null when the server offers no supported
 *   transport
 *
 * @example
 * ```ts
 * const connection = await createHttpConnection('https://example.test/chat', {
 *   headers: () => ({ Authorization: `Bearer ${currentToken()}` }),
 * });
 * if (!connection) throw new Error('No usable transport');
 * const hub = new HubConnection(connection, new JsonHubProtocol());
 * ```
 */
export async function createHttpConnection(
  address: string,
  options: HttpConnectionOptions = {}
): Promise<Connection | null> {
  const negotiated = await negotiate(address, options);
  return establishTransport(address, negotiated, options);
}
