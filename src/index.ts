/**
 * hublink: client transport and session layer for a SignalR-style hub
 * protocol.
 *
 * ## Public API
 * - `negotiate` / `establishTransport` / `createHttpConnection` open a
 *   `Connection` (WebSocket preferred, Server-Sent Events otherwise).
 * - `HubConnection` runs a hub session over that connection with a
 *   `HubProtocol` such as `JsonHubProtocol`.
 *
 * ## Example
 * ```ts
 * import { createHttpConnection, HubConnection, JsonHubProtocol } from 'hublink';
 *
 * const connection = await createHttpConnection('http://127.0.0.1:5000/chat');
 * if (!connection) throw new Error('Server offers no supported transport');
 *
 * const hub = new HubConnection(connection, new JsonHubProtocol());
 * hub.start();
 * await hub.sendInvocation('Send', 'alice', 'hello');
 * const message = await hub.receive();
 * console.log(message);
 * hub.abort();
 * ```
 *
 * @packageDocumentation
 */

// Runtime exports
export { negotiate } from './negotiate.ts';
export { establishTransport, webSocketTarget } from './establish.ts';
export { createHttpConnection } from './HttpConnection.ts';
export { HubConnection, DEFAULT_MAXIMUM_RECEIVE_MESSAGE_SIZE } from './hub/HubConnection.ts';
export { JsonHubProtocol, RECORD_SEPARATOR } from './protocol/JsonHubProtocol.ts';
export { WebSocketConnection, dialWebSocket, ServerSentEventsConnection } from './transports/index.ts';
export { MessageType } from './wire.ts';
export { TransportName } from './types.ts';
export {
  ErrorCode,
  NegotiationError,
  TransportError,
  ConnectionError,
  ProtocolError,
  ValidationError,
  CancelledError,
  MessageWriteError,
  hasErrorCode,
  getErrorCode,
  isCancellation,
} from './errors.ts';

// Type-only exports
export type {
  TransferFormat,
  HttpClient,
  HttpRequestInit,
  HeadersProvider,
  QueryStringProvider,
  AvailableTransport,
  NegotiatePayload,
  NegotiateResponse,
  NegotiateOptions,
  EstablishOptions,
  HttpConnectionOptions,
  HubConnectionOptions,
} from './types.ts';

export type {
  MessageTypeValue,
  HubMessage,
  InvocationMessage,
  SendOnlyInvocationMessage,
  StreamItemMessage,
  CompletionMessage,
  StreamInvocationMessage,
  CancelInvocationMessage,
  PingMessage,
  CloseMessage,
} from './wire.ts';

export type { HubConnectionState } from './hub/HubConnection.ts';
export type { HubProtocol, ReadResult } from './protocol/HubProtocol.ts';
export type { Connection } from './transports/index.ts';
export type { WebSocketConnectionOptions, DialOptions } from './transports/WebSocketConnection.ts';
export type { ServerSentEventsConnectionOptions } from './transports/ServerSentEventsConnection.ts';
export type { ErrorCodeType } from './errors.ts';
