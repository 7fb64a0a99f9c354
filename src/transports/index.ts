/**
 * Transport layer exports.
 */

export type { Connection } from './Connection.ts';

export { WebSocketConnection, dialWebSocket } from './WebSocketConnection.ts';
export { ServerSentEventsConnection } from './ServerSentEventsConnection.ts';
