/**
 * Core type definitions shared by negotiation, transports and hub sessions.
 */

/**
 * Transport names a server can advertise in its negotiate response.
 */
export const TransportName = {
  WebSockets: 'WebSockets',
  ServerSentEvents: 'ServerSentEvents',
  LongPolling: 'LongPolling',
} as const;

export type TransferFormat = 'Text' | 'Binary';

/**
 * The subset of `RequestInit` this library sends.
 */
export interface HttpRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * HTTP capability used for negotiation and the SSE transport. The global
 * `fetch` satisfies it.
 */
export type HttpClient = (url: string, init: HttpRequestInit) => Promise<Response>;

/**
 * Lazily supplies request headers. Called once per request, so tokens can be
 * refreshed between attempts.
 */
export type HeadersProvider = () => Record<string, string>;

/**
 * Lazily supplies the raw query string of the negotiate request.
 */
export type QueryStringProvider = () => string;

export interface AvailableTransport {
  readonly transport: string;
  readonly transferFormats: readonly string[];
}

/**
 * Capability response of `POST {address}/negotiate`, as sent by the server.
 */
export interface NegotiatePayload {
  connectionId?: string;
  connectionToken?: string;
  negotiateVersion?: number;
  availableTransports?: { transport: string; transferFormats: string[] }[];
}

/**
 * Normalized, frozen negotiate result.
 */
export interface NegotiateResponse {
  readonly connectionId: string;
  /** Routing id that supersedes `connectionId` when non-empty. */
  readonly connectionToken?: string;
  readonly negotiateVersion?: number;
  readonly availableTransports: readonly AvailableTransport[];
}

/**
 * Options for `negotiate()`.
 */
export interface NegotiateOptions {
  /** HTTP client (default: global `fetch`). */
  httpClient?: HttpClient;
  headers?: HeadersProvider;
  queryString?: QueryStringProvider;
  /** Cancels the negotiate request. */
  signal?: AbortSignal;
}

/**
 * Options for `establishTransport()`.
 */
export interface EstablishOptions {
  /** HTTP client for the SSE transport (default: global `fetch`). */
  httpClient?: HttpClient;
  headers?: HeadersProvider;
  /** Cancels the dial or the SSE request, never the established connection. */
  signal?: AbortSignal;
}

/**
 * Options for `createHttpConnection()`.
 */
export type HttpConnectionOptions = NegotiateOptions & EstablishOptions;

/**
 * Options for `HubConnection`.
 */
export interface HubConnectionOptions {
  /** Upper bound of a single connection read, in bytes (default: 32 KiB). */
  maximumReceiveMessageSize?: number;
}
