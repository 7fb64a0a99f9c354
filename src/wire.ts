/**
 * Hub protocol messages.
 *
 * Every message is tagged by an integer `type`. The session sends invocation,
 * stream item, completion, ping and close; stream invocation and cancel
 * invocation are only ever received.
 */

export const MessageType = {
  Invocation: 1,
  StreamItem: 2,
  Completion: 3,
  StreamInvocation: 4,
  CancelInvocation: 5,
  Ping: 6,
  Close: 7,
} as const;

export type MessageTypeValue = (typeof MessageType)[keyof typeof MessageType];

// Client -> Server (and Server -> Client)
export interface InvocationMessage {
  type: typeof MessageType.Invocation;
  invocationId?: string;
  target: string;
  arguments: unknown[];
  streamIds?: string[];
}

/**
 * Invocation without an id: the sender expects no completion.
 */
export interface SendOnlyInvocationMessage {
  type: typeof MessageType.Invocation;
  target: string;
  arguments: unknown[];
}

export interface StreamItemMessage {
  type: typeof MessageType.StreamItem;
  invocationId: string;
  item: unknown;
}

export interface CompletionMessage {
  type: typeof MessageType.Completion;
  invocationId: string;
  result?: unknown;
  error?: string;
}

export interface PingMessage {
  type: typeof MessageType.Ping;
}

export interface CloseMessage {
  type: typeof MessageType.Close;
  error?: string;
  allowReconnect?: boolean;
}

// Server -> Client only
export interface StreamInvocationMessage {
  type: typeof MessageType.StreamInvocation;
  invocationId: string;
  target: string;
  arguments: unknown[];
  streamIds?: string[];
}

export interface CancelInvocationMessage {
  type: typeof MessageType.CancelInvocation;
  invocationId: string;
}

export type HubMessage =
  | InvocationMessage
  | SendOnlyInvocationMessage
  | StreamItemMessage
  | CompletionMessage
  | StreamInvocationMessage
  | CancelInvocationMessage
  | PingMessage
  | CloseMessage;
