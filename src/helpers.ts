/**
 * Utility functions.
 */

import { CancelledError } from './errors.ts';
import type { AvailableTransport, NegotiateResponse } from './types.ts';

/**
 * Run one blocking operation against a cancellation signal.
 *
 * The operation is started once and raced against `signal`. When the signal
 * aborts first, the operation is still awaited before the returned promise
 * rejects with `CancelledError`, so no attempt outlives its caller. Nothing is
 * started when the signal is already aborted.
 *
 * @param signal - The cancellation scope
 * @param operation - Receives the same signal, to stop its own I/O early
 * @returns The operation's result
 */
export async function runCancellable<T>(
  signal: AbortSignal,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (signal.aborted) {
    throw new CancelledError();
  }

  const attempt = operation(signal).then(
    (value) => ({ ok: true as const, value }),
    (error: unknown) => ({ ok: false as const, error })
  );

  let markCancelled: () => void = () => {};
  const cancelled = new Promise<'cancelled'>((resolve) => {
    markCancelled = () => resolve('cancelled');
  });
  const onAbort = () => markCancelled();
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    const first = await Promise.race([attempt, cancelled]);
    if (first === 'cancelled') {
      // Join the abandoned attempt; its outcome is discarded.
      await attempt;
      throw new CancelledError();
    }
    if (first.ok) {
      return first.value;
    }
    throw first.error;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Transfer formats advertised for a transport, or undefined when the server
 * does not offer it.
 */
export function getTransferFormats(
  response: NegotiateResponse,
  transport: string
): readonly string[] | undefined {
  const entry: AvailableTransport | undefined = response.availableTransports.find(
    (t) => t.transport === transport
  );
  return entry?.transferFormats;
}

/**
 * The id a transport routes on: the connection token when present, the
 * connection id otherwise.
 */
export function routingId(response: NegotiateResponse): string {
  return response.connectionToken ? response.connectionToken : response.connectionId;
}

/**
 * Case-insensitive header lookup.
 *
 * @returns The header's actual key, or undefined
 */
export function findHeaderKey(headers: Record<string, string>, name: string): string | undefined {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
}
