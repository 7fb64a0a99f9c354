/**
 * Validation utilities using TypeBox.
 *
 * Holds the schemas of the negotiate response and of every hub frame the
 * session can receive.
 */

import { Type } from 'typebox';
import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';
import { MessageType } from './wire.ts';
import type {
  CancelInvocationMessage,
  CloseMessage,
  CompletionMessage,
  HubMessage,
  InvocationMessage,
  PingMessage,
  StreamInvocationMessage,
  StreamItemMessage,
} from './wire.ts';
import type { NegotiatePayload } from './types.ts';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a TypeBox schema into a validator for `T`.
 */
export function compileSchema<T>(schema: TSchema): CompiledValidator<T> {
  const compiled = Compile(schema);

  const check = (value: unknown): value is T => compiled.Check(value);

  return {
    check,
    validate: (value: unknown): T => {
      if (!check(value)) {
        throw new ValidationError(formatErrors(compiled.Errors(value)));
      }
      return value;
    },
  };
}

const NegotiatePayloadSchema = Type.Object({
  connectionId: Type.Optional(Type.String()),
  connectionToken: Type.Optional(Type.String()),
  negotiateVersion: Type.Optional(Type.Integer()),
  availableTransports: Type.Optional(
    Type.Array(
      Type.Object({
        transport: Type.String(),
        transferFormats: Type.Array(Type.String()),
      })
    )
  ),
});

export const negotiatePayload = compileSchema<NegotiatePayload>(NegotiatePayloadSchema);

const Arguments = Type.Array(Type.Unknown());
const StreamIds = Type.Optional(Type.Array(Type.String()));

/**
 * Validators for incoming hub frames, keyed by message type.
 */
export const hubMessageValidators: ReadonlyMap<number, CompiledValidator<HubMessage>> = new Map<
  number,
  CompiledValidator<HubMessage>
>([
  [
    MessageType.Invocation,
    compileSchema<InvocationMessage>(
      Type.Object({
        type: Type.Literal(MessageType.Invocation),
        invocationId: Type.Optional(Type.String()),
        target: Type.String(),
        arguments: Arguments,
        streamIds: StreamIds,
      })
    ),
  ],
  [
    MessageType.StreamItem,
    compileSchema<StreamItemMessage>(
      Type.Object({
        type: Type.Literal(MessageType.StreamItem),
        invocationId: Type.String(),
        item: Type.Unknown(),
      })
    ),
  ],
  [
    MessageType.Completion,
    compileSchema<CompletionMessage>(
      Type.Object({
        type: Type.Literal(MessageType.Completion),
        invocationId: Type.String(),
        result: Type.Optional(Type.Unknown()),
        error: Type.Optional(Type.String()),
      })
    ),
  ],
  [
    MessageType.StreamInvocation,
    compileSchema<StreamInvocationMessage>(
      Type.Object({
        type: Type.Literal(MessageType.StreamInvocation),
        invocationId: Type.String(),
        target: Type.String(),
        arguments: Arguments,
        streamIds: StreamIds,
      })
    ),
  ],
  [
    MessageType.CancelInvocation,
    compileSchema<CancelInvocationMessage>(
      Type.Object({
        type: Type.Literal(MessageType.CancelInvocation),
        invocationId: Type.String(),
      })
    ),
  ],
  [MessageType.Ping, compileSchema<PingMessage>(Type.Object({ type: Type.Literal(MessageType.Ping) }))],
  [
    MessageType.Close,
    compileSchema<CloseMessage>(
      Type.Object({
        type: Type.Literal(MessageType.Close),
        error: Type.Optional(Type.String()),
        allowReconnect: Type.Optional(Type.Boolean()),
      })
    ),
  ],
]);
