/**
 * Messages submitted by the calling application.
 *
 * A message describes one change to one destination table. Table name
 * and key names may be left out when the client carries defaults for
 * them; the wire transform fills them in.
 *
 * Messages are defined as Effect Schemas so untrusted input can be
 * validated before it reaches the client.
 */

import { Effect, ParseResult, Schema } from "effect";
import { MessageValidationError } from "./errors";

// =============================================================================
// Action
// =============================================================================

/**
 * What the ingestion endpoint should do with a message.
 */
export const Action = {
  UPSERT: "UPSERT",
  SWITCH_VIEW: "SWITCH_VIEW",
} as const;

export const ActionSchema = Schema.Literal(Action.UPSERT, Action.SWITCH_VIEW);
export type Action = Schema.Schema.Type<typeof ActionSchema>;

// =============================================================================
// Message Schema
// =============================================================================

export const MessageSchema = Schema.Struct({
  /** Destination table; falls back to the client default */
  tableName: Schema.optional(Schema.String),
  /** Ordered primary key field names; falls back to the client default */
  keyNames: Schema.optional(Schema.Array(Schema.String)),
  action: Schema.optional(ActionSchema),
  /** Table schema version */
  tableVersion: Schema.optional(Schema.Int),
  /** Ordering hint for the remote system */
  sequence: Schema.optional(Schema.Int),
  /** Record payload, field name to value */
  data: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  ),
});
export type Message = Schema.Schema.Type<typeof MessageSchema>;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Create an immutable message.
 */
export const makeMessage = (fields: Message): Message => Object.freeze({ ...fields });

/**
 * Name the first offending field of a parse failure.
 */
export const toValidationError = (error: ParseResult.ParseError): MessageValidationError => {
  const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error);
  return new MessageValidationError({
    field: issue?.path.map(String).join(".") || "(root)",
    issue: issue?.message ?? error.message,
  });
};

/**
 * Validate unknown input as a message.
 *
 * Fails with a MessageValidationError naming the first offending field.
 */
export const decodeMessage = (
  input: unknown,
): Effect.Effect<Message, MessageValidationError> =>
  Schema.decodeUnknown(MessageSchema)(input).pipe(
    Effect.map(makeMessage),
    Effect.mapError(toValidationError),
  );
