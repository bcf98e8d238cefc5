// packages/core/src/wire.ts

import { Effect, Schema } from "effect";
import { ActionSchema, toValidationError, type Message } from "./message";
import { MessageValidationError } from "./errors";

// =============================================================================
// Wire Fields
// =============================================================================

/**
 * Field names of a wire mapping, as the ingestion endpoint expects them.
 */
export const WireField = {
  CLIENT_ID: "client_id",
  NAMESPACE: "namespace",
  ACTION: "action",
  TABLE_NAME: "table_name",
  TABLE_VERSION: "table_version",
  KEY_NAMES: "key_names",
  SEQUENCE: "sequence",
  DATA: "data",
} as const;

// =============================================================================
// Wire Mapping Schema
// =============================================================================

/**
 * One message as sent over the wire.
 *
 * `table_name` and `key_names` are optional here because the transform
 * omits them when neither the message nor the client supplies a value;
 * `validateWireMapping` rejects such mappings before they are buffered.
 */
export const WireMappingSchema = Schema.Struct({
  client_id: Schema.Int,
  namespace: Schema.String,
  table_name: Schema.optional(Schema.String),
  key_names: Schema.optional(Schema.Array(Schema.String)),
  action: Schema.optional(ActionSchema),
  table_version: Schema.optional(Schema.Int),
  sequence: Schema.optional(Schema.Int),
  data: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  ),
});
export type WireMapping = Schema.Schema.Type<typeof WireMappingSchema>;

/**
 * Client-level values merged into every message.
 */
export interface WireDefaults {
  readonly clientId: number;
  readonly namespace: string;
  readonly tableName?: string;
  readonly keyNames?: ReadonlyArray<string>;
}

// =============================================================================
// Transform
// =============================================================================

/**
 * Convert a message into its wire mapping.
 *
 * Message values win over client defaults. Optional fields with no
 * value are left out entirely rather than written as null.
 */
export function toWireMapping(message: Message, defaults: WireDefaults): WireMapping {
  const tableName = message.tableName ?? defaults.tableName;
  const keyNames = message.keyNames ?? defaults.keyNames;

  return {
    [WireField.CLIENT_ID]: defaults.clientId,
    [WireField.NAMESPACE]: defaults.namespace,
    ...(tableName !== undefined && { [WireField.TABLE_NAME]: tableName }),
    ...(keyNames !== undefined && { [WireField.KEY_NAMES]: [...keyNames] }),
    ...(message.action !== undefined && { [WireField.ACTION]: message.action }),
    ...(message.tableVersion !== undefined && {
      [WireField.TABLE_VERSION]: message.tableVersion,
    }),
    ...(message.sequence !== undefined && { [WireField.SEQUENCE]: message.sequence }),
    ...(message.data !== undefined && { [WireField.DATA]: message.data }),
  };
}

const validateWireShape = Schema.validate(WireMappingSchema);

/**
 * Reject a mapping the endpoint cannot take: no table name, no key names,
 * or a field outside the wire schema (a `sequence` that is not a safe
 * integer, for one). Flush reads the buffer back against the same schema.
 */
export const validateWireMapping = (
  mapping: WireMapping,
): Effect.Effect<WireMapping, MessageValidationError> => {
  if (mapping.table_name === undefined) {
    return Effect.fail(
      new MessageValidationError({
        field: WireField.TABLE_NAME,
        issue: "not set on the message and the client has no default table name",
      }),
    );
  }
  if (mapping.key_names === undefined) {
    return Effect.fail(
      new MessageValidationError({
        field: WireField.KEY_NAMES,
        issue: "not set on the message and the client has no default key names",
      }),
    );
  }
  return validateWireShape(mapping).pipe(
    Effect.mapError(toValidationError),
    Effect.as(mapping),
  );
};
