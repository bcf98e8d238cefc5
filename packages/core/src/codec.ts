// packages/core/src/codec.ts

import { Effect, Option } from "effect";
import { DecodeError, EncodeError } from "./errors";

// =============================================================================
// Codec Interface
// =============================================================================

/**
 * A value read from a byte stream, and where the next one starts.
 */
export interface DecodedValue {
  readonly value: unknown;
  readonly offset: number;
}

/**
 * Serialization used for buffered messages and for the batch document.
 *
 * Encoded values must be self-delimiting: the buffer is a plain
 * concatenation of independently encoded values, read back one at a
 * time with `decodeNext`.
 */
export interface Codec {
  /** Media type of a batch document, sent as Content-Type */
  readonly mediaType: string;

  /**
   * Encode a single value.
   */
  readonly encode: (value: unknown) => Effect.Effect<Uint8Array, EncodeError>;

  /**
   * Decode the value starting at `offset`.
   * Succeeds with None when `offset` is exactly the end of the stream.
   */
  readonly decodeNext: (
    bytes: Uint8Array,
    offset: number,
  ) => Effect.Effect<Option.Option<DecodedValue>, DecodeError>;

  /**
   * Encode a list of values as one batch document.
   */
  readonly encodeBatch: (
    values: ReadonlyArray<unknown>,
  ) => Effect.Effect<Uint8Array, EncodeError>;
}

/**
 * A value read back from a stream, with the byte offset it started at.
 */
export interface StreamEntry {
  readonly start: number;
  readonly value: unknown;
}

/**
 * Read every value from a concatenated stream, in order.
 *
 * Reaching the end of the stream between two values ends the read;
 * any other decode failure fails the whole read.
 */
export const decodeStream = (
  codec: Codec,
  bytes: Uint8Array,
): Effect.Effect<StreamEntry[], DecodeError> =>
  Effect.gen(function* () {
    const entries: StreamEntry[] = [];
    let offset = 0;

    while (true) {
      const next = yield* codec.decodeNext(bytes, offset);
      if (Option.isNone(next)) {
        return entries;
      }
      entries.push({ start: offset, value: next.value.value });
      offset = next.value.offset;
    }
  });

// =============================================================================
// JSON Lines Codec
// =============================================================================

const NEWLINE = 0x0a;
const JSON_MEDIA_TYPE = "application/json";

const textEncoder = new TextEncoder();

const stringify = (value: unknown): string => {
  const text = JSON.stringify(value);
  if (text === undefined) {
    throw new TypeError(`${typeof value} has no JSON representation`);
  }
  return text;
};

/**
 * Newline-delimited JSON.
 *
 * Each buffered value is its JSON text followed by "\n" (JSON text never
 * contains a raw newline). A batch is a single JSON array.
 */
export const JsonLinesCodec: Codec = {
  mediaType: JSON_MEDIA_TYPE,

  encode: (value) =>
    Effect.try({
      try: () => textEncoder.encode(`${stringify(value)}\n`),
      catch: (cause) => new EncodeError({ mediaType: JSON_MEDIA_TYPE, cause }),
    }),

  decodeNext: (bytes, offset) => {
    if (offset === bytes.length) {
      return Effect.succeed(Option.none());
    }

    const end = bytes.indexOf(NEWLINE, offset);
    if (end === -1) {
      return Effect.fail(
        new DecodeError({
          mediaType: JSON_MEDIA_TYPE,
          offset,
          cause: "unexpected end of stream inside a value",
        }),
      );
    }

    return Effect.try({
      try: () => {
        const text = new TextDecoder("utf-8", { fatal: true }).decode(
          bytes.subarray(offset, end),
        );
        const value: unknown = JSON.parse(text);
        return Option.some({ value, offset: end + 1 });
      },
      catch: (cause) =>
        new DecodeError({ mediaType: JSON_MEDIA_TYPE, offset, cause }),
    });
  },

  encodeBatch: (values) =>
    Effect.try({
      try: () => textEncoder.encode(stringify(values)),
      catch: (cause) => new EncodeError({ mediaType: JSON_MEDIA_TYPE, cause }),
    }),
};
