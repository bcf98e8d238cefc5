// packages/core/src/errors.ts

import { Data } from "effect";

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

// =============================================================================
// Local Errors
// =============================================================================

/**
 * A message (or the client defaults behind it) is missing a field the
 * ingestion endpoint requires, or carries a value of the wrong shape.
 */
export class MessageValidationError extends Data.TaggedError(
  "MessageValidationError",
)<{
  readonly field: string;
  readonly issue: string;
}> {
  get message(): string {
    return `Invalid message field "${this.field}": ${this.issue}`;
  }
}

/**
 * A value could not be encoded by the codec.
 */
export class EncodeError extends Data.TaggedError("EncodeError")<{
  readonly mediaType: string;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Failed to encode value as ${this.mediaType}: ${describeCause(this.cause)}`;
  }
}

/**
 * The codec could not read a value at the given byte offset.
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
  readonly mediaType: string;
  readonly offset: number;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Failed to decode ${this.mediaType} at byte ${this.offset}: ${describeCause(this.cause)}`;
  }
}

/**
 * The buffered bytes could not be read back into wire mappings.
 *
 * Buffered messages written before `offset` may be unrecoverable.
 * The buffer is left untouched so the bytes can still be inspected.
 */
export class BufferCorruptedError extends Data.TaggedError(
  "BufferCorruptedError",
)<{
  readonly offset: number;
  readonly bufferedBytes: number;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Buffer corrupted at byte ${this.offset} of ${this.bufferedBytes} (buffered messages are at risk of loss): ${describeCause(this.cause)}`;
  }
}

/**
 * Client configuration failed validation.
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly issues: string;
}> {
  get message(): string {
    return `Invalid client configuration: ${this.issues}`;
  }
}

// =============================================================================
// Delivery Errors
// =============================================================================

/**
 * The batch never got a usable answer from the endpoint.
 *
 * - connect: the request could not be sent or no response arrived
 * - timeout: the connect or response timeout elapsed
 * - response: the response body was unreadable or not a JSON object
 */
export class TransportError extends Data.TaggedError("TransportError")<{
  readonly reason: "connect" | "timeout" | "response";
  readonly url: string;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Transport ${this.reason} failure for ${this.url}: ${describeCause(this.cause)}`;
  }
}

/**
 * The endpoint answered but did not accept the batch.
 */
export class RemoteRejectionError extends Data.TaggedError(
  "RemoteRejectionError",
)<{
  readonly status: number;
  readonly reason: string;
  readonly body: Readonly<Record<string, unknown>>;
}> {
  get message(): string {
    return `Batch rejected with ${this.status} ${this.reason}: ${JSON.stringify(this.body)}`;
  }
}
