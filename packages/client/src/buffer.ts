// packages/client/src/buffer.ts

import { Clock, Effect, Ref } from "effect";

// =============================================================================
// Types
// =============================================================================

/**
 * Snapshot of the buffer.
 */
export interface BufferState {
  /** Independently encoded messages, in push order */
  readonly chunks: ReadonlyArray<Uint8Array>;
  readonly sizeInBytes: number;
  /** Clock time of the last successful flush (or of buffer creation) */
  readonly lastFlushTime: number;
}

/**
 * Append-only accumulator of encoded messages.
 *
 * Size only grows between flushes; `reset` is the only way back to empty.
 */
export interface MessageBuffer {
  /**
   * Append one encoded message. Returns the state after the append.
   */
  readonly append: (bytes: Uint8Array) => Effect.Effect<BufferState>;

  /**
   * Current state.
   */
  readonly state: Effect.Effect<BufferState>;

  /**
   * Drop all buffered bytes and record a successful flush at `now`.
   */
  readonly reset: (now: number) => Effect.Effect<void>;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Concatenate encoded chunks into one byte stream.
 */
export function concatChunks(chunks: ReadonlyArray<Uint8Array>): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

/**
 * Create an empty buffer whose flush clock starts now.
 */
export const makeMessageBuffer: Effect.Effect<MessageBuffer> = Effect.gen(function* () {
  const createdAt = yield* Clock.currentTimeMillis;
  const ref = yield* Ref.make<BufferState>({
    chunks: [],
    sizeInBytes: 0,
    lastFlushTime: createdAt,
  });

  return {
    append: (bytes) =>
      Ref.updateAndGet(ref, (state) => ({
        ...state,
        chunks: [...state.chunks, bytes],
        sizeInBytes: state.sizeInBytes + bytes.byteLength,
      })),

    state: Ref.get(ref),

    reset: (now) =>
      Ref.set(ref, {
        chunks: [],
        sizeInBytes: 0,
        lastFlushTime: now,
      }),
  };
});
