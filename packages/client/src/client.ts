/**
 * Buffered ingestion client.
 *
 * Messages are transformed into wire mappings, encoded, and appended to
 * an in-memory buffer. After every push the flush policy is checked; when
 * the buffer has reached its byte threshold, or the flush interval has
 * elapsed since the last successful flush, the buffer is drained inline as
 * one batch. There is no background timer: time-based flushes happen on the
 * next push.
 *
 * push, flush and close are serialized by a single-permit semaphore, so
 * concurrent callers queue instead of interleaving buffer mutation with a
 * flush in progress. A flush in progress cannot be interrupted midway by
 * another caller.
 */

import { Clock, Effect, Schema, type Scope } from "effect";
import type { HttpClient } from "@effect/platform";
import {
  BufferCorruptedError,
  ConfigError,
  EncodeError,
  JsonLinesCodec,
  MessageValidationError,
  RemoteRejectionError,
  TransportError,
  WireMappingSchema,
  decodeStream,
  toWireMapping,
  validateWireMapping,
  type Codec,
  type Message,
  type WireDefaults,
  type WireMapping,
} from "@pushline/core";
import { concatChunks, makeMessageBuffer } from "./buffer";
import { resolveClientConfig, type ClientConfig, type ClientConfigInput } from "./config";
import { withClientLogging, type LoggingOption } from "./logging";
import { flushTrigger } from "./policy";
import { validateResponse } from "./response";
import { makeTransport } from "./transport";

// =============================================================================
// Types
// =============================================================================

/**
 * Errors a flush can fail with. The buffer is left untouched by all of them.
 */
export type FlushError =
  | BufferCorruptedError
  | EncodeError
  | TransportError
  | RemoteRejectionError;

/**
 * Errors a push can fail with.
 */
export type PushError = MessageValidationError | EncodeError | FlushError;

/**
 * What is currently waiting to be sent.
 */
export interface PendingStats {
  readonly messages: number;
  readonly bytes: number;
}

export interface IngestClientOptions {
  /** Serialization for buffered messages and batches. Default: JsonLinesCodec */
  readonly codec?: Codec;
  /** Default: false (errors only) */
  readonly logging?: LoggingOption;
}

export interface IngestClient {
  readonly config: ClientConfig;

  /**
   * Buffer a message, flushing inline when the flush policy says so.
   */
  readonly push: (message: Message) => Effect.Effect<void, PushError>;

  /**
   * Send everything buffered as one batch.
   * A no-op (no request, flush clock untouched) when the buffer is empty.
   */
  readonly flush: Effect.Effect<void, FlushError>;

  /**
   * Final flush. Safe to run more than once.
   */
  readonly close: Effect.Effect<void, FlushError>;

  readonly pending: Effect.Effect<PendingStats>;
}

// =============================================================================
// Implementation
// =============================================================================

const decodeWireMapping = Schema.decodeUnknown(WireMappingSchema);

/**
 * Create a client over the HttpClient in context.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const client = yield* makeIngestClient({
 *     clientId: 42,
 *     token: "test-token",
 *     namespace: "shop",
 *     keyNames: ["id"],
 *   });
 *
 *   yield* client.push({ tableName: "orders", action: "UPSERT", data: { id: 1 } });
 *   yield* client.close;
 * }).pipe(Effect.provide(FetchHttpClient.layer));
 * ```
 */
export const makeIngestClient = (
  input: ClientConfigInput,
  options: IngestClientOptions = {},
): Effect.Effect<IngestClient, ConfigError, HttpClient.HttpClient> =>
  Effect.gen(function* () {
    const config = yield* resolveClientConfig(input);
    const codec = options.codec ?? JsonLinesCodec;

    const defaults: WireDefaults = {
      clientId: config.clientId,
      namespace: config.namespace,
      ...(config.tableName !== undefined && { tableName: config.tableName }),
      ...(config.keyNames !== undefined && { keyNames: config.keyNames }),
    };

    const transport = yield* makeTransport({
      url: config.url,
      token: config.token,
      mediaType: codec.mediaType,
      connectTimeoutMs: config.connectTimeoutMs,
      ...(config.responseTimeoutMs !== undefined && {
        responseTimeoutMs: config.responseTimeoutMs,
      }),
    });
    const buffer = yield* makeMessageBuffer;
    const lock = yield* Effect.makeSemaphore(1);

    const logged = withClientLogging({
      logging: options.logging,
      clientId: config.clientId,
      namespace: config.namespace,
    });

    /**
     * Read the buffer back into wire mappings.
     */
    const readBatch = (bytes: Uint8Array): Effect.Effect<WireMapping[], BufferCorruptedError> =>
      Effect.gen(function* () {
        const entries = yield* decodeStream(codec, bytes).pipe(
          Effect.mapError(
            (error) =>
              new BufferCorruptedError({
                offset: error.offset,
                bufferedBytes: bytes.byteLength,
                cause: error,
              }),
          ),
        );

        return yield* Effect.forEach(entries, (entry) =>
          decodeWireMapping(entry.value).pipe(
            Effect.mapError(
              (cause) =>
                new BufferCorruptedError({
                  offset: entry.start,
                  bufferedBytes: bytes.byteLength,
                  cause,
                }),
            ),
          ),
        );
      });

    // Callers must hold the lock.
    const drain: Effect.Effect<void, FlushError> = Effect.gen(function* () {
      const state = yield* buffer.state;
      if (state.sizeInBytes === 0) {
        return;
      }

      const mappings = yield* readBatch(concatChunks(state.chunks));
      const body = yield* codec.encodeBatch(mappings);
      const response = yield* transport.send(body);
      yield* validateResponse(response);

      const now = yield* Clock.currentTimeMillis;
      yield* buffer.reset(now);
      yield* Effect.logDebug(
        `Flushed ${mappings.length} messages (${body.byteLength} bytes) with status ${response.status}`,
      );
    }).pipe(
      Effect.tapError((error) =>
        error._tag === "BufferCorruptedError"
          ? Effect.logError(error.message)
          : Effect.logWarning(`Flush failed, buffer kept: ${error.message}`),
      ),
    );

    const push = (message: Message): Effect.Effect<void, PushError> =>
      Effect.gen(function* () {
        const mapping = yield* validateWireMapping(toWireMapping(message, defaults));
        const bytes = yield* codec.encode(mapping);
        const state = yield* buffer.append(bytes);
        yield* Effect.logDebug(
          `Buffered message for ${mapping.table_name} (${state.sizeInBytes} bytes pending)`,
        );

        const now = yield* Clock.currentTimeMillis;
        const trigger = flushTrigger(state, now, config);
        if (trigger !== null) {
          yield* Effect.logDebug(`Flush triggered by ${trigger}`);
          yield* drain;
        }
      }).pipe(lock.withPermits(1), logged);

    const flush: Effect.Effect<void, FlushError> = drain.pipe(lock.withPermits(1), logged);

    const pending: Effect.Effect<PendingStats> = buffer.state.pipe(
      Effect.map((state) => ({
        messages: state.chunks.length,
        bytes: state.sizeInBytes,
      })),
    );

    return {
      config,
      push,
      flush,
      close: flush,
      pending,
    };
  });

/**
 * Create a client that is closed when the enclosing scope closes.
 *
 * A failed final flush cannot be surfaced from a finalizer; it is logged
 * as an error, and whatever was still buffered is lost with the client.
 */
export const scopedIngestClient = (
  input: ClientConfigInput,
  options: IngestClientOptions = {},
): Effect.Effect<IngestClient, ConfigError, HttpClient.HttpClient | Scope.Scope> =>
  Effect.acquireRelease(makeIngestClient(input, options), (client) =>
    client.close.pipe(
      Effect.catchAll((error) =>
        client.pending.pipe(
          Effect.flatMap((stats) =>
            Effect.logError(
              `Final flush failed, dropping ${stats.messages} buffered messages: ${error.message}`,
            ),
          ),
        ),
      ),
      withClientLogging({
        logging: options.logging,
        clientId: client.config.clientId,
        namespace: client.config.namespace,
      }),
    ),
  );
