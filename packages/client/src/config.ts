// packages/client/src/config.ts

import { Config, Effect, Option, ParseResult, Redacted, Schema } from "effect";
import { ConfigError } from "@pushline/core";

// =============================================================================
// Constants
// =============================================================================

/**
 * Default ingestion endpoint.
 */
export const defaultUrl = "https://pipeline-gateway.rjmetrics.com/push";

/**
 * Default maximum time between flushes (60 seconds).
 */
export const defaultFlushIntervalMs = 60_000;

/**
 * Default buffered byte count that forces a flush.
 */
export const defaultBufferSizeBytes = 4096;

/**
 * Default time to wait for the endpoint to answer (2 minutes).
 */
export const defaultConnectTimeoutMs = 120_000;

// =============================================================================
// Schema
// =============================================================================

const NonNegativeInt = Schema.Int.pipe(Schema.nonNegative());

const AbsoluteUrl = Schema.String.pipe(
  Schema.filter((url) => URL.canParse(url) || `"${url}" is not an absolute URL`),
);

/**
 * Client configuration, with defaults applied on decode.
 */
export const ClientConfigSchema = Schema.Struct({
  /** Where batches are sent */
  url: Schema.optionalWith(AbsoluteUrl, { default: () => defaultUrl }),
  /** Embedded in every message as client_id */
  clientId: Schema.Int,
  /** Sent as a Bearer token */
  token: Schema.NonEmptyString,
  /** Embedded in every message */
  namespace: Schema.NonEmptyString,
  /** Used when a message has no table name */
  tableName: Schema.optional(Schema.NonEmptyString),
  /** Used when a message has no key names */
  keyNames: Schema.optional(Schema.Array(Schema.String)),
  flushIntervalMs: Schema.optionalWith(NonNegativeInt, {
    default: () => defaultFlushIntervalMs,
  }),
  bufferSizeBytes: Schema.optionalWith(NonNegativeInt, {
    default: () => defaultBufferSizeBytes,
  }),
  /** Bounds the wait for response headers */
  connectTimeoutMs: Schema.optionalWith(Schema.Int.pipe(Schema.positive()), {
    default: () => defaultConnectTimeoutMs,
  }),
  /** Bounds reading the response body; unbounded when unset */
  responseTimeoutMs: Schema.optional(Schema.Int.pipe(Schema.positive())),
});

/**
 * Resolved configuration. Immutable for the lifetime of a client.
 */
export type ClientConfig = Schema.Schema.Type<typeof ClientConfigSchema>;

/**
 * Configuration as supplied by callers (optional fields may be omitted).
 */
export type ClientConfigInput = Schema.Schema.Encoded<typeof ClientConfigSchema>;

// =============================================================================
// Resolution
// =============================================================================

const decodeConfig = (input: unknown): Effect.Effect<ClientConfig, ConfigError> =>
  Schema.decodeUnknown(ClientConfigSchema)(input, { errors: "all" }).pipe(
    Effect.map((config) => Object.freeze(config)),
    Effect.mapError(
      (error) =>
        new ConfigError({
          issues: ParseResult.ArrayFormatter.formatErrorSync(error)
            .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
            .join("; "),
        }),
    ),
  );

/**
 * Validate configuration input and apply defaults.
 */
export const resolveClientConfig = (
  input: ClientConfigInput,
): Effect.Effect<ClientConfig, ConfigError> => decodeConfig(input);

// =============================================================================
// Environment
// =============================================================================

/**
 * Configuration read from PUSHLINE_* environment variables.
 *
 * PUSHLINE_KEY_NAMES is comma separated.
 */
export const ClientConfigFromEnv: Config.Config<ClientConfigInput> = Config.all({
  url: Config.string("PUSHLINE_URL").pipe(Config.withDefault(defaultUrl)),
  clientId: Config.integer("PUSHLINE_CLIENT_ID"),
  token: Config.redacted("PUSHLINE_TOKEN"),
  namespace: Config.string("PUSHLINE_NAMESPACE"),
  tableName: Config.option(Config.string("PUSHLINE_TABLE_NAME")),
  keyNames: Config.option(Config.array(Config.string(), "PUSHLINE_KEY_NAMES")),
  flushIntervalMs: Config.integer("PUSHLINE_FLUSH_INTERVAL_MS").pipe(
    Config.withDefault(defaultFlushIntervalMs),
  ),
  bufferSizeBytes: Config.integer("PUSHLINE_BUFFER_SIZE_BYTES").pipe(
    Config.withDefault(defaultBufferSizeBytes),
  ),
}).pipe(
  Config.map(({ token, tableName, keyNames, ...rest }) => ({
    ...rest,
    token: Redacted.value(token),
    ...(Option.isSome(tableName) && { tableName: tableName.value }),
    ...(Option.isSome(keyNames) && { keyNames: keyNames.value }),
  })),
);

/**
 * Load and validate configuration from the current ConfigProvider.
 */
export const loadClientConfig: Effect.Effect<ClientConfig, ConfigError> = Effect.gen(
  function* () {
    const input = yield* Effect.mapError(
      ClientConfigFromEnv,
      (error) => new ConfigError({ issues: String(error) }),
    );
    return yield* resolveClientConfig(input);
  },
);

// =============================================================================
// Builder
// =============================================================================

/**
 * Fluent assembly of client configuration.
 *
 * @example
 * ```typescript
 * const config = yield* new ClientConfigBuilder()
 *   .withClientId(42)
 *   .withToken("test-token")
 *   .withNamespace("shop")
 *   .withTableName("orders")
 *   .withKeyNames(["id"])
 *   .build();
 * ```
 */
export class ClientConfigBuilder {
  private fields: Partial<ClientConfigInput> = {};

  withUrl(url: string): this {
    this.fields = { ...this.fields, url };
    return this;
  }

  withClientId(clientId: number): this {
    this.fields = { ...this.fields, clientId };
    return this;
  }

  withToken(token: string): this {
    this.fields = { ...this.fields, token };
    return this;
  }

  withNamespace(namespace: string): this {
    this.fields = { ...this.fields, namespace };
    return this;
  }

  withTableName(tableName: string): this {
    this.fields = { ...this.fields, tableName };
    return this;
  }

  withKeyNames(keyNames: ReadonlyArray<string>): this {
    this.fields = { ...this.fields, keyNames: [...keyNames] };
    return this;
  }

  withFlushIntervalMs(flushIntervalMs: number): this {
    this.fields = { ...this.fields, flushIntervalMs };
    return this;
  }

  withBufferSizeBytes(bufferSizeBytes: number): this {
    this.fields = { ...this.fields, bufferSizeBytes };
    return this;
  }

  withConnectTimeoutMs(connectTimeoutMs: number): this {
    this.fields = { ...this.fields, connectTimeoutMs };
    return this;
  }

  withResponseTimeoutMs(responseTimeoutMs: number): this {
    this.fields = { ...this.fields, responseTimeoutMs };
    return this;
  }

  /**
   * Validate the collected fields.
   * Missing required fields fail with a ConfigError.
   */
  build(): Effect.Effect<ClientConfig, ConfigError> {
    return decodeConfig(this.fields);
  }
}
