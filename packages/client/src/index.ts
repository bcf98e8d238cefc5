// Client
export {
  makeIngestClient,
  scopedIngestClient,
  type IngestClient,
  type IngestClientOptions,
  type PendingStats,
  type FlushError,
  type PushError,
} from "./client";

// Configuration
export {
  ClientConfigSchema,
  ClientConfigFromEnv,
  ClientConfigBuilder,
  resolveClientConfig,
  loadClientConfig,
  defaultUrl,
  defaultFlushIntervalMs,
  defaultBufferSizeBytes,
  defaultConnectTimeoutMs,
  type ClientConfig,
  type ClientConfigInput,
} from "./config";

// Buffer & flush policy
export {
  makeMessageBuffer,
  concatChunks,
  type MessageBuffer,
  type BufferState,
} from "./buffer";
export {
  flushTrigger,
  shouldFlush,
  type FlushThresholds,
  type FlushTrigger,
} from "./policy";

// Transport & response validation
export {
  makeTransport,
  type Transport,
  type TransportConfig,
} from "./transport";
export {
  validateResponse,
  isOk,
  hasErrorIndicator,
  parseResponseBody,
  reasonPhrase,
  type ServerResponse,
} from "./response";

// Logging
export {
  resolveLogLevel,
  withClientLogging,
  type LoggingOption,
  type ClientLoggingConfig,
} from "./logging";

// Re-export the message model and errors for single-import use
export {
  Action,
  makeMessage,
  decodeMessage,
  JsonLinesCodec,
  MessageValidationError,
  EncodeError,
  DecodeError,
  BufferCorruptedError,
  ConfigError,
  TransportError,
  RemoteRejectionError,
  type Message,
  type Codec,
  type WireMapping,
} from "@pushline/core";
