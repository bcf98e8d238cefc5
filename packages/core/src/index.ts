// Errors
export {
  MessageValidationError,
  EncodeError,
  DecodeError,
  BufferCorruptedError,
  ConfigError,
  TransportError,
  RemoteRejectionError,
} from "./errors";

// Message Model
export {
  Action,
  ActionSchema,
  MessageSchema,
  makeMessage,
  decodeMessage,
  type Message,
} from "./message";

// Wire Transform
export {
  WireField,
  WireMappingSchema,
  toWireMapping,
  validateWireMapping,
  type WireMapping,
  type WireDefaults,
} from "./wire";

// Codec
export {
  JsonLinesCodec,
  decodeStream,
  type Codec,
  type DecodedValue,
  type StreamEntry,
} from "./codec";
