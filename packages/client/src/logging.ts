// packages/client/src/logging.ts

import { Effect, Logger, LogLevel } from "effect";

/**
 * Logging control for a client.
 *
 * - false (default): errors only
 * - true: everything, including per-message debug logs
 * - LogLevel.*: explicit minimum level (LogLevel.None silences the client)
 */
export type LoggingOption = boolean | LogLevel.LogLevel;

/**
 * Resolve a logging option to an Effect LogLevel.
 */
export const resolveLogLevel = (option?: LoggingOption): LogLevel.LogLevel => {
  if (option === undefined || option === false) {
    return LogLevel.Error;
  }
  if (option === true) {
    return LogLevel.Debug;
  }
  return option;
};

/**
 * Annotations attached to every log line a client writes.
 */
export interface ClientLoggingConfig {
  readonly logging?: LoggingOption;
  readonly clientId: number;
  readonly namespace: string;
}

/**
 * Wrap an effect with client-scoped logging.
 */
export const withClientLogging =
  (config: ClientLoggingConfig) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    effect.pipe(
      Effect.annotateLogs({
        clientId: config.clientId,
        namespace: config.namespace,
      }),
      Logger.withMinimumLogLevel(resolveLogLevel(config.logging)),
    );
