/**
 * HTTP delivery of batch documents.
 *
 * One POST per flush. The response body is read and parsed whatever the
 * status code, because the endpoint reports rejection detail in it;
 * deciding whether the batch was accepted is left to `validateResponse`.
 */

import { Duration, Effect, Either } from "effect";
import { HttpClient, HttpClientRequest } from "@effect/platform";
import { TransportError } from "@pushline/core";
import { parseResponseBody, reasonPhrase, type ServerResponse } from "./response";

// =============================================================================
// Types
// =============================================================================

export interface TransportConfig {
  readonly url: string;
  /** Sent as Bearer token in the Authorization header */
  readonly token: string;
  /** Content-Type of the batch document */
  readonly mediaType: string;
  /** Maximum wait for response headers (ms) */
  readonly connectTimeoutMs: number;
  /** Maximum wait for the response body (ms); unbounded when unset */
  readonly responseTimeoutMs?: number;
}

export interface Transport {
  /**
   * Send one batch document and return the endpoint's answer.
   * Fails only when no usable answer was received.
   */
  readonly send: (body: Uint8Array) => Effect.Effect<ServerResponse, TransportError>;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a transport over the HttpClient in context.
 *
 * @example
 * ```typescript
 * const transport = yield* makeTransport({
 *   url: "https://ingest.example.com/push",
 *   token: "test-token",
 *   mediaType: "application/json",
 *   connectTimeoutMs: 120_000,
 * }).pipe(Effect.provide(FetchHttpClient.layer));
 * ```
 */
export const makeTransport = (
  config: TransportConfig,
): Effect.Effect<Transport, never, HttpClient.HttpClient> =>
  Effect.gen(function* () {
    const httpClient = yield* HttpClient.HttpClient;
    const { url } = config;

    const timedOut = (phase: string, ms: number) => () =>
      new TransportError({
        reason: "timeout",
        url,
        cause: `no ${phase} within ${ms}ms`,
      });

    const readBody = (text: Effect.Effect<string, unknown>) =>
      config.responseTimeoutMs === undefined
        ? text
        : text.pipe(
            Effect.timeoutFail({
              duration: Duration.millis(config.responseTimeoutMs),
              onTimeout: timedOut("response body", config.responseTimeoutMs),
            }),
          );

    const send = (body: Uint8Array): Effect.Effect<ServerResponse, TransportError> =>
      Effect.gen(function* () {
        const request = HttpClientRequest.post(url).pipe(
          HttpClientRequest.bearerToken(config.token),
          HttpClientRequest.bodyUint8Array(body, config.mediaType),
        );

        const response = yield* httpClient.execute(request).pipe(
          Effect.mapError((cause) => new TransportError({ reason: "connect", url, cause })),
          Effect.timeoutFail({
            duration: Duration.millis(config.connectTimeoutMs),
            onTimeout: timedOut("response", config.connectTimeoutMs),
          }),
        );

        const text = yield* readBody(response.text).pipe(
          Effect.mapError((cause) =>
            cause instanceof TransportError
              ? cause
              : new TransportError({ reason: "response", url, cause }),
          ),
        );

        const parsed = parseResponseBody(text);
        if (Either.isLeft(parsed)) {
          return yield* Effect.fail(
            new TransportError({ reason: "response", url, cause: parsed.left }),
          );
        }

        return {
          status: response.status,
          reason: reasonPhrase(response.status),
          body: parsed.right,
        };
      }).pipe(Effect.scoped);

    return { send };
  });
