// packages/client/src/response.ts

import { STATUS_CODES } from "node:http";
import { Effect, Either } from "effect";
import { RemoteRejectionError } from "@pushline/core";

/**
 * The endpoint's answer to one batch.
 */
export interface ServerResponse {
  readonly status: number;
  readonly reason: string;
  readonly body: Readonly<Record<string, unknown>>;
}

/**
 * Standard reason phrase for a status code.
 *
 * HttpClientResponse carries no status text, so this is the registered
 * phrase, not whatever the server put on its status line.
 */
export const reasonPhrase = (status: number): string => STATUS_CODES[status] ?? "Unknown";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parse a response body as a JSON object.
 *
 * An empty body reads as an empty object. Anything else that is not a
 * JSON object is a Left carrying the reason.
 */
export function parseResponseBody(text: string): Either.Either<Record<string, unknown>, string> {
  if (text.trim() === "") {
    return Either.right({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return Either.left(
      `response body is not JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return isRecord(parsed)
    ? Either.right(parsed)
    : Either.left("response body is not a JSON object");
}

/**
 * True when the body reports a failure despite the status code:
 * a non-null `error` field, or `status: "error"`.
 */
export const hasErrorIndicator = (body: Readonly<Record<string, unknown>>): boolean =>
  (body["error"] !== undefined && body["error"] !== null) || body["status"] === "error";

/**
 * A batch is accepted on a 2xx status with no error indicator in the body.
 */
export const isOk = (response: ServerResponse): boolean =>
  response.status >= 200 && response.status < 300 && !hasErrorIndicator(response.body);

/**
 * Fail with a RemoteRejectionError unless the response accepts the batch.
 */
export const validateResponse = (
  response: ServerResponse,
): Effect.Effect<void, RemoteRejectionError> =>
  isOk(response)
    ? Effect.void
    : Effect.fail(
        new RemoteRejectionError({
          status: response.status,
          reason: response.reason,
          body: response.body,
        }),
      );
