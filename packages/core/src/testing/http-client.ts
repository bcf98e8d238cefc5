// packages/core/src/testing/http-client.ts

import { Effect, Layer } from "effect";
import {
  HttpClient,
  HttpClientError,
  type HttpClientRequest,
  HttpClientResponse,
} from "@effect/platform";

/**
 * A request as seen by the recording client.
 */
export interface RecordedRequest {
  readonly method: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly contentType: string | undefined;
  readonly body: Uint8Array;
}

/**
 * How the recording client answers a request.
 */
export type TestReply =
  | { readonly _tag: "Respond"; readonly status: number; readonly body: string }
  | { readonly _tag: "Fail"; readonly cause: unknown }
  | { readonly _tag: "Hang" }
  | { readonly _tag: "Stall"; readonly status: number };

export const TestReply = {
  json: (status: number, body: unknown): TestReply => ({
    _tag: "Respond",
    status,
    body: JSON.stringify(body),
  }),
  text: (status: number, body: string): TestReply => ({
    _tag: "Respond",
    status,
    body,
  }),
  fail: (cause: unknown): TestReply => ({ _tag: "Fail", cause }),
  hang: (): TestReply => ({ _tag: "Hang" }),
  /** Headers arrive, the body never finishes. */
  stall: (status: number): TestReply => ({ _tag: "Stall", status }),
};

/**
 * In-process HttpClient with test helpers.
 */
export interface RecordingHttpClientHandle {
  readonly client: HttpClient.HttpClient;
  readonly layer: Layer.Layer<HttpClient.HttpClient>;

  /**
   * Every request received, oldest first.
   */
  readonly requests: () => ReadonlyArray<RecordedRequest>;

  /**
   * Body of the most recent request, parsed as JSON.
   */
  readonly lastJsonBody: () => unknown;

  /**
   * Forget recorded requests.
   */
  readonly clear: () => void;
}

/**
 * Create an HttpClient that records requests and answers from `responder`.
 *
 * Nothing leaves the process.
 */
export function createRecordingHttpClient(
  responder: (request: RecordedRequest) => TestReply = () =>
    TestReply.json(200, { status: "OK" }),
): RecordingHttpClientHandle {
  const requests: RecordedRequest[] = [];

  const answer = (
    request: HttpClientRequest.HttpClientRequest,
    url: URL,
  ): Effect.Effect<HttpClientResponse.HttpClientResponse, HttpClientError.HttpClientError> => {
    const recorded: RecordedRequest = {
      method: request.method,
      url: url.toString(),
      headers: { ...request.headers },
      contentType:
        request.body._tag === "Uint8Array" ? request.body.contentType : undefined,
      body: request.body._tag === "Uint8Array" ? request.body.body : new Uint8Array(0),
    };
    requests.push(recorded);

    const reply = responder(recorded);
    switch (reply._tag) {
      case "Respond":
        return Effect.succeed(
          HttpClientResponse.fromWeb(
            request,
            new Response(reply.body, {
              status: reply.status,
              headers: { "content-type": "application/json" },
            }),
          ),
        );
      case "Fail":
        return Effect.fail(
          new HttpClientError.RequestError({
            request,
            reason: "Transport",
            cause: reply.cause,
          }),
        );
      case "Hang":
        return Effect.never;
      case "Stall":
        return Effect.succeed(
          HttpClientResponse.fromWeb(
            request,
            new Response(new ReadableStream<Uint8Array>(), {
              status: reply.status,
              headers: { "content-type": "application/json" },
            }),
          ),
        );
    }
  };

  const client = HttpClient.make((request, url) =>
    Effect.suspend(() => answer(request, url)),
  );

  return {
    client,
    layer: Layer.succeed(HttpClient.HttpClient, client),
    requests: () => requests,
    lastJsonBody: () => {
      const last = requests[requests.length - 1];
      if (!last) {
        throw new Error("No request recorded");
      }
      const parsed: unknown = JSON.parse(new TextDecoder().decode(last.body));
      return parsed;
    },
    clear: () => {
      requests.length = 0;
    },
  };
}
