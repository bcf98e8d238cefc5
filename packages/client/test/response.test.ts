import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import {
  hasErrorIndicator,
  isOk,
  parseResponseBody,
  reasonPhrase,
  validateResponse,
} from "../src/response";

describe("parseResponseBody", () => {
  it("parses a JSON object", () => {
    expect(parseResponseBody('{"status":"OK"}')).toEqual(Either.right({ status: "OK" }));
  });

  it("reads an empty body as an empty object", () => {
    expect(parseResponseBody("  ")).toEqual(Either.right({}));
  });

  it("rejects a JSON array", () => {
    expect(parseResponseBody("[1]")).toEqual(Either.left("response body is not a JSON object"));
  });

  it("rejects text that is not JSON", () => {
    expect(Either.isLeft(parseResponseBody("<html>"))).toBe(true);
  });
});

describe("reasonPhrase", () => {
  it("names standard status codes", () => {
    expect(reasonPhrase(200)).toBe("OK");
    expect(reasonPhrase(400)).toBe("Bad Request");
  });

  it("falls back for unknown codes", () => {
    expect(reasonPhrase(599)).toBe("Unknown");
  });
});

describe("isOk", () => {
  it("accepts a 2xx response without an error indicator", () => {
    expect(isOk({ status: 201, reason: "Created", body: { status: "OK" } })).toBe(true);
  });

  it("rejects a non-2xx status", () => {
    expect(isOk({ status: 302, reason: "Found", body: {} })).toBe(false);
    expect(isOk({ status: 500, reason: "Internal Server Error", body: {} })).toBe(false);
  });

  it("rejects a 2xx response with an error indicator", () => {
    expect(isOk({ status: 200, reason: "OK", body: { error: "partial failure" } })).toBe(false);
  });
});

describe("hasErrorIndicator", () => {
  it("ignores a null error field", () => {
    expect(hasErrorIndicator({ error: null })).toBe(false);
  });

  it("detects status error", () => {
    expect(hasErrorIndicator({ status: "error" })).toBe(true);
  });
});

describe("validateResponse", () => {
  it("succeeds for an accepted batch", async () => {
    await Effect.runPromise(validateResponse({ status: 200, reason: "OK", body: {} }));
  });

  it("fails with the status, reason and body", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        validateResponse({
          status: 422,
          reason: "Unprocessable Entity",
          body: { error: "missing key" },
        }),
      ),
    );

    expect(error.status).toBe(422);
    expect(error.reason).toBe("Unprocessable Entity");
    expect(error.body).toEqual({ error: "missing key" });
    expect(error.message).toBe('Batch rejected with 422 Unprocessable Entity: {"error":"missing key"}');
  });
});
