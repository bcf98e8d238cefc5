import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  MessageValidationError,
  toWireMapping,
  validateWireMapping,
  type WireDefaults,
} from "../src";

const defaults: WireDefaults = {
  clientId: 7,
  namespace: "shop",
  tableName: "events",
  keyNames: ["id"],
};

describe("toWireMapping", () => {
  it("always carries client_id and namespace", () => {
    const mapping = toWireMapping({}, { clientId: 7, namespace: "shop" });

    expect(mapping).toEqual({ client_id: 7, namespace: "shop" });
  });

  it("falls back to client defaults for table and key names", () => {
    const mapping = toWireMapping({ data: { id: 1 } }, defaults);

    expect(mapping).toEqual({
      client_id: 7,
      namespace: "shop",
      table_name: "events",
      key_names: ["id"],
      data: { id: 1 },
    });
  });

  it("prefers message values over defaults", () => {
    const mapping = toWireMapping(
      { tableName: "users", keyNames: ["org", "id"] },
      defaults,
    );

    expect(mapping.table_name).toBe("users");
    expect(mapping.key_names).toEqual(["org", "id"]);
  });

  it("includes optional fields only when set on the message", () => {
    const mapping = toWireMapping(
      {
        tableName: "users",
        action: "SWITCH_VIEW",
        tableVersion: 3,
        sequence: 0,
        data: {},
      },
      defaults,
    );

    expect(mapping).toEqual({
      client_id: 7,
      namespace: "shop",
      table_name: "users",
      key_names: ["id"],
      action: "SWITCH_VIEW",
      table_version: 3,
      sequence: 0,
      data: {},
    });
  });

  it("omits absent fields instead of writing null", () => {
    const mapping = toWireMapping({ tableName: "users" }, { clientId: 1, namespace: "n" });

    expect(Object.keys(mapping).sort()).toEqual(["client_id", "namespace", "table_name"]);
  });
});

describe("validateWireMapping", () => {
  it("accepts a mapping with table and key names", async () => {
    const mapping = toWireMapping({}, defaults);

    const result = await Effect.runPromise(validateWireMapping(mapping));

    expect(result).toBe(mapping);
  });

  it("rejects a mapping without a table name", async () => {
    const mapping = toWireMapping({ keyNames: ["id"] }, { clientId: 1, namespace: "n" });

    const error = await Effect.runPromise(Effect.flip(validateWireMapping(mapping)));

    expect(error).toBeInstanceOf(MessageValidationError);
    expect(error.field).toBe("table_name");
    expect(error.message).toBe(
      'Invalid message field "table_name": not set on the message and the client has no default table name',
    );
  });

  it("rejects a mapping without key names", async () => {
    const mapping = toWireMapping({ tableName: "users" }, { clientId: 1, namespace: "n" });

    const error = await Effect.runPromise(Effect.flip(validateWireMapping(mapping)));

    expect(error._tag).toBe("MessageValidationError");
    expect(error.field).toBe("key_names");
  });

  it("rejects a fractional sequence", async () => {
    const mapping = toWireMapping({ sequence: 1.5 }, defaults);

    const error = await Effect.runPromise(Effect.flip(validateWireMapping(mapping)));

    expect(error._tag).toBe("MessageValidationError");
    expect(error.field).toBe("sequence");
  });

  it("rejects a table version beyond the safe integer range", async () => {
    const mapping = toWireMapping({ tableVersion: 2 ** 60 }, defaults);

    const error = await Effect.runPromise(Effect.flip(validateWireMapping(mapping)));

    expect(error.field).toBe("table_version");
  });
});
