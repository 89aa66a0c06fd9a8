import { describe, expect, test } from "vitest";
import { jsonCodec } from "./codec.js";

describe("jsonCodec", () => {
  test("serializes to a single line", () => {
    expect(jsonCodec.serialize({ text: "a\nb", n: 1 })).toBe("{\"text\":\"a\\nb\",\"n\":1}");
  });

  test("deserializes JSON text", () => {
    expect(jsonCodec.deserialize("{\"ok\":true,\"list\":[1,2]}")).toEqual({ ok: true, list: [1, 2] });
  });

  test("rejects values JSON cannot represent", () => {
    expect(() => jsonCodec.serialize(undefined)).toThrow(/cannot serialize undefined/);
    expect(() => jsonCodec.serialize(() => 1)).toThrow(/cannot serialize function/);
    expect(() => jsonCodec.serialize(10n)).toThrow(TypeError);
  });

  test("rejects malformed text", () => {
    expect(() => jsonCodec.deserialize("{nope")).toThrow(SyntaxError);
  });
});
