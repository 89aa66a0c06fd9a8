import { describe, expect, test } from "vitest";
import { DeserializationError, InvalidCredentialsError } from "../utils/errors.js";
import {
  assertUsableCredentials,
  createSessionCredentials,
  credentialsEqual,
  decodeCredentialsPayload,
  encodeCredentialsPayload,
  generateSessionCredentials,
  isValidCredentials
} from "./credentials.js";

describe("SessionCredentials", () => {
  test("generated credentials use AES-256, a block-sized iv and a 64-byte auth key", () => {
    const c = generateSessionCredentials();
    expect(c.cipherKey.length).toBe(32);
    expect(c.iv.length).toBe(16);
    expect(c.authKey.length).toBe(64);
    expect(Object.isFrozen(c)).toBe(true);
  });

  test("generated credentials are independent per call", () => {
    const a = generateSessionCredentials();
    const b = generateSessionCredentials();
    expect(credentialsEqual(a, b)).toBe(false);
  });

  test("isValidCredentials requires every field to be non-empty", () => {
    expect(isValidCredentials(undefined)).toBe(false);
    expect(isValidCredentials(null)).toBe(false);
    expect(isValidCredentials(createSessionCredentials(new Uint8Array(32), new Uint8Array(16), new Uint8Array()))).toBe(false);
    expect(isValidCredentials(createSessionCredentials(new Uint8Array(32), new Uint8Array(16), new Uint8Array(1)))).toBe(true);
  });

  test("createSessionCredentials copies its inputs", () => {
    const key = new Uint8Array(32).fill(4);
    const c = createSessionCredentials(key, new Uint8Array(16), new Uint8Array(64));
    key.fill(0);
    expect(c.cipherKey[0]).toBe(4);
  });

  test("payload encoding round trips", () => {
    const c = generateSessionCredentials();
    const payload = encodeCredentialsPayload(c);
    const decoded = decodeCredentialsPayload(JSON.parse(JSON.stringify(payload)));
    expect(credentialsEqual(decoded, c)).toBe(true);
  });

  test("payload uses snake_case base64 fields", () => {
    const c = createSessionCredentials(new Uint8Array([1, 2, 3]), new Uint8Array([4]), new Uint8Array([255]));
    expect(encodeCredentialsPayload(c)).toEqual({ cipher_key_b64: "AQID", iv_b64: "BA==", auth_key_b64: "/w==" });
  });

  test("missing fields decode to invalid credentials", () => {
    const decoded = decodeCredentialsPayload({ cipher_key_b64: "AQID" });
    expect(isValidCredentials(decoded)).toBe(false);
    expect(() => assertUsableCredentials(decoded)).toThrow(InvalidCredentialsError);
  });

  test("malformed payloads are deserialization errors", () => {
    expect(() => decodeCredentialsPayload("nope")).toThrow(DeserializationError);
    expect(() => decodeCredentialsPayload({ cipher_key_b64: 42 })).toThrow(/cipher_key_b64/);
    expect(() => decodeCredentialsPayload({ iv_b64: "***" })).toThrow(/iv_b64/);
  });

  test("assertUsableCredentials checks key and iv sizes", () => {
    const badKey = createSessionCredentials(new Uint8Array(20), new Uint8Array(16), new Uint8Array(64));
    const badIv = createSessionCredentials(new Uint8Array(32), new Uint8Array(8), new Uint8Array(64));
    expect(() => assertUsableCredentials(badKey)).toThrow(/bad cipher key length 20/);
    expect(() => assertUsableCredentials(badIv)).toThrow(/bad iv length 8/);
    const ok = generateSessionCredentials();
    expect(assertUsableCredentials(ok)).toBe(ok);
  });
});
