import { DeserializationError, SerializationError, errorMessage } from "../utils/errors.js";

// Handshake objects are always JSON, independent of the endpoint's codec.

export function encodeHandshakeObject(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch (e) {
    throw new SerializationError({ stage: "handshake", message: `encode handshake object: ${errorMessage(e)}`, cause: e });
  }
}

export function decodeHandshakeObject<T>(text: string, validate: (v: unknown) => T): T {
  let v: unknown;
  try {
    v = JSON.parse(text);
  } catch (e) {
    throw new DeserializationError({ stage: "handshake", message: `decode handshake object: ${errorMessage(e)}`, cause: e });
  }
  return validate(v);
}
