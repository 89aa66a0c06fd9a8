import { randomBytes } from "@noble/hashes/utils";
import { base64Decode, base64Encode } from "../utils/base64.js";
import { DeserializationError, InvalidCredentialsError } from "../utils/errors.js";
import { AUTH_KEY_BYTES, CIPHER_KEY_BYTES, CIPHER_KEY_SIZES, IV_BYTES } from "./constants.js";

// SessionCredentials is the symmetric key material of one session.
export type SessionCredentials = Readonly<{
  /** AES key (16, 24 or 32 bytes). */
  cipherKey: Uint8Array;
  /** CBC initialization vector (16 bytes). */
  iv: Uint8Array;
  /** HMAC-SHA-256 key. */
  authKey: Uint8Array;
}>;

// CredentialsPayload is the JSON wire form sent inside the handshake.
export type CredentialsPayload = {
  cipher_key_b64: string;
  iv_b64: string;
  auth_key_b64: string;
};

// createSessionCredentials copies the inputs into a frozen credentials value.
export function createSessionCredentials(cipherKey: Uint8Array, iv: Uint8Array, authKey: Uint8Array): SessionCredentials {
  return Object.freeze({ cipherKey: cipherKey.slice(), iv: iv.slice(), authKey: authKey.slice() });
}

// generateSessionCredentials draws a fresh cipher key, IV and auth key.
export function generateSessionCredentials(): SessionCredentials {
  return Object.freeze({
    cipherKey: randomBytes(CIPHER_KEY_BYTES),
    iv: randomBytes(IV_BYTES),
    authKey: randomBytes(AUTH_KEY_BYTES)
  });
}

// isValidCredentials is true when every field is present and non-empty.
// Anything else means the session runs without encryption.
export function isValidCredentials(c: SessionCredentials | null | undefined): c is SessionCredentials {
  return c != null && c.cipherKey.length !== 0 && c.iv.length !== 0 && c.authKey.length !== 0;
}

// assertUsableCredentials checks that credentials received from a peer can drive AES-CBC and HMAC.
export function assertUsableCredentials(c: SessionCredentials): SessionCredentials {
  if (!isValidCredentials(c)) throw new InvalidCredentialsError({ stage: "handshake", message: "empty session credentials" });
  if (!CIPHER_KEY_SIZES.includes(c.cipherKey.length)) {
    throw new InvalidCredentialsError({ stage: "handshake", message: `bad cipher key length ${c.cipherKey.length}` });
  }
  if (c.iv.length !== IV_BYTES) {
    throw new InvalidCredentialsError({ stage: "handshake", message: `bad iv length ${c.iv.length}` });
  }
  return c;
}

export function encodeCredentialsPayload(c: SessionCredentials): CredentialsPayload {
  return {
    cipher_key_b64: base64Encode(c.cipherKey),
    iv_b64: base64Encode(c.iv),
    auth_key_b64: base64Encode(c.authKey)
  };
}

function decodeField(o: object, field: keyof CredentialsPayload): Uint8Array {
  const v: unknown = Reflect.get(o, field);
  if (v == null || v === "") return new Uint8Array();
  if (typeof v !== "string") throw new DeserializationError({ stage: "handshake", message: `bad credentials payload: ${field}` });
  try {
    return base64Decode(v);
  } catch (e) {
    throw new DeserializationError({ stage: "handshake", message: `bad credentials payload: ${field}`, cause: e });
  }
}

// decodeCredentialsPayload validates the JSON shape and decodes the key material.
// Missing or empty fields decode to empty arrays so validity is judged separately.
export function decodeCredentialsPayload(v: unknown): SessionCredentials {
  if (typeof v !== "object" || v == null || Array.isArray(v)) {
    throw new DeserializationError({ stage: "handshake", message: "bad credentials payload" });
  }
  return Object.freeze({
    cipherKey: decodeField(v, "cipher_key_b64"),
    iv: decodeField(v, "iv_b64"),
    authKey: decodeField(v, "auth_key_b64")
  });
}

// credentialsEqual compares two credentials field by field.
export function credentialsEqual(a: SessionCredentials, b: SessionCredentials): boolean {
  return bytesEqual(a.cipherKey, b.cipherKey) && bytesEqual(a.iv, b.iv) && bytesEqual(a.authKey, b.authKey);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}
