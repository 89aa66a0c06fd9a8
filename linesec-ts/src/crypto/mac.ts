import { equalBytes } from "@noble/ciphers/utils";
import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha256";
import { utf8ToBytes } from "@noble/hashes/utils";
import { base64Decode, base64Encode } from "../utils/base64.js";
import { SIGNATURE_BYTES } from "./constants.js";
import type { SessionCredentials } from "./credentials.js";

function computeTag(message: string, creds: SessionCredentials): Uint8Array {
  return hmac(sha256, creds.authKey, utf8ToBytes(message));
}

// hmacSign returns the base64 HMAC-SHA-256 of message under creds.authKey.
export function hmacSign(message: string, creds: SessionCredentials): string {
  return base64Encode(computeTag(message, creds));
}

// hmacVerify recomputes the tag and compares it in constant time. It never throws.
export function hmacVerify(message: string, signature: string, creds: SessionCredentials): boolean {
  let got: Uint8Array;
  try {
    got = base64Decode(signature);
  } catch {
    return false;
  }
  if (got.length !== SIGNATURE_BYTES) return false;
  if (creds.authKey.length === 0) return false;
  return equalBytes(got, computeTag(message, creds));
}
