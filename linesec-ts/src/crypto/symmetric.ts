import { cbc } from "@noble/ciphers/aes";
import { utf8ToBytes } from "@noble/hashes/utils";
import { base64Decode, base64Encode } from "../utils/base64.js";
import { CryptoError, errorMessage } from "../utils/errors.js";
import type { SessionCredentials } from "./credentials.js";

const td = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

// aesEncrypt encrypts the UTF-8 bytes of plaintext with AES-CBC/PKCS#7 and returns base64.
// A fresh cipher is built per call, so concurrent sessions share no cipher state.
export function aesEncrypt(plaintext: string, creds: SessionCredentials): string {
  let out: Uint8Array;
  try {
    out = cbc(creds.cipherKey, creds.iv).encrypt(utf8ToBytes(plaintext));
  } catch (e) {
    throw new CryptoError({ stage: "crypto", message: `encrypt failed: ${errorMessage(e)}`, cause: e });
  }
  return base64Encode(out);
}

// aesDecrypt reverses aesEncrypt.
export function aesDecrypt(ciphertext: string, creds: SessionCredentials): string {
  let raw: Uint8Array;
  try {
    raw = base64Decode(ciphertext);
  } catch (e) {
    throw new CryptoError({ stage: "crypto", message: "decrypt failed: ciphertext is not base64", cause: e });
  }
  try {
    return td.decode(cbc(creds.cipherKey, creds.iv).decrypt(raw));
  } catch (e) {
    throw new CryptoError({ stage: "crypto", message: `decrypt failed: ${errorMessage(e)} len=${raw.length}`, cause: e });
  }
}
