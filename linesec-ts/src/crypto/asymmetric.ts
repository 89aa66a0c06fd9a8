import { generateKeyPair } from "node:crypto";
import { promisify } from "node:util";
import forge from "node-forge";
import type { jsbn, pki } from "node-forge";
import { base64Decode, base64Encode, isBase64 } from "../utils/base64.js";
import { CryptoError, DeserializationError, errorMessage } from "../utils/errors.js";
import { MIN_MODULUS_BITS, PKCS1_V15_OVERHEAD, RSA_PUBLIC_EXPONENT } from "./constants.js";

const generateKeyPairAsync = promisify(generateKeyPair);

const PKCS1_V15 = "RSAES-PKCS1-V1_5";

// RsaPublicParams is the JSON wire form of an RSA public key: big-endian modulus and exponent.
export type RsaPublicParams = Readonly<{
  modulus_b64: string;
  exponent_b64: string;
}>;

// RsaPrivateParams holds the private key of a listener activation.
export type RsaPrivateParams = pki.rsa.PrivateKey;

// AsymmetricKeyPair is generated once per listener activation and only read afterwards.
export type AsymmetricKeyPair = Readonly<{
  publicParams: RsaPublicParams;
  privateParams: RsaPrivateParams;
  modulusBits: number;
}>;

function bigIntegerToBytes(n: jsbn.BigInteger): Uint8Array {
  let hex = n.toString(16);
  if (hex.length % 2 === 1) hex = `0${hex}`;
  return new Uint8Array(Buffer.from(hex, "hex"));
}

function bytesToBigInteger(b: Uint8Array): jsbn.BigInteger {
  return new forge.jsbn.BigInteger(Buffer.from(b).toString("hex"), 16);
}

// generateRsaKeyPair creates a key pair with node's native generator and exposes it to forge.
export async function generateRsaKeyPair(modulusBits: number): Promise<AsymmetricKeyPair> {
  const { privateKey } = await generateKeyPairAsync("rsa", {
    modulusLength: modulusBits,
    publicExponent: RSA_PUBLIC_EXPONENT,
    publicKeyEncoding: { type: "pkcs1", format: "pem" },
    privateKeyEncoding: { type: "pkcs1", format: "pem" }
  });
  const priv = forge.pki.privateKeyFromPem(privateKey);
  return Object.freeze({
    publicParams: Object.freeze({
      modulus_b64: base64Encode(bigIntegerToBytes(priv.n)),
      exponent_b64: base64Encode(bigIntegerToBytes(priv.e))
    }),
    privateParams: priv,
    modulusBits
  });
}

// assertRsaPublicParams validates the JSON shape of public params received from a peer.
export function assertRsaPublicParams(v: unknown): RsaPublicParams {
  if (typeof v !== "object" || v == null || Array.isArray(v)) {
    throw new DeserializationError({ stage: "handshake", message: "bad public params" });
  }
  const modulus: unknown = Reflect.get(v, "modulus_b64");
  const exponent: unknown = Reflect.get(v, "exponent_b64");
  if (typeof modulus !== "string" || modulus === "" || !isBase64(modulus)) {
    throw new DeserializationError({ stage: "handshake", message: "bad public params: modulus_b64" });
  }
  if (typeof exponent !== "string" || exponent === "" || !isBase64(exponent)) {
    throw new DeserializationError({ stage: "handshake", message: "bad public params: exponent_b64" });
  }
  return { modulus_b64: modulus, exponent_b64: exponent };
}

function importPublicKey(params: RsaPublicParams): pki.rsa.PublicKey {
  let n: jsbn.BigInteger;
  let e: jsbn.BigInteger;
  try {
    n = bytesToBigInteger(base64Decode(params.modulus_b64));
    e = bytesToBigInteger(base64Decode(params.exponent_b64));
  } catch (err) {
    throw new CryptoError({ stage: "crypto", message: "bad public params encoding", cause: err });
  }
  if (n.bitLength() < MIN_MODULUS_BITS) {
    throw new CryptoError({ stage: "crypto", message: `modulus too small: ${n.bitLength()} bits` });
  }
  if (e.bitLength() < 2 || !e.testBit(0)) {
    throw new CryptoError({ stage: "crypto", message: "bad public exponent" });
  }
  return forge.pki.rsa.setPublicKey(n, e);
}

// rsaEncrypt encrypts the UTF-8 bytes of plaintext with PKCS#1 v1.5 padding and returns base64.
export function rsaEncrypt(plaintext: string, params: RsaPublicParams): string {
  const key = importPublicKey(params);
  const data = forge.util.encodeUtf8(plaintext);
  const maxBytes = Math.ceil(key.n.bitLength() / 8) - PKCS1_V15_OVERHEAD;
  if (data.length > maxBytes) {
    throw new CryptoError({ stage: "crypto", message: `message too long for modulus: ${data.length} > ${maxBytes}` });
  }
  try {
    return forge.util.encode64(key.encrypt(data, PKCS1_V15));
  } catch (e) {
    throw new CryptoError({ stage: "crypto", message: `rsa encrypt failed: ${errorMessage(e)}`, cause: e });
  }
}

// rsaDecrypt reverses rsaEncrypt.
export function rsaDecrypt(ciphertext: string, params: RsaPrivateParams): string {
  if (ciphertext === "" || !isBase64(ciphertext)) {
    throw new CryptoError({ stage: "crypto", message: "rsa decrypt failed: ciphertext is not base64" });
  }
  try {
    return forge.util.decodeUtf8(params.decrypt(forge.util.decode64(ciphertext), PKCS1_V15));
  } catch (e) {
    throw new CryptoError({ stage: "crypto", message: `rsa decrypt failed: ${errorMessage(e)}`, cause: e });
  }
}
