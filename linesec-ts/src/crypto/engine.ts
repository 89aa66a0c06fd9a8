import { InvalidOptionError } from "../utils/errors.js";
import { rsaDecrypt, rsaEncrypt, generateRsaKeyPair, type AsymmetricKeyPair, type RsaPrivateParams, type RsaPublicParams } from "./asymmetric.js";
import { DEFAULT_MODULUS_BITS, MIN_MODULUS_BITS } from "./constants.js";
import { generateSessionCredentials, type SessionCredentials } from "./credentials.js";
import { hmacSign, hmacVerify } from "./mac.js";
import { aesDecrypt, aesEncrypt } from "./symmetric.js";

// CryptoEngineOptions configures key generation.
export type CryptoEngineOptions = Readonly<{
  /** RSA modulus size for listener key pairs (default 4096, minimum 2048). */
  modulusBits?: number;
}>;

// CryptoEngine groups the transport's cryptographic operations.
//
// The engine holds configuration only. Each call takes its key material as an argument
// and builds its cipher/MAC context locally, so one engine can serve any number of
// concurrent sessions.
export class CryptoEngine {
  readonly modulusBits: number;

  constructor(opts: CryptoEngineOptions = {}) {
    const bits = opts.modulusBits ?? DEFAULT_MODULUS_BITS;
    if (!Number.isSafeInteger(bits) || bits < MIN_MODULUS_BITS || bits % 8 !== 0) {
      throw new InvalidOptionError(`modulusBits must be a multiple of 8 and >= ${MIN_MODULUS_BITS}`);
    }
    this.modulusBits = bits;
  }

  generateSessionCredentials(): SessionCredentials {
    return generateSessionCredentials();
  }

  generateKeyPair(): Promise<AsymmetricKeyPair> {
    return generateRsaKeyPair(this.modulusBits);
  }

  encrypt(plaintext: string, creds: SessionCredentials): string {
    return aesEncrypt(plaintext, creds);
  }

  decrypt(ciphertext: string, creds: SessionCredentials): string {
    return aesDecrypt(ciphertext, creds);
  }

  sign(message: string, creds: SessionCredentials): string {
    return hmacSign(message, creds);
  }

  verifySignature(message: string, signature: string, creds: SessionCredentials): boolean {
    return hmacVerify(message, signature, creds);
  }

  asymmetricEncrypt(plaintext: string, publicParams: RsaPublicParams): string {
    return rsaEncrypt(plaintext, publicParams);
  }

  asymmetricDecrypt(ciphertext: string, privateParams: RsaPrivateParams): string {
    return rsaDecrypt(ciphertext, privateParams);
  }
}

// defaultCryptoEngine uses the default 4096-bit key size.
export const defaultCryptoEngine = new CryptoEngine();
