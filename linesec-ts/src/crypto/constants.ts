// AES-256 key length for generated credentials.
export const CIPHER_KEY_BYTES = 32;
// Accepted AES key lengths (AES-128/192/256).
export const CIPHER_KEY_SIZES: readonly number[] = [16, 24, 32];
// AES block size, also the CBC IV length.
export const IV_BYTES = 16;
// HMAC-SHA-256 block size; generated auth keys fill one block.
export const AUTH_KEY_BYTES = 64;
// HMAC-SHA-256 output length.
export const SIGNATURE_BYTES = 32;

// Default RSA modulus size for listener key pairs.
export const DEFAULT_MODULUS_BITS = 4096;
// Smallest accepted modulus; credentials payloads do not fit below it.
export const MIN_MODULUS_BITS = 2048;
export const RSA_PUBLIC_EXPONENT = 0x10001;
// PKCS#1 v1.5 encryption padding overhead in bytes.
export const PKCS1_V15_OVERHEAD = 11;
