const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// base64Encode encodes bytes with the standard alphabet and padding.
export function base64Encode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

// isBase64 reports whether s is canonical padded standard base64.
export function isBase64(s: string): boolean {
  return BASE64_RE.test(s);
}

// base64Decode decodes padded standard base64.
export function base64Decode(s: string): Uint8Array {
  // Node's Buffer decoder skips invalid characters, so the shape is checked first.
  if (!isBase64(s)) throw new Error("invalid base64");
  const out = new Uint8Array(Buffer.from(s, "base64"));
  // Non-zero trailing bits would otherwise decode to the same bytes as another string.
  if (base64Encode(out) !== s) throw new Error("invalid base64");
  return out;
}
