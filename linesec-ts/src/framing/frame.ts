import { InvalidFrameError, type LinesecStage } from "../utils/errors.js";
import { FRAME_SEPARATOR } from "./constants.js";

// Frame is one parsed line: verbatim text, or a ciphertext/signature pair.
export type Frame =
  | Readonly<{ kind: "plain"; text: string }>
  | Readonly<{ kind: "sealed"; ciphertext: string; signature: string }>;

// parseFrame classifies a line read while encryption is in effect.
// A line without the separator is an out-of-band plaintext line; otherwise the
// first separator splits ciphertext from signature.
export function parseFrame(line: string): Frame {
  const i = line.indexOf(FRAME_SEPARATOR);
  if (i < 0) return { kind: "plain", text: line };
  return { kind: "sealed", ciphertext: line.slice(0, i), signature: line.slice(i + 1) };
}

// encodeSealedFrame joins ciphertext and signature into one frame.
export function encodeSealedFrame(ciphertext: string, signature: string): string {
  return `${ciphertext}${FRAME_SEPARATOR}${signature}`;
}

// assertSingleLine rejects payloads that would split into several frames on the wire.
export function assertSingleLine(payload: string, stage: LinesecStage): void {
  if (payload.includes("\n") || payload.includes("\r")) {
    throw new InvalidFrameError({ stage, message: "frame payload must not contain line breaks" });
  }
}

// assertNoSeparator rejects plaintext that a peer with active credentials would misread
// as an encrypted frame.
export function assertNoSeparator(payload: string, stage: LinesecStage): void {
  if (payload.includes(FRAME_SEPARATOR)) {
    throw new InvalidFrameError({ stage, message: `plaintext frame must not contain "${FRAME_SEPARATOR}" while encryption is active` });
  }
}
