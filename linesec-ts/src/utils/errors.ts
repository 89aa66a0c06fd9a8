export type LinesecStage = "validate" | "connect" | "handshake" | "read" | "write" | "codec" | "crypto" | "close";

export type LinesecErrorCode =
  | "crypto_error"
  | "deserialization_error"
  | "duplicate_session"
  | "endpoint_closed"
  | "frame_too_large"
  | "invalid_credentials"
  | "invalid_frame"
  | "invalid_option"
  | "serialization_error"
  | "signature_invalid"
  | "timeout";

type ErrorArgs = Readonly<{ stage: LinesecStage; message?: string; cause?: unknown }>;

export class LinesecError extends Error {
  readonly code: LinesecErrorCode;
  readonly stage: LinesecStage;
  override readonly cause?: unknown;

  constructor(args: Readonly<{ code: LinesecErrorCode; stage: LinesecStage; message?: string; cause?: unknown }>) {
    super(args.message ?? `${args.stage} failed`, args.cause !== undefined ? { cause: args.cause } : undefined);
    this.name = "LinesecError";
    this.code = args.code;
    this.stage = args.stage;
    if (args.cause !== undefined) this.cause = args.cause;
  }
}

// EndpointClosedError marks a frame operation that observed a closed stream.
export class EndpointClosedError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "endpoint_closed", ...args, message: args.message ?? "endpoint closed" });
    this.name = "EndpointClosedError";
  }
}

// SignatureInvalidError marks an encrypted frame whose MAC does not verify.
export class SignatureInvalidError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "signature_invalid", ...args, message: args.message ?? "frame signature invalid" });
    this.name = "SignatureInvalidError";
  }
}

export class CryptoError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "crypto_error", ...args });
    this.name = "CryptoError";
  }
}

export class InvalidCredentialsError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "invalid_credentials", ...args, message: args.message ?? "invalid session credentials" });
    this.name = "InvalidCredentialsError";
  }
}

export class DeserializationError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "deserialization_error", ...args });
    this.name = "DeserializationError";
  }
}

export class SerializationError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "serialization_error", ...args });
    this.name = "SerializationError";
  }
}

// InvalidFrameError marks a payload that cannot be written as a single unambiguous line.
export class InvalidFrameError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "invalid_frame", ...args });
    this.name = "InvalidFrameError";
  }
}

export class FrameTooLargeError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "frame_too_large", ...args, message: args.message ?? "frame too large" });
    this.name = "FrameTooLargeError";
  }
}

export class DuplicateSessionError extends LinesecError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super({ code: "duplicate_session", stage: "handshake", message: `session ${sessionId} is already registered` });
    this.name = "DuplicateSessionError";
    this.sessionId = sessionId;
  }
}

export class TimeoutError extends LinesecError {
  constructor(args: ErrorArgs) {
    super({ code: "timeout", ...args, message: args.message ?? "timeout" });
    this.name = "TimeoutError";
  }
}

export class InvalidOptionError extends LinesecError {
  constructor(message: string) {
    super({ code: "invalid_option", stage: "validate", message });
    this.name = "InvalidOptionError";
  }
}

export function isLinesecError(e: unknown): e is LinesecError {
  return e instanceof LinesecError;
}

export function isEndpointClosedError(e: unknown): e is EndpointClosedError {
  return e instanceof EndpointClosedError;
}

export function isSignatureInvalidError(e: unknown): e is SignatureInvalidError {
  return e instanceof SignatureInvalidError;
}

export function isCryptoError(e: unknown): e is CryptoError {
  return e instanceof CryptoError;
}

export function isTimeoutError(e: unknown): e is TimeoutError {
  return e instanceof TimeoutError;
}

// errorMessage renders an unknown thrown value for logs and wrapped messages.
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
