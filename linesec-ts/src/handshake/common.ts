import type { Endpoint } from "../endpoint/endpoint.js";
import type { HandshakeReason } from "../observability/observer.js";
import { DEFAULT_HANDSHAKE_TIMEOUT_MS } from "./constants.js";
import { TimeoutError, isLinesecError } from "../utils/errors.js";
import { nonNegativeIntOption } from "../utils/options.js";

export function handshakeTimeoutOption(timeoutMs: number | undefined): number {
  return nonNegativeIntOption("handshakeTimeoutMs", timeoutMs, DEFAULT_HANDSHAKE_TIMEOUT_MS);
}

// withHandshakeTimeout bounds run(). On expiry the endpoint is closed, which ends any
// pending read, and the failure surfaces as TimeoutError.
export async function withHandshakeTimeout<T>(endpoint: Endpoint, timeoutMs: number, run: () => Promise<T>): Promise<T> {
  if (timeoutMs <= 0) return await run();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    endpoint.close();
  }, timeoutMs);
  try {
    return await run();
  } catch (e) {
    if (timedOut) throw new TimeoutError({ stage: "handshake", message: "handshake timeout", cause: e });
    throw e;
  } finally {
    clearTimeout(timer);
  }
}

// handshakeReason classifies a handshake failure for observers.
export function handshakeReason(e: unknown): HandshakeReason {
  if (!isLinesecError(e)) return "error";
  switch (e.code) {
    case "timeout":
      return "timeout";
    case "crypto_error":
      return "crypto_error";
    case "deserialization_error":
      return "deserialization_error";
    case "invalid_credentials":
      return "invalid_credentials";
    case "endpoint_closed":
      return "endpoint_closed";
    default:
      return "error";
  }
}
