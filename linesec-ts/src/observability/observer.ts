import type { Endpoint } from "../endpoint/endpoint.js";
import { errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/log.js";

const log = createLogger("endpoint");

export type DisconnectReason = "peer_closed" | "local_close" | "stream_error" | "frame_error";

export type HandshakeSide = "connect" | "accept";
export type HandshakeResult = "ok" | "fail";
export type HandshakeReason =
  | "crypto_error"
  | "deserialization_error"
  | "endpoint_closed"
  | "error"
  | "invalid_credentials"
  | "timeout";

export type FrameRejectReason = "signature_invalid" | "decrypt_failed";

export type SessionObserver = {
  onConnected(endpoint: Endpoint): void;
  onDisconnected(endpoint: Endpoint, reason: DisconnectReason): void;
  onHandshake(side: HandshakeSide, result: HandshakeResult, reason: HandshakeReason | undefined, elapsedSeconds: number): void;
  onFrameRejected(endpoint: Endpoint, reason: FrameRejectReason): void;
};

export type SessionObserverLike = Partial<SessionObserver>;

export const NoopObserver: SessionObserver = {
  onConnected: () => {},
  onDisconnected: () => {},
  onHandshake: () => {},
  onFrameRejected: () => {}
};

export function normalizeObserver(observer?: SessionObserverLike): SessionObserver {
  if (observer == null) return NoopObserver;
  return {
    onConnected: observer.onConnected ?? NoopObserver.onConnected,
    onDisconnected: observer.onDisconnected ?? NoopObserver.onDisconnected,
    onHandshake: observer.onHandshake ?? NoopObserver.onHandshake,
    onFrameRejected: observer.onFrameRejected ?? NoopObserver.onFrameRejected
  };
}

// ObserverSet fans notifications out to every registered observer.
// Notifications are best-effort: an observer that throws is logged and skipped.
export class ObserverSet implements SessionObserver {
  private observers: SessionObserver[] = [];

  // add registers an observer and returns its unsubscribe function.
  add(observer: SessionObserverLike): () => void {
    const normalized = normalizeObserver(observer);
    this.observers = [...this.observers, normalized];
    return () => {
      this.observers = this.observers.filter((o) => o !== normalized);
    };
  }

  get size(): number {
    return this.observers.length;
  }

  onConnected(endpoint: Endpoint): void {
    this.each("onConnected", (o) => o.onConnected(endpoint));
  }

  onDisconnected(endpoint: Endpoint, reason: DisconnectReason): void {
    this.each("onDisconnected", (o) => o.onDisconnected(endpoint, reason));
  }

  onHandshake(side: HandshakeSide, result: HandshakeResult, reason: HandshakeReason | undefined, elapsedSeconds: number): void {
    this.each("onHandshake", (o) => o.onHandshake(side, result, reason, elapsedSeconds));
  }

  onFrameRejected(endpoint: Endpoint, reason: FrameRejectReason): void {
    this.each("onFrameRejected", (o) => o.onFrameRejected(endpoint, reason));
  }

  private each(event: keyof SessionObserver, fn: (o: SessionObserver) => void): void {
    // Iterate a snapshot so observers may unsubscribe while being notified.
    for (const o of this.observers) {
      try {
        fn(o);
      } catch (e) {
        log("observer %s threw: %s", event, errorMessage(e));
      }
    }
  }
}

export function nowSeconds(): number {
  return performance.now() / 1000;
}
