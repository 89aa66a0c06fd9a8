import type { Codec } from "../codec/codec.js";
import type { AsymmetricKeyPair, RsaPublicParams } from "../crypto/asymmetric.js";
import { defaultCryptoEngine, type CryptoEngine } from "../crypto/engine.js";
import { Endpoint } from "../endpoint/endpoint.js";
import { handshakeReason, handshakeTimeoutOption } from "../handshake/common.js";
import { HandshakeCoordinator } from "../handshake/server.js";
import { ObserverSet, nowSeconds, type SessionObserverLike } from "../observability/observer.js";
import type { ByteStream, StreamListener } from "../transport/stream.js";
import { errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/log.js";
import { nonNegativeIntOption } from "../utils/options.js";
import { DEFAULT_MAX_LINE_BYTES } from "../framing/constants.js";
import { SessionRegistry } from "./registry.js";

const log = createLogger("server");

// SessionServerOptions configures a listener.
export type SessionServerOptions = Readonly<{
  /** Run the key exchange on every accepted connection (default true). */
  secure?: boolean;
  /** Crypto operations and RSA key size (default: 4096-bit engine). */
  engine?: CryptoEngine;
  /** Codec handed to accepted endpoints (default: JSON). */
  codec?: Codec;
  /** Maximum bytes per line on accepted endpoints (default 1 MiB, 0 disables). */
  maxLineBytes?: number;
  /** Per-connection handshake timeout in milliseconds (default 10000, 0 disables). */
  handshakeTimeoutMs?: number;
  /** Observer registered before serving starts. */
  observer?: SessionObserverLike;
}>;

// SessionServer accepts connections from a StreamListener, runs the listener side of
// the handshake for each one in its own task, and keeps the live endpoints in a registry.
export class SessionServer {
  readonly secure: boolean;

  private readonly listener: StreamListener;
  private readonly engine: CryptoEngine;
  private readonly codec: Codec | undefined;
  private readonly maxLineBytes: number;
  private readonly handshakeTimeoutMs: number;
  private readonly observers = new ObserverSet();
  private readonly registry = new SessionRegistry();
  private readonly inflight = new Set<Endpoint>();

  private keyPair: AsymmetricKeyPair | null = null;
  private coordinator: HandshakeCoordinator | null = null;
  private serving = false;
  private stopped = false;

  constructor(listener: StreamListener, opts: SessionServerOptions = {}) {
    this.listener = listener;
    this.secure = opts.secure ?? true;
    this.engine = opts.engine ?? defaultCryptoEngine;
    this.codec = opts.codec;
    this.maxLineBytes = nonNegativeIntOption("maxLineBytes", opts.maxLineBytes, DEFAULT_MAX_LINE_BYTES);
    this.handshakeTimeoutMs = handshakeTimeoutOption(opts.handshakeTimeoutMs);
    if (opts.observer != null) this.observers.add(opts.observer);
  }

  // endpoints is a snapshot of the registered endpoints.
  get endpoints(): readonly Endpoint[] {
    return this.registry.list();
  }

  // publicParams is available once serve() has generated the key pair (secure mode only).
  get publicParams(): RsaPublicParams | null {
    return this.keyPair?.publicParams ?? null;
  }

  // addObserver registers a server-wide observer and returns its unsubscribe function.
  addObserver(observer: SessionObserverLike): () => void {
    return this.observers.add(observer);
  }

  // getEndpoint looks up a registered endpoint by session id.
  getEndpoint(sessionId: string): Endpoint | undefined {
    return this.registry.get(sessionId);
  }

  // removeEndpoints unregisters matching endpoints without closing them.
  removeEndpoints(predicate: (endpoint: Endpoint) => boolean): Endpoint[] {
    return this.registry.remove(predicate);
  }

  // serve generates the key pair (secure mode) and accepts connections until the
  // listener is closed. Handshakes never block the accept loop.
  async serve(): Promise<void> {
    if (this.serving) throw new Error("server is already serving");
    if (this.stopped) throw new Error("server is stopped");
    this.serving = true;

    if (this.secure) {
      const keyPair = await this.engine.generateKeyPair();
      if (this.stopped) return;
      this.keyPair = keyPair;
      this.coordinator = new HandshakeCoordinator(keyPair, {
        timeoutMs: this.handshakeTimeoutMs,
        isTaken: (id) => this.registry.has(id)
      });
      log("key pair ready (%d bits)", keyPair.modulusBits);
    }

    for (;;) {
      const stream = await this.listener.accept();
      if (stream == null) break;
      if (this.stopped) {
        stream.close();
        continue;
      }
      void this.handleConnection(stream);
    }
    log("accept loop finished");
  }

  // stop closes the listener and every endpoint, then drops the key pair. Idempotent.
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.listener.close();
    for (const ep of this.inflight) ep.close();
    this.inflight.clear();
    for (const ep of this.registry.list()) ep.close();
    this.registry.clear();
    this.keyPair = null;
    this.coordinator = null;
    log("stopped");
  }

  private async handleConnection(stream: ByteStream): Promise<void> {
    const endpoint = new Endpoint(stream, {
      engine: this.engine,
      maxLineBytes: this.maxLineBytes,
      ...(this.codec !== undefined ? { codec: this.codec } : {})
    });
    this.inflight.add(endpoint);
    try {
      const coordinator = this.coordinator;
      if (coordinator != null) {
        const start = nowSeconds();
        try {
          await coordinator.accept(endpoint);
        } catch (e) {
          this.observers.onHandshake("accept", "fail", handshakeReason(e), nowSeconds() - start);
          log("#%d handshake failed: %s", endpoint.localId, errorMessage(e));
          endpoint.close();
          return;
        }
        this.observers.onHandshake("accept", "ok", undefined, nowSeconds() - start);
      }
      if (this.stopped || endpoint.state !== "connecting") {
        endpoint.close();
        return;
      }
      this.register(endpoint);
    } finally {
      this.inflight.delete(endpoint);
    }
  }

  private register(endpoint: Endpoint): void {
    try {
      this.registry.add(endpoint);
    } catch (e) {
      log("#%d register failed: %s", endpoint.localId, errorMessage(e));
      endpoint.close();
      return;
    }
    endpoint.addObserver({
      onDisconnected: (ep, reason) => {
        this.registry.remove((x) => x === ep);
        this.observers.onDisconnected(ep, reason);
      },
      onFrameRejected: (ep, reason) => this.observers.onFrameRejected(ep, reason)
    });
    endpoint.markOpen();
    log("#%d registered session=%s", endpoint.localId, endpoint.sessionId ?? "-");
    this.observers.onConnected(endpoint);
  }
}
