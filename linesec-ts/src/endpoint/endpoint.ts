import { jsonCodec, type Codec } from "../codec/codec.js";
import { createSessionCredentials, isValidCredentials, type SessionCredentials } from "../crypto/credentials.js";
import { defaultCryptoEngine, type CryptoEngine } from "../crypto/engine.js";
import { DEFAULT_MAX_LINE_BYTES, LINE_TERMINATOR } from "../framing/constants.js";
import { assertNoSeparator, assertSingleLine, encodeSealedFrame, parseFrame } from "../framing/frame.js";
import { LineReader } from "../framing/lineReader.js";
import {
  ObserverSet,
  type DisconnectReason,
  type HandshakeReason,
  type HandshakeResult,
  type HandshakeSide,
  type SessionObserverLike
} from "../observability/observer.js";
import type { ByteStream } from "../transport/stream.js";
import {
  DeserializationError,
  EndpointClosedError,
  FrameTooLargeError,
  InvalidFrameError,
  SerializationError,
  SignatureInvalidError,
  errorMessage,
  isCryptoError,
  type LinesecStage
} from "../utils/errors.js";
import { createLogger } from "../utils/log.js";
import { nonNegativeIntOption } from "../utils/options.js";

const log = createLogger("endpoint");
const te = new TextEncoder();

let nextLocalId = 1;

// EndpointState: connecting -> open -> closed (terminal).
export type EndpointState = "connecting" | "open" | "closed";

// EndpointOptions configures framing and notification for one endpoint.
export type EndpointOptions = Readonly<{
  /** Crypto operations used for encrypted frames (default: 4096-bit engine). */
  engine?: CryptoEngine;
  /** Structured-text codec behind readObject/writeObject (default: JSON). */
  codec?: Codec;
  /** Maximum bytes per line, terminator excluded (default 1 MiB, 0 disables). */
  maxLineBytes?: number;
  /** Observer registered before the endpoint starts. */
  observer?: SessionObserverLike;
}>;

// Endpoint is one side's view of a connection: the stream it owns, the optional
// session credentials and the session id assigned by the listener.
export class Endpoint {
  // Process-local id for logs.
  readonly localId = nextLocalId++;
  readonly engine: CryptoEngine;
  readonly codec: Codec;

  private readonly stream: ByteStream;
  private readonly reader: LineReader;
  private readonly observers = new ObserverSet();

  private currentState: EndpointState = "connecting";
  private sessionCredentials: SessionCredentials | null = null;
  private assignedSessionId: string | null = null;
  // First observed close reason; the disconnect is announced once, for this reason.
  private closeReason: DisconnectReason | null = null;

  constructor(stream: ByteStream, opts: EndpointOptions = {}) {
    this.stream = stream;
    this.engine = opts.engine ?? defaultCryptoEngine;
    this.codec = opts.codec ?? jsonCodec;
    const maxLineBytes = nonNegativeIntOption("maxLineBytes", opts.maxLineBytes, DEFAULT_MAX_LINE_BYTES);
    this.reader = new LineReader(() => this.stream.read(), maxLineBytes);
    if (opts.observer != null) this.observers.add(opts.observer);
  }

  get state(): EndpointState {
    return this.currentState;
  }

  // remoteAddress is the peer address reported by the stream, if any.
  get remoteAddress(): string | null {
    return this.stream.remoteAddress ?? null;
  }

  get sessionId(): string | null {
    return this.assignedSessionId;
  }

  get credentials(): SessionCredentials | null {
    return this.sessionCredentials;
  }

  // encrypted is true when valid credentials are in effect.
  get encrypted(): boolean {
    return isValidCredentials(this.sessionCredentials);
  }

  // addObserver registers an observer and returns its unsubscribe function.
  addObserver(observer: SessionObserverLike): () => void {
    return this.observers.add(observer);
  }

  // setCredentials installs the session credentials. They are fixed for the endpoint's lifetime.
  setCredentials(credentials: SessionCredentials): void {
    if (this.sessionCredentials != null) throw new Error("session credentials already set");
    // The endpoint owns a private copy; later changes to the caller's arrays do not reach it.
    this.sessionCredentials = createSessionCredentials(credentials.cipherKey, credentials.iv, credentials.authKey);
  }

  // setSessionId records the id assigned by the listener.
  setSessionId(sessionId: string): void {
    if (this.assignedSessionId != null) throw new Error("session id already set");
    this.assignedSessionId = sessionId;
  }

  // markOpen finishes connection setup and emits the connected notification.
  markOpen(): void {
    if (this.currentState !== "connecting") throw new Error(`cannot open endpoint in state ${this.currentState}`);
    this.currentState = "open";
    log("#%d open peer=%s session=%s encrypted=%s", this.localId, this.remoteAddress ?? "-", this.assignedSessionId ?? "-", this.encrypted);
    this.observers.onConnected(this);
  }

  // readRawFrame reads one line without any decryption.
  async readRawFrame(): Promise<string> {
    this.assertUsable("read");
    let line: string | null;
    try {
      line = await this.reader.readLine();
    } catch (e) {
      if (e instanceof FrameTooLargeError || e instanceof InvalidFrameError) {
        this.shutdown("frame_error");
        throw e;
      }
      this.shutdown("stream_error");
      throw new EndpointClosedError({ stage: "read", message: `stream failed: ${errorMessage(e)}`, cause: e });
    }
    if (line == null) {
      this.shutdown("peer_closed");
      const message = this.closeReason === "local_close" ? "endpoint closed" : "peer closed the stream";
      throw new EndpointClosedError({ stage: "read", message });
    }
    return line;
  }

  // readFrame reads one line and, when credentials are in effect, verifies and decrypts it.
  async readFrame(): Promise<string> {
    const line = await this.readRawFrame();
    const creds = this.sessionCredentials;
    if (!isValidCredentials(creds)) return line;
    const frame = parseFrame(line);
    if (frame.kind === "plain") return frame.text;
    if (!this.engine.verifySignature(frame.ciphertext, frame.signature, creds)) {
      this.observers.onFrameRejected(this, "signature_invalid");
      throw new SignatureInvalidError({ stage: "read" });
    }
    try {
      return this.engine.decrypt(frame.ciphertext, creds);
    } catch (e) {
      if (isCryptoError(e)) this.observers.onFrameRejected(this, "decrypt_failed");
      throw e;
    }
  }

  // readObject reads one frame and decodes it with the codec, then the optional validator.
  async readObject(): Promise<unknown>;
  async readObject<T>(validate: (value: unknown) => T): Promise<T>;
  async readObject<T>(validate?: (value: unknown) => T): Promise<T | unknown> {
    const text = await this.readFrame();
    let value: unknown;
    try {
      value = this.codec.deserialize(text);
    } catch (e) {
      throw new DeserializationError({ stage: "codec", message: `decode failed: ${errorMessage(e)}`, cause: e });
    }
    if (validate == null) return value;
    try {
      return validate(value);
    } catch (e) {
      if (e instanceof DeserializationError) throw e;
      throw new DeserializationError({ stage: "codec", message: `unexpected value: ${errorMessage(e)}`, cause: e });
    }
  }

  // writeRawFrame writes one line without encryption.
  async writeRawFrame(s: string): Promise<void> {
    this.assertUsable("write");
    assertSingleLine(s, "write");
    if (this.encrypted) assertNoSeparator(s, "write");
    await this.writeLine(s);
  }

  // writeFrame writes s as one line, encrypted and signed when credentials are in effect.
  async writeFrame(s: string): Promise<void> {
    this.assertUsable("write");
    const creds = this.sessionCredentials;
    if (!isValidCredentials(creds)) {
      assertSingleLine(s, "write");
      await this.writeLine(s);
      return;
    }
    const ciphertext = this.engine.encrypt(s, creds);
    const signature = this.engine.sign(ciphertext, creds);
    await this.writeLine(encodeSealedFrame(ciphertext, signature));
  }

  // writeObject encodes o with the codec and writes it as one frame.
  async writeObject(o: unknown): Promise<void> {
    let text: string;
    try {
      text = this.codec.serialize(o);
    } catch (e) {
      throw new SerializationError({ stage: "codec", message: `encode failed: ${errorMessage(e)}`, cause: e });
    }
    await this.writeFrame(text);
  }

  // reportHandshake forwards a handshake outcome to this endpoint's observers.
  reportHandshake(side: HandshakeSide, result: HandshakeResult, reason: HandshakeReason | undefined, elapsedSeconds: number): void {
    this.observers.onHandshake(side, result, reason, elapsedSeconds);
  }

  // close releases the stream. Pending reads end with EndpointClosedError.
  close(): void {
    this.shutdown("local_close");
  }

  private async writeLine(s: string): Promise<void> {
    try {
      await this.stream.write(te.encode(s + LINE_TERMINATOR));
    } catch (e) {
      this.shutdown("stream_error");
      const message = this.closeReason === "stream_error" ? `stream failed: ${errorMessage(e)}` : "endpoint closed";
      throw new EndpointClosedError({ stage: "write", message, cause: e });
    }
  }

  private assertUsable(stage: LinesecStage): void {
    if (this.currentState === "closed") throw new EndpointClosedError({ stage });
  }

  private shutdown(reason: DisconnectReason): void {
    if (this.currentState !== "closed") {
      this.currentState = "closed";
      this.stream.close();
    }
    if (this.closeReason != null) return;
    this.closeReason = reason;
    log("#%d disconnected (%s) session=%s", this.localId, reason, this.assignedSessionId ?? "-");
    this.observers.onDisconnected(this, reason);
  }
}
