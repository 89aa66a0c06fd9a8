export { jsonCodec, type Codec } from "./codec/codec.js";

export {
  assertRsaPublicParams,
  type AsymmetricKeyPair,
  type RsaPrivateParams,
  type RsaPublicParams
} from "./crypto/asymmetric.js";
export {
  assertUsableCredentials,
  createSessionCredentials,
  credentialsEqual,
  decodeCredentialsPayload,
  encodeCredentialsPayload,
  generateSessionCredentials,
  isValidCredentials,
  type CredentialsPayload,
  type SessionCredentials
} from "./crypto/credentials.js";
export { CryptoEngine, defaultCryptoEngine, type CryptoEngineOptions } from "./crypto/engine.js";

export { Endpoint, type EndpointOptions, type EndpointState } from "./endpoint/endpoint.js";
export { parseFrame, type Frame } from "./framing/frame.js";

export { clientHandshake, connectEndpoint, type ConnectOptions } from "./handshake/client.js";
export { DEFAULT_HANDSHAKE_TIMEOUT_MS } from "./handshake/constants.js";
export { HandshakeCoordinator, type HandshakeCoordinatorOptions } from "./handshake/server.js";

export {
  NoopObserver,
  normalizeObserver,
  type DisconnectReason,
  type FrameRejectReason,
  type HandshakeReason,
  type HandshakeResult,
  type HandshakeSide,
  type SessionObserver,
  type SessionObserverLike
} from "./observability/observer.js";

export { SessionRegistry } from "./server/registry.js";
export { SessionServer, type SessionServerOptions } from "./server/server.js";

export { MemoryListener, createStreamPair } from "./transport/memory.js";
export { StreamClosedError, type ByteStream, type StreamListener } from "./transport/stream.js";

export {
  CryptoError,
  DeserializationError,
  DuplicateSessionError,
  EndpointClosedError,
  FrameTooLargeError,
  InvalidCredentialsError,
  InvalidFrameError,
  InvalidOptionError,
  LinesecError,
  SerializationError,
  SignatureInvalidError,
  TimeoutError,
  isCryptoError,
  isEndpointClosedError,
  isLinesecError,
  isSignatureInvalidError,
  isTimeoutError,
  type LinesecErrorCode,
  type LinesecStage
} from "./utils/errors.js";
