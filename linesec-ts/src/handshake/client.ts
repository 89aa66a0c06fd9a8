import { assertRsaPublicParams } from "../crypto/asymmetric.js";
import { encodeCredentialsPayload, isValidCredentials, type SessionCredentials } from "../crypto/credentials.js";
import { Endpoint, type EndpointOptions } from "../endpoint/endpoint.js";
import { nowSeconds } from "../observability/observer.js";
import type { ByteStream } from "../transport/stream.js";
import { createLogger } from "../utils/log.js";
import { errorMessage } from "../utils/errors.js";
import { handshakeReason, handshakeTimeoutOption, withHandshakeTimeout } from "./common.js";
import { decodeHandshakeObject, encodeHandshakeObject } from "./messages.js";
import { assertSessionId } from "./sessionId.js";

const log = createLogger("handshake");

// ConnectOptions configures the initiating side of a session.
export type ConnectOptions = EndpointOptions &
  Readonly<{
    /** Run the key exchange before opening the endpoint (default true). */
    secure?: boolean;
    /** Credentials to offer; generated when absent or empty. */
    credentials?: SessionCredentials;
    /** Total handshake timeout in milliseconds (default 10000, 0 disables). */
    handshakeTimeoutMs?: number;
  }>;

// clientHandshake runs the initiating side of the key exchange on a connecting endpoint:
// it reads the listener's public params, sends session credentials sealed under them,
// then reads back the assigned session id.
export async function clientHandshake(endpoint: Endpoint, credentials?: SessionCredentials): Promise<void> {
  const publicParams = decodeHandshakeObject(await endpoint.readFrame(), assertRsaPublicParams);
  const creds = isValidCredentials(credentials) ? credentials : endpoint.engine.generateSessionCredentials();
  const sealed = endpoint.engine.asymmetricEncrypt(encodeHandshakeObject(encodeCredentialsPayload(creds)), publicParams);
  await endpoint.writeRawFrame(sealed);
  const sessionId = assertSessionId(await endpoint.readRawFrame());
  endpoint.setCredentials(creds);
  endpoint.setSessionId(sessionId);
}

// connectEndpoint wraps an established stream in an Endpoint and, in secure mode, performs
// the handshake. The endpoint is closed when the handshake fails.
export async function connectEndpoint(stream: ByteStream, opts: ConnectOptions = {}): Promise<Endpoint> {
  const timeoutMs = handshakeTimeoutOption(opts.handshakeTimeoutMs);
  const endpoint = new Endpoint(stream, opts);
  if (opts.secure === false) {
    endpoint.markOpen();
    return endpoint;
  }
  const start = nowSeconds();
  try {
    await withHandshakeTimeout(endpoint, timeoutMs, () => clientHandshake(endpoint, opts.credentials));
  } catch (e) {
    endpoint.reportHandshake("connect", "fail", handshakeReason(e), nowSeconds() - start);
    log("#%d connect handshake failed: %s", endpoint.localId, errorMessage(e));
    endpoint.close();
    throw e;
  }
  endpoint.reportHandshake("connect", "ok", undefined, nowSeconds() - start);
  endpoint.markOpen();
  return endpoint;
}
