import type { AsymmetricKeyPair } from "../crypto/asymmetric.js";
import { assertUsableCredentials, decodeCredentialsPayload } from "../crypto/credentials.js";
import type { Endpoint } from "../endpoint/endpoint.js";
import { CryptoError, isCryptoError } from "../utils/errors.js";
import { handshakeTimeoutOption, withHandshakeTimeout } from "./common.js";
import { decodeHandshakeObject, encodeHandshakeObject } from "./messages.js";
import { newSessionId } from "./sessionId.js";

// HandshakeCoordinatorOptions configures the listener side of the key exchange.
export type HandshakeCoordinatorOptions = Readonly<{
  /** Total handshake timeout in milliseconds (default 10000, 0 disables). */
  timeoutMs?: number;
  /** Reports whether a session id is already live; such ids are never assigned. */
  isTaken?: (sessionId: string) => boolean;
}>;

const maxIdAttempts = 8;

// HandshakeCoordinator performs the listener side of the key exchange for accepted endpoints.
// The key pair is shared read-only by every concurrent handshake.
export class HandshakeCoordinator {
  private readonly keyPair: AsymmetricKeyPair;
  private readonly timeoutMs: number;
  private readonly isTaken: (sessionId: string) => boolean;

  constructor(keyPair: AsymmetricKeyPair, opts: HandshakeCoordinatorOptions = {}) {
    this.keyPair = keyPair;
    this.timeoutMs = handshakeTimeoutOption(opts.timeoutMs);
    this.isTaken = opts.isTaken ?? (() => false);
  }

  // accept runs the exchange on a connecting endpoint and returns the assigned session id.
  // It does not close the endpoint on failure; the caller owns that decision.
  async accept(endpoint: Endpoint): Promise<string> {
    return await withHandshakeTimeout(endpoint, this.timeoutMs, async () => {
      await endpoint.writeFrame(encodeHandshakeObject(this.keyPair.publicParams));
      const sealed = await endpoint.readRawFrame();
      let payload: string;
      try {
        payload = endpoint.engine.asymmetricDecrypt(sealed, this.keyPair.privateParams);
      } catch (e) {
        if (isCryptoError(e)) throw e;
        throw new CryptoError({ stage: "handshake", message: "credentials decrypt failed", cause: e });
      }
      const creds = assertUsableCredentials(decodeHandshakeObject(payload, decodeCredentialsPayload));
      const sessionId = this.newUniqueId();
      endpoint.setCredentials(creds);
      endpoint.setSessionId(sessionId);
      await endpoint.writeRawFrame(sessionId);
      return sessionId;
    });
  }

  private newUniqueId(): string {
    for (let i = 0; i < maxIdAttempts; i++) {
      const id = newSessionId();
      if (!this.isTaken(id)) return id;
    }
    throw new Error("could not allocate a unique session id");
  }
}
