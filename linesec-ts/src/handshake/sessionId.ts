import { randomUUID } from "node:crypto";
import { DeserializationError } from "../utils/errors.js";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

// newSessionId returns a random (v4) UUID in canonical lowercase form.
export function newSessionId(): string {
  return randomUUID();
}

// assertSessionId validates a session id received from the listener.
export function assertSessionId(s: string): string {
  const id = s.trim().toLowerCase();
  if (!UUID_RE.test(id)) throw new DeserializationError({ stage: "handshake", message: "bad session id" });
  return id;
}
