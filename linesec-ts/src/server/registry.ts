import type { Endpoint } from "../endpoint/endpoint.js";
import { DuplicateSessionError } from "../utils/errors.js";

// SessionRegistry tracks the live endpoints of a listener.
// Endpoints without a session id (non-secure mode) are tracked by identity only.
export class SessionRegistry {
  private endpoints: readonly Endpoint[] = Object.freeze([]);
  private readonly bySessionId = new Map<string, Endpoint>();

  get size(): number {
    return this.endpoints.length;
  }

  // add registers an endpoint. A session id may be live only once.
  add(endpoint: Endpoint): void {
    if (this.endpoints.includes(endpoint)) throw new Error(`endpoint #${endpoint.localId} is already registered`);
    const id = endpoint.sessionId;
    if (id != null) {
      if (this.bySessionId.has(id)) throw new DuplicateSessionError(id);
      this.bySessionId.set(id, endpoint);
    }
    this.endpoints = Object.freeze([...this.endpoints, endpoint]);
  }

  // remove drops every endpoint matching predicate and returns them.
  remove(predicate: (endpoint: Endpoint) => boolean): Endpoint[] {
    const removed: Endpoint[] = [];
    const kept: Endpoint[] = [];
    for (const ep of this.endpoints) {
      if (predicate(ep)) removed.push(ep);
      else kept.push(ep);
    }
    if (removed.length === 0) return removed;
    for (const ep of removed) {
      if (ep.sessionId != null) this.bySessionId.delete(ep.sessionId);
    }
    this.endpoints = Object.freeze(kept);
    return removed;
  }

  // list returns an immutable snapshot; later changes do not affect it.
  list(): readonly Endpoint[] {
    return this.endpoints;
  }

  get(sessionId: string): Endpoint | undefined {
    return this.bySessionId.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.bySessionId.has(sessionId);
  }

  clear(): void {
    this.endpoints = Object.freeze([]);
    this.bySessionId.clear();
  }
}
