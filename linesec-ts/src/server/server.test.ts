import { describe, expect, test, vi } from "vitest";
import { CryptoEngine } from "../crypto/engine.js";
import { Endpoint } from "../endpoint/endpoint.js";
import { connectEndpoint } from "../handshake/client.js";
import { MemoryListener } from "../transport/memory.js";
import { EndpointClosedError, InvalidOptionError } from "../utils/errors.js";
import { SessionServer, type SessionServerOptions } from "./server.js";

const engine = new CryptoEngine({ modulusBits: 2048 });
const te = new TextEncoder();

function startServer(opts: SessionServerOptions = {}) {
  const listener = new MemoryListener();
  const server = new SessionServer(listener, { engine, ...opts });
  const serving = server.serve();
  return { listener, server, serving };
}

// connectedEndpoints resolves with the next n endpoints the server registers.
function connectedEndpoints(server: SessionServer, n: number): Promise<Endpoint[]> {
  return new Promise((resolve) => {
    const seen: Endpoint[] = [];
    const off = server.addObserver({
      onConnected: (ep) => {
        seen.push(ep);
        if (seen.length === n) {
          off();
          resolve(seen);
        }
      }
    });
  });
}

describe("SessionServer (secure)", () => {
  test("accepts concurrent sessions with distinct ids and credentials", async () => {
    const { listener, server, serving } = startServer();
    const registered = connectedEndpoints(server, 3);
    const clients = await Promise.all([0, 1, 2].map(() => connectEndpoint(listener.connect(), { engine })));
    await registered;

    expect(server.publicParams).not.toBeNull();
    expect(server.endpoints).toHaveLength(3);
    const ids = new Set(clients.map((c) => c.sessionId));
    expect(ids.size).toBe(3);

    for (const [i, client] of clients.entries()) {
      const remote = server.getEndpoint(client.sessionId ?? "");
      if (remote == null) throw new Error("session not registered");
      expect(remote.state).toBe("open");
      await client.writeFrame(`hello from ${i}`);
      expect(await remote.readFrame()).toBe(`hello from ${i}`);
      await remote.writeObject({ echo: i });
      expect(await client.readObject()).toEqual({ echo: i });
    }

    server.stop();
    await serving;
  });

  test("a failed handshake does not stop the accept loop", async () => {
    const onHandshake = vi.fn();
    const { listener, server, serving } = startServer({ observer: { onHandshake } });

    const bad = new Endpoint(listener.connect(), { engine });
    await bad.readFrame();
    await bad.writeRawFrame("garbage");
    await expect(bad.readRawFrame()).rejects.toBeInstanceOf(EndpointClosedError);
    expect(onHandshake).toHaveBeenCalledWith("accept", "fail", "crypto_error", expect.any(Number));

    const registered = connectedEndpoints(server, 1);
    await connectEndpoint(listener.connect(), { engine });
    await registered;
    expect(onHandshake).toHaveBeenLastCalledWith("accept", "ok", undefined, expect.any(Number));
    expect(server.endpoints).toHaveLength(1);

    server.stop();
    await serving;
  });

  test("times out a silent connection", async () => {
    const onHandshake = vi.fn();
    const { listener, server, serving } = startServer({ handshakeTimeoutMs: 50, observer: { onHandshake } });
    const silent = new Endpoint(listener.connect(), { engine });
    await silent.readFrame();
    await expect(silent.readRawFrame()).rejects.toBeInstanceOf(EndpointClosedError);
    await vi.waitFor(() => expect(onHandshake).toHaveBeenCalledWith("accept", "fail", "timeout", expect.any(Number)));
    expect(server.endpoints).toHaveLength(0);
    server.stop();
    await serving;
  });

  test("disconnects remove the endpoint and are forwarded", async () => {
    const onDisconnected = vi.fn();
    const { listener, server, serving } = startServer({ observer: { onDisconnected } });
    const registered = connectedEndpoints(server, 2);
    const [first, second] = await Promise.all([
      connectEndpoint(listener.connect(), { engine }),
      connectEndpoint(listener.connect(), { engine })
    ]);
    await registered;
    const firstRemote = server.getEndpoint(first.sessionId ?? "");
    const secondRemote = server.getEndpoint(second.sessionId ?? "");
    if (firstRemote == null || secondRemote == null) throw new Error("session not registered");

    first.close();
    await expect(firstRemote.readFrame()).rejects.toBeInstanceOf(EndpointClosedError);
    expect(onDisconnected).toHaveBeenCalledWith(firstRemote, "peer_closed");
    expect(server.endpoints).toEqual([secondRemote]);

    secondRemote.close();
    expect(onDisconnected).toHaveBeenCalledWith(secondRemote, "local_close");
    expect(server.endpoints).toHaveLength(0);
    expect(onDisconnected).toHaveBeenCalledTimes(2);

    server.stop();
    await serving;
  });

  test("forwards rejected frames", async () => {
    const onFrameRejected = vi.fn();
    const { listener, server, serving } = startServer({ observer: { onFrameRejected } });
    const registered = connectedEndpoints(server, 1);
    const dial = listener.connect();
    const client = await connectEndpoint(dial, { engine });
    const [remote] = await registered;
    if (remote == null) throw new Error("session not registered");

    await dial.write(te.encode("AAAA|AAAA\n"));
    await expect(remote.readFrame()).rejects.toThrow("frame signature invalid");
    expect(onFrameRejected).toHaveBeenCalledWith(remote, "signature_invalid");
    expect(client.state).toBe("open");

    server.stop();
    await serving;
  });

  test("removeEndpoints unregisters without closing", async () => {
    const { listener, server, serving } = startServer();
    const registered = connectedEndpoints(server, 1);
    const client = await connectEndpoint(listener.connect(), { engine });
    const [remote] = await registered;

    expect(server.removeEndpoints((ep) => ep.sessionId === client.sessionId)).toEqual([remote]);
    expect(server.endpoints).toHaveLength(0);
    expect(remote?.state).toBe("open");
    await client.writeFrame("still here");
    expect(await remote?.readFrame()).toBe("still here");

    remote?.close();
    server.stop();
    await serving;
  });

  test("stop closes endpoints, ends serving and is idempotent", async () => {
    const onDisconnected = vi.fn();
    const { listener, server, serving } = startServer({ observer: { onDisconnected } });
    const registered = connectedEndpoints(server, 1);
    const client = await connectEndpoint(listener.connect(), { engine });
    const [remote] = await registered;

    server.stop();
    server.stop();
    await serving;

    expect(server.endpoints).toHaveLength(0);
    expect(server.publicParams).toBeNull();
    expect(remote?.state).toBe("closed");
    expect(onDisconnected).toHaveBeenCalledTimes(1);
    await expect(client.readFrame()).rejects.toBeInstanceOf(EndpointClosedError);
    expect(() => listener.connect()).toThrow("listener closed");
    await expect(server.serve()).rejects.toThrow("server is already serving");
  });
});

describe("SessionServer (non-secure)", () => {
  test("registers endpoints immediately without a session id", async () => {
    const { listener, server, serving } = startServer({ secure: false });
    const registered = connectedEndpoints(server, 1);
    const client = await connectEndpoint(listener.connect(), { engine, secure: false });
    const [remote] = await registered;

    expect(server.publicParams).toBeNull();
    expect(remote?.sessionId).toBeNull();
    expect(remote?.encrypted).toBe(false);
    await client.writeFrame("plain");
    expect(await remote?.readRawFrame()).toBe("plain");

    server.stop();
    await serving;
  });
});

describe("SessionServer options", () => {
  test("validates sizes and timeouts", () => {
    const listener = new MemoryListener();
    expect(() => new SessionServer(listener, { handshakeTimeoutMs: 1.5 })).toThrow(InvalidOptionError);
    expect(() => new SessionServer(listener, { maxLineBytes: -1 })).toThrow(InvalidOptionError);
  });
});
