import { describe, expect, test } from "vitest";
import { CryptoEngine } from "../crypto/engine.js";
import type { Endpoint } from "../endpoint/endpoint.js";
import type { SessionServer } from "../server/server.js";
import { EndpointClosedError } from "../utils/errors.js";
import { dialEndpoint, serveTcp } from "./connect.js";
import { formatAddress, listenTcp } from "./tcp.js";

const engine = new CryptoEngine({ modulusBits: 2048 });

function nextConnected(server: SessionServer): Promise<Endpoint> {
  return new Promise((resolve) => {
    const off = server.addObserver({
      onConnected: (ep) => {
        off();
        resolve(ep);
      }
    });
  });
}

describe("TCP transport", () => {
  test("dials a local server and exchanges encrypted frames", async () => {
    const { server, listener, serving } = await serveTcp(0, { engine, host: "127.0.0.1" });
    const port = listener.address()?.port;
    if (port == null) throw new Error("listener has no port");

    const registered = nextConnected(server);
    const client = await dialEndpoint("127.0.0.1", port, { engine });
    const remote = await registered;

    expect(client.state).toBe("open");
    expect(client.encrypted).toBe(true);
    expect(remote.sessionId).toBe(client.sessionId);
    expect(client.remoteAddress).toBe(`127.0.0.1:${port}`);
    expect(remote.remoteAddress).toMatch(/^127\.0\.0\.1:\d+$/);

    await client.writeFrame("ping");
    expect(await remote.readFrame()).toBe("ping");
    await remote.writeFrame("pong");
    expect(await client.readFrame()).toBe("pong");

    server.stop();
    await serving;
    await expect(client.readFrame()).rejects.toBeInstanceOf(EndpointClosedError);
  });

  test("a refused connection fails with EndpointClosedError", async () => {
    const listener = await listenTcp(0, "127.0.0.1");
    const port = listener.address()?.port;
    if (port == null) throw new Error("listener has no port");
    listener.close();

    const err = await dialEndpoint("127.0.0.1", port, { engine }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EndpointClosedError);
    expect(err).toHaveProperty("stage", "connect");
  });
});

describe("formatAddress", () => {
  test("renders host and port", () => {
    expect(formatAddress("10.0.0.5", 4100)).toBe("10.0.0.5:4100");
    expect(formatAddress("::1", 4100)).toBe("[::1]:4100");
    expect(formatAddress("10.0.0.5", undefined)).toBe("10.0.0.5");
    expect(formatAddress(undefined, 4100)).toBeUndefined();
  });
});
