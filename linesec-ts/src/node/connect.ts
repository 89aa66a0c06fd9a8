import type { Endpoint } from "../endpoint/endpoint.js";
import { connectEndpoint, type ConnectOptions } from "../handshake/client.js";
import type { ByteStream } from "../transport/stream.js";
import { SessionServer, type SessionServerOptions } from "../server/server.js";
import { EndpointClosedError, errorMessage } from "../utils/errors.js";
import { connectTcp, listenTcp, type TcpStreamListener } from "./tcp.js";

// dialEndpoint connects to host:port over TCP and runs the connecting side of the handshake.
export async function dialEndpoint(host: string, port: number, opts: ConnectOptions = {}): Promise<Endpoint> {
  let stream: ByteStream;
  try {
    stream = await connectTcp(host, port);
  } catch (e) {
    throw new EndpointClosedError({ stage: "connect", message: `connect ${host}:${port} failed: ${errorMessage(e)}`, cause: e });
  }
  return await connectEndpoint(stream, opts);
}

export type ServeTcpOptions = SessionServerOptions &
  Readonly<{
    /** Bind address (default 0.0.0.0). */
    host?: string;
  }>;

export type TcpSessionServer = Readonly<{
  server: SessionServer;
  listener: TcpStreamListener;
  /** Settles when the accept loop ends. */
  serving: Promise<void>;
}>;

// serveTcp binds a TCP listener on port (0 picks a free port) and starts a SessionServer on it.
export async function serveTcp(port: number, opts: ServeTcpOptions = {}): Promise<TcpSessionServer> {
  const { host, ...serverOpts } = opts;
  const listener = await listenTcp(port, host);
  const server = new SessionServer(listener, serverOpts);
  return { server, listener, serving: server.serve() };
}
