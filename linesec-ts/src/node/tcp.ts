import { connect, createServer, type AddressInfo, type Server, type Socket } from "node:net";
import { AsyncQueue } from "../transport/queue.js";
import type { ByteStream, StreamListener } from "../transport/stream.js";
import { createLogger } from "../utils/log.js";
import { DuplexByteStream } from "./duplexStream.js";

const log = createLogger("transport");

function configureSocket(socket: Socket): ByteStream {
  socket.setNoDelay(true);
  return new DuplexByteStream(socket, formatAddress(socket.remoteAddress, socket.remotePort));
}

// formatAddress renders host:port, bracketing IPv6 hosts.
export function formatAddress(host: string | undefined, port: number | undefined): string | undefined {
  if (host == null) return undefined;
  const h = host.includes(":") ? `[${host}]` : host;
  return port == null ? h : `${h}:${port}`;
}

// connectTcp dials host:port and resolves once the socket is connected.
export function connectTcp(host: string, port: number): Promise<ByteStream> {
  return new Promise<ByteStream>((resolve, reject) => {
    const socket = connect({ host, port });
    const onError = (err: Error): void => {
      socket.off("connect", onConnect);
      reject(err);
    };
    const onConnect = (): void => {
      socket.off("error", onError);
      resolve(configureSocket(socket));
    };
    socket.once("error", onError);
    socket.once("connect", onConnect);
  });
}

// TcpStreamListener queues accepted sockets as ByteStreams.
export class TcpStreamListener implements StreamListener {
  private readonly pending = new AsyncQueue<ByteStream>();

  constructor(private readonly server: Server) {
    server.on("connection", (socket: Socket) => {
      const stream = configureSocket(socket);
      if (!this.pending.push(stream)) stream.close();
    });
    server.on("error", (err) => log("listener error: %s", err.message));
    server.on("close", () => this.pending.end());
  }

  // address reports the bound address (useful when listening on port 0).
  address(): AddressInfo | null {
    const a = this.server.address();
    return a != null && typeof a === "object" ? a : null;
  }

  accept(): Promise<ByteStream | null> {
    return this.pending.shift();
  }

  close(): void {
    for (const s of this.pending.drain()) s.close();
    this.pending.end();
    this.server.close((err) => {
      if (err != null) log("listener close: %s", err.message);
    });
  }
}

// listenTcp binds a TCP listener on port (0 picks a free port).
export function listenTcp(port: number, host = "0.0.0.0"): Promise<TcpStreamListener> {
  return new Promise<TcpStreamListener>((resolve, reject) => {
    const server = createServer();
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve(new TcpStreamListener(server));
    });
  });
}
