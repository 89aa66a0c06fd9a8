import type { Duplex } from "node:stream";
import { AsyncQueue } from "../transport/queue.js";
import { StreamClosedError, type ByteStream } from "../transport/stream.js";
import { errorMessage } from "../utils/errors.js";
import { createLogger } from "../utils/log.js";

const log = createLogger("transport");
const te = new TextEncoder();

// DuplexByteStream adapts a node Duplex (usually a net.Socket) to a ByteStream.
export class DuplexByteStream implements ByteStream {
  private readonly inbox = new AsyncQueue<Uint8Array>();
  private closed = false;
  // Last error reported by the duplex, kept for diagnostics.
  private lastError: unknown = null;

  constructor(
    private readonly duplex: Duplex,
    readonly remoteAddress?: string
  ) {
    duplex.on("data", this.onData);
    duplex.on("end", this.onEnd);
    duplex.on("close", this.onEnd);
    duplex.on("error", this.onError);
  }

  get error(): unknown {
    return this.lastError;
  }

  read(): Promise<Uint8Array | null> {
    return this.inbox.shift();
  }

  write(chunk: Uint8Array): Promise<void> {
    if (this.closed || this.duplex.destroyed || this.duplex.writableEnded) {
      return Promise.reject(new StreamClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.duplex.write(chunk, (err) => {
        if (err != null) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbox.drain();
    this.inbox.end();
    this.duplex.off("data", this.onData);
    // Flush pending writes, then release the handle.
    this.duplex.end(() => this.duplex.destroy());
  }

  private readonly onData = (chunk: unknown): void => {
    if (chunk instanceof Uint8Array) this.inbox.push(chunk);
    else if (typeof chunk === "string") this.inbox.push(te.encode(chunk));
  };

  private readonly onEnd = (): void => {
    this.inbox.end();
  };

  private readonly onError = (err: unknown): void => {
    this.lastError = err;
    log("stream error: %s", errorMessage(err));
    this.inbox.end();
  };
}

// socketStream wraps an already connected duplex.
export function socketStream(duplex: Duplex, remoteAddress?: string): ByteStream {
  return new DuplexByteStream(duplex, remoteAddress);
}
