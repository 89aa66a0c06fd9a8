import { AsyncQueue } from "./queue.js";
import { StreamClosedError, type ByteStream, type StreamListener } from "./stream.js";

class MemoryStream implements ByteStream {
  readonly remoteAddress = "memory";
  readonly inbox = new AsyncQueue<Uint8Array>();
  peer: MemoryStream | null = null;
  private closed = false;

  read(): Promise<Uint8Array | null> {
    if (this.closed) return Promise.resolve(null);
    return this.inbox.shift();
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (this.closed) throw new StreamClosedError();
    if (this.peer == null || !this.peer.inbox.push(chunk.slice())) throw new StreamClosedError("peer closed");
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbox.drain();
    this.inbox.end();
    // The peer still reads what was already written before it sees end-of-stream.
    this.peer?.inbox.end();
  }
}

// createStreamPair returns two connected in-memory streams.
export function createStreamPair(): [ByteStream, ByteStream] {
  const a = new MemoryStream();
  const b = new MemoryStream();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

// MemoryListener accepts streams created through connect(), in-process.
export class MemoryListener implements StreamListener {
  private readonly pending = new AsyncQueue<ByteStream>();

  // connect returns the dialing side and queues the accepting side.
  connect(): ByteStream {
    const [local, remote] = createStreamPair();
    if (!this.pending.push(remote)) {
      local.close();
      throw new StreamClosedError("listener closed");
    }
    return local;
  }

  accept(): Promise<ByteStream | null> {
    return this.pending.shift();
  }

  close(): void {
    for (const s of this.pending.drain()) s.close();
    this.pending.end();
  }
}
