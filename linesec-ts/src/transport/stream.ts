// ByteStream is the bidirectional byte stream an endpoint owns.
export type ByteStream = {
  /** Reads the next chunk, or null once the stream has ended. */
  read(): Promise<Uint8Array | null>;
  /** Writes a chunk; rejects once the stream is closed. */
  write(chunk: Uint8Array): Promise<void>;
  /** Closes the stream; pending and later reads resolve null. */
  close(): void;
  /** Peer address for diagnostics, when the transport knows one (e.g. "10.0.0.5:4100"). */
  readonly remoteAddress?: string | undefined;
};

// StreamListener hands out inbound streams.
export type StreamListener = {
  /** Resolves with the next accepted stream, or null once the listener is closed. */
  accept(): Promise<ByteStream | null>;
  /** Stops accepting; pending accepts resolve null. */
  close(): void;
};

// StreamClosedError marks a write on a closed stream.
export class StreamClosedError extends Error {
  constructor(message = "stream closed") {
    super(message);
    this.name = "StreamClosedError";
  }
}
