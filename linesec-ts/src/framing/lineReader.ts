import { FrameTooLargeError, InvalidFrameError } from "../utils/errors.js";

const LF = 0x0a;
const CR = 0x0d;

// LineReader splits a chunked byte source into newline-terminated lines.
export class LineReader {
  private readonly chunks: Uint8Array[] = [];
  // Bytes buffered across chunks.
  private buffered = 0;
  // Bytes of the buffer already scanned without finding a terminator.
  private scanned = 0;
  private eof = false;
  private readonly td = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

  constructor(
    private readonly readChunk: () => Promise<Uint8Array | null>,
    private readonly maxLineBytes = 0
  ) {}

  // readLine resolves with the next line without its terminator, or null at end-of-stream.
  // A trailing "\r" is dropped; an unterminated final line is still returned.
  async readLine(): Promise<string | null> {
    while (true) {
      const idx = this.findTerminator();
      if (idx >= 0) {
        const line = this.take(idx);
        this.take(1);
        return this.decode(line);
      }
      // One extra byte leaves room for a "\r" before the terminator.
      if (this.maxLineBytes > 0 && this.buffered > this.maxLineBytes + 1) {
        throw new FrameTooLargeError({ stage: "read", message: `line exceeds ${this.maxLineBytes} bytes` });
      }
      if (this.eof) {
        if (this.buffered === 0) return null;
        return this.decode(this.take(this.buffered));
      }
      const chunk = await this.readChunk();
      if (chunk == null) {
        this.eof = true;
        continue;
      }
      if (chunk.length === 0) continue;
      this.chunks.push(chunk);
      this.buffered += chunk.length;
    }
  }

  bufferedBytes(): number {
    return this.buffered;
  }

  private findTerminator(): number {
    let base = 0;
    for (const c of this.chunks) {
      if (base + c.length > this.scanned) {
        const from = Math.max(0, this.scanned - base);
        const i = c.indexOf(LF, from);
        if (i >= 0) return base + i;
      }
      base += c.length;
    }
    this.scanned = this.buffered;
    return -1;
  }

  private take(n: number): Uint8Array {
    const out = new Uint8Array(n);
    let off = 0;
    while (off < n) {
      const head = this.chunks[0];
      if (head == null) throw new Error("line buffer underrun");
      const take = Math.min(head.length, n - off);
      out.set(head.subarray(0, take), off);
      off += take;
      if (take === head.length) this.chunks.shift();
      else this.chunks[0] = head.subarray(take);
    }
    this.buffered -= n;
    this.scanned = 0;
    return out;
  }

  private decode(line: Uint8Array): string {
    const end = line.length > 0 && line[line.length - 1] === CR ? line.length - 1 : line.length;
    if (this.maxLineBytes > 0 && end > this.maxLineBytes) {
      throw new FrameTooLargeError({ stage: "read", message: `line exceeds ${this.maxLineBytes} bytes` });
    }
    try {
      return this.td.decode(line.subarray(0, end));
    } catch (e) {
      throw new InvalidFrameError({ stage: "read", message: "line is not valid UTF-8", cause: e });
    }
  }
}
