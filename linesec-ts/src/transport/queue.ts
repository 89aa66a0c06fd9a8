// AsyncQueue delivers pushed items to waiting readers in order; after end() readers get null.
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private waiters: Array<(v: T | null) => void> = [];
  private ended = false;

  push(item: T): boolean {
    if (this.ended) return false;
    const w = this.waiters.shift();
    if (w != null) w(item);
    else this.items.push(item);
    return true;
  }

  // shift resolves with the next item; buffered items are still delivered after end().
  shift(): Promise<T | null> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift() ?? null);
    if (this.ended) return Promise.resolve(null);
    return new Promise<T | null>((resolve) => this.waiters.push(resolve));
  }

  // end stops accepting items and releases every waiting reader.
  end(): void {
    if (this.ended) return;
    this.ended = true;
    const ws = this.waiters;
    this.waiters = [];
    for (const w of ws) w(null);
  }

  // drain drops buffered items.
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get size(): number {
    return this.items.length;
  }
}
