import { describe, expect, test } from "vitest";
import { createStreamPair, MemoryListener } from "./memory.js";
import { StreamClosedError } from "./stream.js";

const te = new TextEncoder();
const td = new TextDecoder();

describe("createStreamPair", () => {
  test("delivers writes to the peer in order", async () => {
    const [a, b] = createStreamPair();
    await a.write(te.encode("one"));
    await a.write(te.encode("two"));
    expect(td.decode((await b.read()) ?? new Uint8Array())).toBe("one");
    expect(td.decode((await b.read()) ?? new Uint8Array())).toBe("two");
  });

  test("copies written chunks", async () => {
    const [a, b] = createStreamPair();
    const chunk = te.encode("abc");
    await a.write(chunk);
    chunk.fill(0);
    expect(td.decode((await b.read()) ?? new Uint8Array())).toBe("abc");
  });

  test("closing one side ends the peer after buffered data", async () => {
    const [a, b] = createStreamPair();
    await a.write(te.encode("last"));
    a.close();
    expect(td.decode((await b.read()) ?? new Uint8Array())).toBe("last");
    expect(await b.read()).toBeNull();
    await expect(b.write(te.encode("late"))).rejects.toThrow(StreamClosedError);
    await expect(a.write(te.encode("late"))).rejects.toThrow(StreamClosedError);
  });

  test("close releases a pending read", async () => {
    const [a] = createStreamPair();
    const pending = a.read();
    a.close();
    expect(await pending).toBeNull();
  });
});

describe("MemoryListener", () => {
  test("accept returns the remote side of connect", async () => {
    const listener = new MemoryListener();
    const local = listener.connect();
    const remote = await listener.accept();
    expect(remote).not.toBeNull();
    await local.write(te.encode("hi"));
    expect(td.decode((await remote?.read()) ?? new Uint8Array())).toBe("hi");
  });

  test("close releases pending accepts and refuses new connections", async () => {
    const listener = new MemoryListener();
    const pending = listener.accept();
    listener.close();
    expect(await pending).toBeNull();
    expect(() => listener.connect()).toThrow(/listener closed/);
  });

  test("close ends streams that were never accepted", async () => {
    const listener = new MemoryListener();
    const local = listener.connect();
    listener.close();
    expect(await local.read()).toBeNull();
  });
});
