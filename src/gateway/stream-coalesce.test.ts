import { describe, expect, it, vi } from "vitest";

import { coalesceStream } from "./stream-coalesce.js";
import { chunks, installGatewayTestHooks } from "./test-helpers.js";

installGatewayTestHooks();

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const part of source) out.push(part);
  return out;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("coalesceStream", () => {
  it("merges whole chunks up to minChars", async () => {
    const out = await collect(coalesceStream(chunks(["a", "b", "c"]), { minChars: 2, idleMs: 1_000 }));
    expect(out).toEqual(["ab", "c"]);
  });

  it("preserves content and order without producing more frames than chunks", async () => {
    const input = ["ls\n", "", "file-1\n", "file-2 with a longer name\n", "$ "];
    const out = await collect(coalesceStream(chunks(input), { minChars: 8, idleMs: 1_000 }));
    expect(out.join("")).toBe(input.join(""));
    expect(out.length).toBeLessThanOrEqual(input.length);
    expect(out).toEqual(["ls\nfile-1\n", "file-2 with a longer name\n", "$ "]);
  });

  it("passes every chunk through when minChars is 1", async () => {
    const out = await collect(coalesceStream(chunks(["a", "b", "c"]), { minChars: 1 }));
    expect(out).toEqual(["a", "b", "c"]);
  });

  it("skips empty and nullish chunks", async () => {
    const out = await collect(
      coalesceStream(chunks(["a", "", null, undefined, "b"]), { minChars: 100, idleMs: 1_000 }),
    );
    expect(out).toEqual(["ab"]);
  });

  it("flushes a partial buffer after the idle window", async () => {
    async function* slow() {
      yield "a";
      yield "b";
      await sleep(120);
      yield "c";
    }
    const out = await collect(coalesceStream(slow(), { minChars: 100, idleMs: 20 }));
    expect(out).toEqual(["ab", "c"]);
  });

  it("closes the source when the consumer stops early", async () => {
    let closed = false;
    async function* endless() {
      try {
        while (true) yield "x";
      } finally {
        closed = true;
      }
    }
    for await (const part of coalesceStream(endless(), { minChars: 1 })) {
      expect(part).toBe("x");
      break;
    }
    expect(closed).toBe(true);
  });

  it("closes a source blocked on a pending chunk once that chunk arrives", async () => {
    let closed = false;
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    async function* gated() {
      try {
        yield "a";
        await gate;
        yield "b";
        yield "never read";
      } finally {
        closed = true;
      }
    }
    for await (const part of coalesceStream(gated(), { minChars: 100, idleMs: 10 })) {
      expect(part).toBe("a");
      break;
    }
    expect(closed).toBe(false);
    release();
    await vi.waitFor(() => expect(closed).toBe(true));
  });

  it("flushes buffered output before rethrowing a source failure", async () => {
    async function* failing() {
      yield "a";
      throw new Error("pty closed");
    }
    const frames: string[] = [];
    let error: unknown;
    try {
      for await (const part of coalesceStream(failing(), { minChars: 100 })) frames.push(part);
    } catch (err) {
      error = err;
    }
    expect(frames).toEqual(["a"]);
    expect(error).toBeInstanceOf(Error);
    expect(error).toHaveProperty("message", "pty closed");
  });
});
