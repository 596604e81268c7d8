import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { createFrame } from "../types/frame";
import { TransportError } from "./errors";
import { encodeSlcanFrame } from "./serial";
import { CloseLatch, FileLineSource, MemoryFrameSink, NullFrameSink } from "./transport";
import { createFrameSink, createLineSource } from "./profiles";

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe("encodeSlcanFrame", () => {
  it("encodes standard and extended identifiers", () => {
    expect(encodeSlcanFrame(createFrame(0, 0x631, 3, [0x40, 0x05, 0x30]))).toBe("t6313400530\r");
    expect(encodeSlcanFrame(createFrame(0, 0x18daf110, 1, [0xff]))).toBe("T18DAF1101FF\r");
    expect(encodeSlcanFrame(createFrame(0, 0x7e, 0, []))).toBe("t07E0\r");
  });
});

describe("CloseLatch", () => {
  it("stops iteration once signalled", async () => {
    const latch = new CloseLatch();
    const seen: number[] = [];
    for await (const n of latch.iterate([1, 2, 3])) {
      seen.push(n);
      if (n === 2) latch.signal();
    }
    expect(seen).toEqual([1, 2]);
    expect(latch.isClosed).toBe(true);
  });

  it("holds no read state between lines of a long stream", async () => {
    function* numbers(): Generator<number> {
      for (let n = 0; n < 50_000; n++) yield n;
    }
    const latch = new CloseLatch();
    let count = 0;
    let last = -1;
    for await (const n of latch.iterate(numbers())) {
      expect(latch.pendingReads).toBe(0);
      last = n;
      count++;
    }
    expect(count).toBe(50_000);
    expect(last).toBe(49_999);
    expect(latch.pendingReads).toBe(0);
  });

  it("ends a read that is waiting on a silent source", async () => {
    async function* silent(): AsyncGenerator<string> {
      yield "first";
      await new Promise<never>(() => {});
    }
    const latch = new CloseLatch();
    const seen: string[] = [];
    const done = (async () => {
      for await (const line of latch.iterate(silent())) seen.push(line);
    })();

    await vi.waitFor(() => expect(seen).toEqual(["first"]));
    expect(latch.pendingReads).toBe(1);
    latch.signal();
    await done;
    expect(seen).toEqual(["first"]);
    expect(latch.pendingReads).toBe(0);
  });
});

describe("FileLineSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "transport-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("yields the lines of a transcript", async () => {
    const file = path.join(dir, "session.txt");
    writeFileSync(file, "ID: 0x631, Data: 1 01\r\nOK\n");
    const source = createLineSource({ kind: "file", path: file });
    expect(source).toBeInstanceOf(FileLineSource);

    await source.open();
    expect(await collect(source.lines())).toEqual(["ID: 0x631, Data: 1 01", "OK"]);
    await source.close();
  });

  it("fails to open a missing file", async () => {
    const source = new FileLineSource(path.join(dir, "absent.txt"));
    await expect(source.open()).rejects.toThrow(TransportError);
    expect(() => source.lines()).toThrow(TransportError);
  });
});

describe("frame sinks", () => {
  it("selects the null sink from its profile", () => {
    expect(createFrameSink({ kind: "none" })).toBeInstanceOf(NullFrameSink);
  });

  it("records sends and rejects the ones it is told to fail", async () => {
    const sink = new MemoryFrameSink({ failWhen: (frame) => frame.id === 0x200 });
    await sink.send(createFrame(0, 0x100, 0, []));
    await expect(sink.send(createFrame(0, 0x200, 0, []))).rejects.toThrow(TransportError);
    expect(sink.sent.map((f) => f.id)).toEqual([0x100]);
  });
});
