// src/api/transport.ts
//
// Line sources feed capture sessions; frame sinks receive replayed frames.
// Concrete variants are picked from a profile in ./profiles.

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { Frame } from "../types/frame";
import { TransportError, errorMessage } from "./errors";

export interface LineSource {
  readonly name: string;
  open(): Promise<void>;
  /** Lines without terminators. Ends when the source ends or is closed. */
  lines(): AsyncIterable<string>;
  /** Idempotent; ends a pending `lines()` read */
  close(): Promise<void>;
}

export interface FrameSink {
  readonly name: string;
  open(): Promise<void>;
  send(frame: Frame): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// Close-aware iteration
// ============================================================================

const CLOSED = Symbol("closed");

type Waker = (value: typeof CLOSED) => void;

/**
 * Ends iteration once `signal()` is called. Each read is raced against a
 * promise made for that read only, so closing a source ends a read that
 * would otherwise block forever.
 */
export class CloseLatch {
  private readonly wakers = new Set<Waker>();
  private signalled = false;

  get isClosed(): boolean {
    return this.signalled;
  }

  /** Reads currently waiting on the source */
  get pendingReads(): number {
    return this.wakers.size;
  }

  signal(): void {
    this.signalled = true;
    for (const wake of this.wakers) wake(CLOSED);
    this.wakers.clear();
  }

  /** Iterate `source` until it ends or the latch is signalled */
  async *iterate<T>(source: AsyncIterable<T> | Iterable<T>): AsyncGenerator<T> {
    const it = toAsyncIterator(source);
    while (!this.signalled) {
      const next = await this.read(it);
      if (next === CLOSED || next.done) return;
      yield next.value;
    }
  }

  private async read<T>(it: AsyncIterator<T>): Promise<IteratorResult<T> | typeof CLOSED> {
    let wake: Waker = () => {};
    const closed = new Promise<typeof CLOSED>((resolve) => {
      wake = resolve;
    });
    this.wakers.add(wake);
    try {
      return await Promise.race([it.next(), closed]);
    } finally {
      this.wakers.delete(wake);
    }
  }
}

function toAsyncIterator<T>(source: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  if (Symbol.asyncIterator in source) {
    return source[Symbol.asyncIterator]();
  }
  const it = source[Symbol.iterator]();
  return {
    next: async () => it.next(),
  };
}

// ============================================================================
// Stream and memory variants
// ============================================================================

/** Reads lines from any Readable, e.g. a recorded adapter transcript. */
export class StreamLineSource implements LineSource {
  private reader: Interface | null = null;
  private readonly latch = new CloseLatch();

  constructor(
    readonly name: string,
    private readonly createStream: () => Readable
  ) {}

  async open(): Promise<void> {
    if (this.reader) return;
    this.reader = createInterface({ input: this.createStream(), crlfDelay: Infinity });
  }

  lines(): AsyncIterable<string> {
    if (!this.reader) {
      throw new TransportError(`${this.name} is not open`);
    }
    return this.latch.iterate(this.reader);
  }

  async close(): Promise<void> {
    this.latch.signal();
    this.reader?.close();
    this.reader = null;
  }
}

/** Adapter text transcript on disk */
export class FileLineSource extends StreamLineSource {
  constructor(private readonly filePath: string) {
    super(`file:${filePath}`, () => createReadStream(filePath, { encoding: "utf8" }));
  }

  override async open(): Promise<void> {
    try {
      await stat(this.filePath);
    } catch (err) {
      throw new TransportError(`Cannot open ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    await super.open();
  }
}

export interface MemoryLineSourceOptions {
  /** Make `open()` reject with this error */
  openError?: Error;
}

/** In-process source for tests: yields the given lines, then ends. */
export class MemoryLineSource implements LineSource {
  readonly name = "memory";
  private readonly latch = new CloseLatch();
  opened = false;
  closeCount = 0;

  constructor(
    private readonly input: AsyncIterable<string> | Iterable<string>,
    private readonly options: MemoryLineSourceOptions = {}
  ) {}

  async open(): Promise<void> {
    if (this.options.openError) throw this.options.openError;
    this.opened = true;
  }

  lines(): AsyncIterable<string> {
    return this.latch.iterate(this.input);
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.latch.signal();
  }
}

export interface MemoryFrameSinkOptions {
  /** Reject `send` for frames where this returns true */
  failWhen?: (frame: Frame, index: number) => boolean;
}

/** Records sent frames in memory */
export class MemoryFrameSink implements FrameSink {
  readonly name = "memory";
  readonly sent: Frame[] = [];
  private attempts = 0;
  opened = false;
  closed = false;

  constructor(private readonly options: MemoryFrameSinkOptions = {}) {}

  async open(): Promise<void> {
    this.opened = true;
  }

  async send(frame: Frame): Promise<void> {
    const index = this.attempts++;
    if (this.options.failWhen?.(frame, index)) {
      throw new TransportError(`send failed for frame ${index}`);
    }
    this.sent.push(frame);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Discards frames. Used for dry-run replays. */
export class NullFrameSink implements FrameSink {
  readonly name = "none";
  async open(): Promise<void> {}
  async send(_frame: Frame): Promise<void> {}
  async close(): Promise<void> {}
}
