import { describe, it, expect, beforeEach } from "vitest";
import { createFrame, type Frame } from "../types/frame";
import { MemoryFrameSink, type FrameSink } from "../api/transport";
import { ReplayError } from "../api/errors";
import { setLogLevel } from "../api/settings";
import { SESSION_EVENTS, type ReplayStatus } from "../events/registry";
import { abortableSleep, normalizeRate, ReplaySession, type SleepFn } from "./replaySession";

function record(...offsets: number[]): Frame[] {
  return offsets.map((t, i) => createFrame(t, 0x100 + i, 1, [i]));
}

/** Records requested delays and resolves immediately */
function recordingSleep(onSleep?: (ms: number, call: number) => void): {
  sleep: SleepFn;
  delays: number[];
} {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
      onSleep?.(ms, delays.length);
    },
  };
}

describe("normalizeRate", () => {
  it("rejects non-positive and non-finite rates", () => {
    for (const rate of [0, -1, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => normalizeRate(rate)).toThrow(ReplayError);
    }
  });

  it("raises tiny rates to the minimum", () => {
    expect(normalizeRate(0.00001)).toBe(0.0001);
    expect(normalizeRate(2)).toBe(2);
  });
});

describe("ReplaySession", () => {
  beforeEach(() => {
    setLogLevel("off");
  });

  it("refuses an empty record", () => {
    expect(() => new ReplaySession([], new MemoryFrameSink())).toThrow(
      new ReplayError("No frames in record")
    );
  });

  it("waits the recorded gaps divided by the rate", async () => {
    const { sleep, delays } = recordingSleep();
    const sink = new MemoryFrameSink();
    const session = new ReplaySession(record(0, 0.1, 0.3), sink, { rate: 2, sleep });

    const result = await session.play();

    expect(result).toEqual({ framesSent: 3, sendFailures: 0, passes: 1, stopReason: "completed" });
    expect(delays).toHaveLength(2);
    expect(delays[0]).toBe(50);
    expect(delays[1]).toBeCloseTo(100);
    expect(sink.sent.map((f) => f.id)).toEqual([0x100, 0x101, 0x102]);
    expect(sink.opened).toBe(true);
    expect(sink.closed).toBe(true);
    expect(session.stats.size).toBe(3);
  });

  it("plays out-of-order frames back to back", async () => {
    const { sleep, delays } = recordingSleep();
    const session = new ReplaySession(record(0, 0.5, 0.2, 0.4), new MemoryFrameSink(), { sleep });
    await session.play();
    expect(delays).toEqual([500, 200]);
  });

  it("loops until stopped", async () => {
    const { sleep, delays } = recordingSleep();
    const session = new ReplaySession(record(0, 0.1, 0.3), new MemoryFrameSink(), {
      loop: true,
      sleep,
    });
    session.events.on(SESSION_EVENTS.REPLAY_FRAME, ({ pass, index }) => {
      if (pass === 1 && index === 1) session.stop();
    });

    const result = await session.play();

    expect(result).toEqual({ framesSent: 5, sendFailures: 0, passes: 1, stopReason: "user" });
    expect(delays).toHaveLength(3);
    expect(delays[0]).toBe(100);
    expect(delays[1]).toBeCloseTo(200);
    expect(delays[2]).toBe(100);
  });

  it("counts failed sends and carries on", async () => {
    const sink = new MemoryFrameSink({ failWhen: (_frame, index) => index === 1 });
    const session = new ReplaySession(record(0, 0, 0), sink, { sleep: recordingSleep().sleep });
    const emitted: number[] = [];
    session.events.on(SESSION_EVENTS.REPLAY_FRAME, ({ index }) => emitted.push(index));

    const result = await session.play();

    expect(result.framesSent).toBe(2);
    expect(result.sendFailures).toBe(1);
    expect(emitted).toEqual([0, 2]);
  });

  it("holds playback until toggled again", async () => {
    const { sleep } = recordingSleep((_ms, call) => {
      if (call === 1) session.toggleRunning();
    });
    const sink = new MemoryFrameSink();
    const session = new ReplaySession(record(0, 0.1, 0.2), sink, { sleep });
    const statuses: ReplayStatus[] = [];
    session.events.on(SESSION_EVENTS.REPLAY_STATE, ({ status }) => {
      statuses.push(status);
      if (status === "held") {
        expect(sink.sent).toHaveLength(1);
        setImmediate(() => session.toggleRunning());
      }
    });

    const result = await session.play();

    expect(result.framesSent).toBe(3);
    expect(statuses).toEqual(["playing", "held", "playing", "stopped"]);
  });

  it("stops while held", async () => {
    const { sleep } = recordingSleep((_ms, call) => {
      if (call === 1) session.toggleRunning();
    });
    const session = new ReplaySession(record(0, 0.1, 0.2), new MemoryFrameSink(), { sleep });
    session.events.on(SESSION_EVENTS.REPLAY_STATE, ({ status }) => {
      if (status === "held") setImmediate(() => session.stop());
    });

    const result = await session.play();
    expect(result.framesSent).toBe(1);
    expect(result.stopReason).toBe("user");
  });

  it("rejects when the sink cannot be opened", async () => {
    const sink: FrameSink = {
      name: "broken",
      open: async () => {
        throw new Error("no device");
      },
      send: async () => {},
      close: async () => {},
    };
    const session = new ReplaySession(record(0), sink);
    await expect(session.play()).rejects.toThrow(
      new ReplayError("Cannot open sink broken: no device")
    );
    expect(session.store.getState().stopReason).toBe("error");
  });
});

describe("abortableSleep", () => {
  it("returns early once aborted", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
