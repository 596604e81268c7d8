import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { createFrame } from "../types/frame";
import { MemoryLineSource } from "../api/transport";
import { CaptureError } from "../api/errors";
import { setLogLevel, setLogWriter } from "../api/settings";
import { loadPidTable } from "../catalog/obd";
import { synthesizeCatalog } from "../catalog/synthesize";
import { formatDecoded } from "../catalog/decode";
import { SESSION_EVENTS, type CaptureStatus } from "../events/registry";
import { CaptureSession } from "./captureSession";

const LINE_631 = "ID: 0x631, Data: 3 40 05 30";
const LINE_7E8 = "ID: 0x7E8, DLC: 4 41 0C 1A F8";

/** Clock advancing half a second per reading */
function steppingClock(): () => number {
  let t = 0;
  return () => (t += 0.5);
}

describe("CaptureSession", () => {
  beforeEach(() => {
    setLogLevel("off");
  });

  it("parses, counts and tracks every line until the source ends", async () => {
    const source = new MemoryLineSource([LINE_631, "garbage", "", LINE_7E8, LINE_631]);
    const session = new CaptureSession({ source, clock: steppingClock() });
    const frames: number[] = [];
    session.events.on(SESSION_EVENTS.CAPTURE_FRAME, ({ frame, decoded }) => {
      frames.push(frame.id);
      expect(decoded).toBeNull();
    });

    const summary = await session.start();

    expect(frames).toEqual([0x631, 0x7e8, 0x631]);
    expect(summary).toMatchObject({
      framesProcessed: 3,
      linesRejected: 1,
      framesFiltered: 0,
      framesLogged: 0,
      stopReason: "source-ended",
      error: null,
    });
    expect(summary.stats.map((row) => [row.id, row.count])).toEqual([
      [0x631, 2],
      [0x7e8, 1],
    ]);
    // 0x631 seen at 0.5 s and 2.0 s
    expect(summary.stats[0].emaHz).toBeCloseTo(1 / 1.5);
    expect(source.opened).toBe(true);
    expect(source.closeCount).toBe(1);
  });

  it("annotates frames the catalog describes", async () => {
    const schema = synthesizeCatalog(
      [createFrame(0, 0x7e8, 4, [0x41, 0x0c, 0x1a, 0xf8])],
      new Set(),
      loadPidTable()
    );
    const session = new CaptureSession({
      source: new MemoryLineSource([LINE_7E8, LINE_631]),
      schema,
    });
    const annotations: (string | null)[] = [];
    session.events.on(SESSION_EVENTS.CAPTURE_FRAME, ({ decoded }) => {
      annotations.push(decoded ? formatDecoded(decoded) : null);
    });

    await session.start();
    expect(annotations).toEqual(["Service=65 PID=12 EngineRPM=1726rpm", null]);
  });

  it("drops identifiers outside the filter set", async () => {
    const session = new CaptureSession({
      source: new MemoryLineSource([LINE_631, LINE_7E8]),
      filters: [0x7e8],
    });
    const summary = await session.start();
    expect(summary.framesProcessed).toBe(1);
    expect(summary.framesFiltered).toBe(1);
    expect(summary.stats.map((row) => row.id)).toEqual([0x7e8]);
  });

  it("discards lines while paused", async () => {
    async function* script(): AsyncGenerator<string> {
      yield LINE_631;
      session.pause();
      yield LINE_631;
      yield LINE_7E8;
      session.resume();
      yield LINE_7E8;
    }
    const session = new CaptureSession({ source: new MemoryLineSource(script()) });
    const statuses: CaptureStatus[] = [];
    session.events.on(SESSION_EVENTS.CAPTURE_STATE, ({ status }) => statuses.push(status));

    const summary = await session.start();
    expect(summary.framesProcessed).toBe(2);
    expect(summary.linesDropped).toBe(2);
    expect(statuses).toEqual(["running", "paused", "running", "stopped"]);
  });

  it("applies filter changes from the next line", async () => {
    async function* script(): AsyncGenerator<string> {
      yield LINE_631;
      session.setFilters([0x7e8]);
      yield LINE_631;
      yield LINE_7E8;
    }
    const session = new CaptureSession({ source: new MemoryLineSource(script()) });
    const summary = await session.start();
    expect(summary.framesProcessed).toBe(2);
    expect(summary.framesFiltered).toBe(1);
  });

  it("ends a blocked read when stopped", async () => {
    async function* hanging(): AsyncGenerator<string> {
      yield LINE_631;
      await new Promise<never>(() => {});
    }
    const source = new MemoryLineSource(hanging());
    const session = new CaptureSession({ source });
    session.events.on(SESSION_EVENTS.CAPTURE_FRAME, () => session.stop());

    const summary = await session.start();
    expect(summary.framesProcessed).toBe(1);
    expect(summary.stopReason).toBe("user");
    expect(source.closeCount).toBe(2);
  });

  it("keeps a stop that arrives while the source is opening", async () => {
    const source = new MemoryLineSource([LINE_631, LINE_7E8]);
    const session = new CaptureSession({ source });
    const open = source.open.bind(source);
    source.open = async () => {
      await open();
      session.stop();
    };

    const summary = await session.start();
    expect(summary.stopReason).toBe("user");
    expect(summary.framesProcessed).toBe(0);
    expect(session.store.getState().status).toBe("stopped");
    expect(source.closeCount).toBe(2);
  });

  it("reports a failing source as an error stop", async () => {
    async function* failing(): AsyncGenerator<string> {
      yield LINE_631;
      throw new Error("link lost");
    }
    const session = new CaptureSession({ source: new MemoryLineSource(failing()) });
    const errors: boolean[] = [];
    session.events.on(SESSION_EVENTS.CAPTURE_ERROR, ({ error, recovered }) => {
      errors.push(recovered);
      expect(error.message).toBe("link lost");
    });

    const summary = await session.start();
    expect(summary.framesProcessed).toBe(1);
    expect(summary.stopReason).toBe("error");
    expect(summary.error).toBe("link lost");
    expect(errors).toEqual([false]);
  });

  it("rejects when the source cannot be opened", async () => {
    const session = new CaptureSession({
      source: new MemoryLineSource([], { openError: new Error("port busy") }),
    });
    await expect(session.start()).rejects.toThrow(
      new CaptureError("Capture failed to start: port busy")
    );
    expect(session.store.getState().stopReason).toBe("error");
    await expect(session.start()).rejects.toThrow(CaptureError);
  });

  it("warns when logging is toggled without a log path", () => {
    setLogLevel("info");
    const lines: string[] = [];
    const previous = setLogWriter((line) => lines.push(line));
    try {
      const session = new CaptureSession({ source: new MemoryLineSource([]) });
      expect(session.toggleLogging()).toBe(false);
      expect(lines).toEqual(["[warn] [capture] No log path configured; logging stays off"]);
    } finally {
      setLogWriter(previous);
    }
  });

  describe("logging", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), "capture-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("logs only while logging is on, appending after a toggle", async () => {
      const logPath = path.join(dir, "canlog.csv");
      async function* script(): AsyncGenerator<string> {
        yield LINE_631;
        session.toggleLogging();
        yield LINE_7E8;
        session.toggleLogging();
        yield LINE_7E8;
      }
      const session = new CaptureSession({
        source: new MemoryLineSource(script()),
        logPath,
        clock: steppingClock(),
      });

      const summary = await session.start();
      expect(summary.framesProcessed).toBe(3);
      expect(summary.framesLogged).toBe(2);
      expect(readFileSync(logPath, "utf8")).toBe(
        "timestamp_ms,id_hex,dlc,data_hex\n500,631,3,40 05 30\n1500,7E8,4,41 0C 1A F8\n"
      );
    });

    it("does not open the source when the log cannot be opened", async () => {
      const source = new MemoryLineSource([LINE_631]);
      const session = new CaptureSession({
        source,
        logPath: path.join(dir, "missing", "canlog.csv"),
      });
      await expect(session.start()).rejects.toThrow(CaptureError);
      expect(source.opened).toBe(false);
    });

    it("starts without a log when logging is off", async () => {
      const logPath = path.join(dir, "canlog.csv");
      const session = new CaptureSession({
        source: new MemoryLineSource([LINE_631]),
        logPath,
        loggingEnabled: false,
      });
      const summary = await session.start();
      expect(summary.framesLogged).toBe(0);
      expect(session.store.getState().loggingEnabled).toBe(false);
    });
  });
});
