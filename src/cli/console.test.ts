import { describe, it, expect, vi } from "vitest";
import { PassThrough } from "node:stream";
import { createFrame } from "../types/frame";
import { MemoryFrameSink, MemoryLineSource } from "../api/transport";
import { loadPidTable } from "../catalog/obd";
import { synthesizeCatalog } from "../catalog/synthesize";
import { decodeFrame } from "../catalog/decode";
import { CaptureSession } from "../sessions/captureSession";
import { ReplaySession } from "../sessions/replaySession";
import {
  bindCommands,
  CaptureCommands,
  formatFrameLine,
  formatFrameTime,
  ReplayCommands,
} from "./console";

const HELP = "[P]ause [R]esume [F]ilter [C]apture toggle [I]nfo [Q]uit";

describe("formatFrameLine", () => {
  const frame = createFrame(0, 0x7e8, 4, [0x41, 0x0c, 0x1a, 0xf8]);

  it("appends decoded signals when there are any", () => {
    const schema = synthesizeCatalog([frame], new Set(), loadPidTable());
    expect(formatFrameLine(frame, decodeFrame(schema, frame), "12:00:00.000")).toBe(
      "12:00:00.000 | ID: 0x7E8 | DLC: 4 | DATA: 41 0C 1A F8 | Service=65 PID=12 EngineRPM=1726rpm"
    );
    expect(formatFrameLine(frame, [], "12:00:00.000")).toBe(
      "12:00:00.000 | ID: 0x7E8 | DLC: 4 | DATA: 41 0C 1A F8"
    );
  });

  it("shows milliseconds of the timestamp", () => {
    expect(formatFrameTime(1.25).endsWith(".250")).toBe(true);
  });
});

describe("CaptureCommands", () => {
  function setup() {
    const session = new CaptureSession({
      source: new MemoryLineSource([]),
      logPath: "canlog.csv",
      loggingEnabled: false,
    });
    session.store.getState().begin();
    const out: string[] = [];
    return { session, out, commands: new CaptureCommands(session, (line) => out.push(line)) };
  }

  it("pauses, resumes and toggles logging", () => {
    const { commands, out } = setup();
    commands.handle("p");
    commands.handle("R");
    commands.handle("c");
    expect(out).toEqual([
      `STATUS: PAUSED | Filters: <none> | Capture: OFF | ${HELP}`,
      `STATUS: RUNNING | Filters: <none> | Capture: OFF | ${HELP}`,
      `STATUS: RUNNING | Filters: <none> | Capture: ON (canlog.csv) | ${HELP}`,
    ]);
  });

  it("reads filter IDs from the line after f", () => {
    const { commands, out, session } = setup();
    commands.handle("f");
    commands.handle("7e8, 631");
    commands.handle("f");
    commands.handle("zz");
    expect(out).toEqual([
      "Enter filter IDs (comma separated, empty to clear):",
      `STATUS: RUNNING | Filters: 0x631,0x7E8 | Capture: OFF | ${HELP}`,
      "Enter filter IDs (comma separated, empty to clear):",
      'Filter unchanged: Invalid CAN ID "zz"',
      `STATUS: RUNNING | Filters: 0x631,0x7E8 | Capture: OFF | ${HELP}`,
    ]);
    expect([...session.store.getState().filters]).toEqual([0x7e8, 0x631]);
  });

  it("prints statistics and stops on q", () => {
    const { commands, out, session } = setup();
    commands.handle("i");
    commands.handle("q");
    expect(out).toEqual(["<no data>", `STATUS: RUNNING | Filters: <none> | Capture: OFF | ${HELP}`]);
    expect(session.store.getState().stopReason).toBe("user");
  });
});

describe("ReplayCommands", () => {
  it("holds and stops playback", () => {
    const session = new ReplaySession([createFrame(0, 0x100, 0, [])], new MemoryFrameSink(), {
      rate: 2,
      loop: true,
    });
    session.store.getState().begin();
    const out: string[] = [];
    const commands = new ReplayCommands(session, (line) => out.push(line));

    commands.handle("s");
    commands.handle("q");

    expect(out).toEqual(["STATUS: HELD | Rate: 2x | loop | Sent: 0 | [S]top/start [I]nfo [Q]uit"]);
    expect(session.store.getState().status).toBe("stopped");
  });
});

describe("bindCommands", () => {
  it("feeds each input line to the handler until detached", async () => {
    const input = new PassThrough();
    const seen: string[] = [];
    const unbind = bindCommands({ handle: (line) => seen.push(line) }, input);

    input.write("p\nq\n");
    await vi.waitFor(() => expect(seen).toEqual(["p", "q"]));
    unbind();
  });
});
