// src/cli/console.ts
//
// Terminal presentation. Renders session events and store state, and turns
// single-letter command lines typed on stdin into session commands.

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { formatFrameId, formatPayloadHex, type Frame } from "../types/frame";
import type { DecodedSignal } from "../types/catalog";
import { formatDecoded } from "../catalog/decode";
import { formatClock } from "../utils/timeFormat";
import { parseFilterIds } from "../utils/lineParser";
import { errorMessage } from "../api/errors";
import type { CaptureSession } from "../sessions/captureSession";
import type { ReplaySession } from "../sessions/replaySession";
import type { CaptureState } from "../stores/captureStore";
import type { ReplayState } from "../stores/replayStore";

export type WriteLine = (line: string) => void;

/** Handles one command line typed by the user */
export interface CommandHandler {
  handle(line: string): void;
}

// ============================================================================
// Rendering
// ============================================================================

/** Wall-clock time of day with milliseconds, e.g. `14:03:07.250` */
export function formatFrameTime(timestamp: number): string {
  const ms = String(Math.floor((timestamp * 1000) % 1000)).padStart(3, "0");
  return `${formatClock(timestamp)}.${ms}`;
}

/** `14:03:07.250 | ID: 0x7E8 | DLC: 8 | DATA: 41 0C ... | EngineRPM=1726rpm` */
export function formatFrameLine(
  frame: Frame,
  decoded: readonly DecodedSignal[] | null,
  time: string = formatFrameTime(frame.timestamp)
): string {
  let line = `${time} | ID: ${formatFrameId(frame.id)} | DLC: ${frame.dlc} | DATA: ${formatPayloadHex(frame.data)}`;
  if (decoded && decoded.length > 0) {
    line += ` | ${formatDecoded(decoded)}`;
  }
  return line;
}

export function formatFilters(filters: ReadonlySet<number>): string {
  if (filters.size === 0) return "<none>";
  return [...filters]
    .sort((a, b) => a - b)
    .map(formatFrameId)
    .join(",");
}

export function captureStatusLine(state: CaptureState): string {
  const capture = state.loggingEnabled && state.logPath ? `ON (${state.logPath})` : "OFF";
  return (
    `STATUS: ${state.status.toUpperCase()} | Filters: ${formatFilters(state.filters)} | ` +
    `Capture: ${capture} | [P]ause [R]esume [F]ilter [C]apture toggle [I]nfo [Q]uit`
  );
}

export function replayStatusLine(state: ReplayState): string {
  const loop = state.loop ? " | loop" : "";
  return (
    `STATUS: ${state.status.toUpperCase()} | Rate: ${state.rate}x${loop} | ` +
    `Sent: ${state.framesSent} | [S]top/start [I]nfo [Q]uit`
  );
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Capture keys: p pause, r resume, f filter (reads IDs from the next line),
 * c toggle logging, i statistics, q quit.
 */
export class CaptureCommands implements CommandHandler {
  private awaitingFilter = false;

  constructor(
    private readonly session: CaptureSession,
    private readonly out: WriteLine
  ) {}

  handle(line: string): void {
    if (this.awaitingFilter) {
      this.awaitingFilter = false;
      try {
        this.session.setFilters(parseFilterIds(line));
      } catch (err) {
        this.out(`Filter unchanged: ${errorMessage(err)}`);
      }
      this.status();
      return;
    }

    switch (line.trim().toLowerCase().charAt(0)) {
      case "p":
        this.session.pause();
        break;
      case "r":
        this.session.resume();
        break;
      case "f":
        this.awaitingFilter = true;
        this.out("Enter filter IDs (comma separated, empty to clear):");
        return;
      case "c":
        this.session.toggleLogging();
        break;
      case "i":
        this.out(this.session.stats.format());
        break;
      case "q":
        this.session.stop();
        return;
      default:
        break;
    }
    this.status();
  }

  private status(): void {
    this.out(captureStatusLine(this.session.store.getState()));
  }
}

/** Replay keys: s hold/continue, i statistics, q quit. */
export class ReplayCommands implements CommandHandler {
  constructor(
    private readonly session: ReplaySession,
    private readonly out: WriteLine
  ) {}

  handle(line: string): void {
    switch (line.trim().toLowerCase().charAt(0)) {
      case "s":
        this.session.toggleRunning();
        break;
      case "i":
        this.out(this.session.stats.format());
        break;
      case "q":
        this.session.stop();
        return;
      default:
        break;
    }
    this.out(replayStatusLine(this.session.store.getState()));
  }
}

/**
 * Feed lines from `input` to `handler`. Returns a function that detaches the
 * reader without closing `input`.
 */
export function bindCommands(handler: CommandHandler, input: Readable): () => void {
  const reader = createInterface({ input, crlfDelay: Infinity, terminal: false });
  reader.on("line", (line) => handler.handle(line));
  return () => reader.close();
}
