// src/sessions/captureSession.ts
//
// Capture controller. Pulls lines from a source, parses, filters, timestamps,
// tracks statistics, logs and emits frames. Commands (pause, resume, filters,
// logging, stop) go through the session store and are observed once per line.

import type { Frame } from "../types/frame";
import type { DecodedSignal, Schema } from "../types/catalog";
import type { LineSource } from "../api/transport";
import { CaptureError, errorMessage } from "../api/errors";
import { tlog } from "../api/settings";
import { captureError } from "../api/telemetry";
import { parseAdapterLine } from "../utils/lineParser";
import { FrameLogWriter } from "../utils/frameLog";
import { FrameStatsTracker, type StatRow } from "../utils/frameStats";
import { decodeFrame } from "../catalog/decode";
import {
  createCaptureStore,
  selectCounters,
  type CaptureCounters,
  type CaptureState,
  type CaptureStore,
} from "../stores/captureStore";
import { SESSION_EVENTS, SessionEvents, type StopReason } from "../events/registry";

export interface CaptureSessionOptions {
  source: LineSource;
  filters?: Iterable<number>;
  /** Base path of the frame log; null or omitted = no logging possible */
  logPath?: string | null;
  /** Initial logging flag (default true when a log path is set) */
  loggingEnabled?: boolean;
  rotateBytes?: number;
  /** Catalog used to annotate frames */
  schema?: Schema;
  /** Seconds; defaults to a monotonic clock anchored to wall time */
  clock?: () => number;
  events?: SessionEvents;
}

export interface CaptureSummary extends CaptureCounters {
  stopReason: StopReason;
  error: string | null;
  stats: StatRow[];
  /** Log files rotated away during the session */
  rotations: string[];
}

/** Wall-anchored monotonic seconds */
export function monotonicClock(): number {
  return (performance.timeOrigin + performance.now()) / 1000;
}

export class CaptureSession {
  readonly store: CaptureStore;
  readonly stats = new FrameStatsTracker();
  readonly events: SessionEvents;

  private readonly source: LineSource;
  private readonly schema: Schema | null;
  private readonly clock: () => number;
  private readonly rotateBytes: number | undefined;
  private writer: FrameLogWriter | null = null;
  private readonly rotations: string[] = [];
  private started = false;

  constructor(options: CaptureSessionOptions) {
    this.source = options.source;
    this.schema = options.schema ?? null;
    this.clock = options.clock ?? monotonicClock;
    this.rotateBytes = options.rotateBytes;
    this.events = options.events ?? new SessionEvents();
    this.store = createCaptureStore({
      filters: options.filters,
      logPath: options.logPath,
      loggingEnabled: options.loggingEnabled,
    });

    this.store.subscribe((state, prev) => {
      if (state.status !== prev.status) {
        this.events.emit(SESSION_EVENTS.CAPTURE_STATE, {
          status: state.status,
          stopReason: state.stopReason,
        });
      }
    });
  }

  // ---- Commands ----

  pause(): boolean {
    return this.store.getState().pause();
  }

  resume(): boolean {
    return this.store.getState().resume();
  }

  setFilters(ids: Iterable<number>): void {
    this.store.getState().setFilters(ids);
  }

  toggleLogging(): boolean {
    const state = this.store.getState();
    const enabled = state.toggleLogging();
    if (!enabled && state.logPath === null) {
      tlog.warn("[capture] No log path configured; logging stays off");
    }
    return enabled;
  }

  /** Stop at the next line; closing the source ends a blocked read. */
  stop(): void {
    if (!this.store.getState().requestStop()) return;
    void this.source.close().catch((err: unknown) => {
      tlog.debug(`[capture] Closing ${this.source.name} after stop: ${errorMessage(err)}`);
    });
  }

  // ---- Lifecycle ----

  /**
   * Open resources and run until stopped or the source ends.
   * Rejects with CaptureError when the log or the source cannot be opened.
   */
  async start(): Promise<CaptureSummary> {
    if (this.started) {
      throw new CaptureError("Capture session already started");
    }
    this.started = true;
    this.stats.reset();

    try {
      if (this.store.getState().loggingEnabled) this.openWriter();
      await this.source.open();
    } catch (err) {
      this.closeWriter();
      const failure = new CaptureError(`Capture failed to start: ${errorMessage(err)}`, { cause: err });
      this.store.getState().finish("error", failure.message);
      captureError(failure, "capture");
      throw failure;
    }

    // stop() may land while the source is opening
    const stoppedWhileOpening = this.store.getState().status !== "idle";
    if (stoppedWhileOpening) {
      tlog.info(`[capture] Stopped before reading ${this.source.name}`);
    } else {
      this.store.getState().begin();
      tlog.info(`[capture] Reading ${this.source.name}`);
    }

    try {
      const lines: AsyncIterable<string> | Iterable<string> = stoppedWhileOpening
        ? []
        : this.source.lines();
      for await (const line of lines) {
        const state = this.store.getState();
        if (state.status === "stopped") break;
        if (state.status === "paused") {
          state.count("linesDropped");
          continue;
        }
        this.processLine(line, state);
      }
      this.store.getState().finish("source-ended");
    } catch (err) {
      const failure = err instanceof Error ? err : new Error(String(err));
      this.store.getState().finish("error", failure.message);
      this.events.emit(SESSION_EVENTS.CAPTURE_ERROR, { error: failure, recovered: false });
      captureError(failure, "capture");
    } finally {
      this.closeWriter();
      await this.source.close().catch((err: unknown) => {
        tlog.debug(`[capture] Closing ${this.source.name}: ${errorMessage(err)}`);
      });
    }

    return this.summary();
  }

  summary(): CaptureSummary {
    const state = this.store.getState();
    return {
      ...selectCounters(state),
      stopReason: state.stopReason ?? "source-ended",
      error: state.error,
      stats: this.stats.snapshot(),
      rotations: [...this.rotations, ...(this.writer?.rotations ?? [])],
    };
  }

  // ---- Per line ----

  private processLine(line: string, state: CaptureState): void {
    if (line.trim() === "") return;

    const frame = parseAdapterLine(line, this.clock());
    if (!frame) {
      state.count("linesRejected");
      tlog.verbose(`[capture] Rejected line: ${line.trim()}`);
      return;
    }
    if (state.filters.size > 0 && !state.filters.has(frame.id)) {
      state.count("framesFiltered");
      return;
    }

    this.stats.update(frame.id, frame.timestamp);
    const decoded = this.decode(frame);
    this.log(frame, state.loggingEnabled);

    state.count("framesProcessed");
    this.events.emit(SESSION_EVENTS.CAPTURE_FRAME, { frame, decoded });
  }

  private decode(frame: Frame): DecodedSignal[] | null {
    if (!this.schema) return null;
    try {
      return decodeFrame(this.schema, frame);
    } catch (err) {
      tlog.debug(`[capture] Decode failed for 0x${frame.id.toString(16)}: ${errorMessage(err)}`);
      return null;
    }
  }

  private log(frame: Frame, enabled: boolean): void {
    if (!enabled) {
      this.closeWriter();
      return;
    }
    try {
      const writer = this.writer ?? this.openWriter();
      writer.append(frame);
      this.store.getState().count("framesLogged");
    } catch (err) {
      this.closeWriter();
      const failure = err instanceof Error ? err : new Error(String(err));
      this.store.getState().setLogging(false, failure.message);
      this.events.emit(SESSION_EVENTS.CAPTURE_ERROR, { error: failure, recovered: true });
      captureError(failure, "capture.log");
    }
  }

  private openWriter(): FrameLogWriter {
    const { logPath } = this.store.getState();
    if (logPath === null) {
      throw new CaptureError("No log path configured");
    }
    const writer = new FrameLogWriter(logPath, { rotateBytes: this.rotateBytes });
    writer.open();
    this.writer = writer;
    tlog.info(`[capture] Logging to ${logPath}`);
    return writer;
  }

  private closeWriter(): void {
    if (!this.writer) return;
    this.rotations.push(...this.writer.rotations);
    this.writer.close();
    this.writer = null;
  }
}
