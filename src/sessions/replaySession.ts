// src/sessions/replaySession.ts
//
// Timed replay of a recorded frame sequence into a sink. Inter-frame gaps are
// reproduced from the record's timestamps, divided by the playback rate.

import { setTimeout as delay } from "node:timers/promises";
import { MIN_REPLAY_RATE } from "../constants";
import type { Frame } from "../types/frame";
import type { FrameSink } from "../api/transport";
import { ReplayError, errorMessage } from "../api/errors";
import { tlog } from "../api/settings";
import { captureError } from "../api/telemetry";
import { FrameStatsTracker } from "../utils/frameStats";
import { createReplayStore, type ReplayStore } from "../stores/replayStore";
import { SESSION_EVENTS, SessionEvents, type StopReason } from "../events/registry";
import { monotonicClock } from "./captureSession";

/** Waits `ms`, returning early once `signal` aborts */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: SleepFn = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
};

export interface ReplaySessionOptions {
  /** Playback speed multiplier; 2 plays twice as fast */
  rate?: number;
  loop?: boolean;
  sleep?: SleepFn;
  /** Seconds, used for statistics of emitted frames */
  clock?: () => number;
  events?: SessionEvents;
}

export interface ReplayResult {
  framesSent: number;
  sendFailures: number;
  passes: number;
  stopReason: StopReason;
}

/**
 * Validate a playback rate. Non-finite or non-positive rates throw; tiny
 * positive rates are raised to MIN_REPLAY_RATE.
 */
export function normalizeRate(rate: number): number {
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new ReplayError(`Invalid replay rate: ${rate} (must be > 0)`);
  }
  return Math.max(rate, MIN_REPLAY_RATE);
}

export class ReplaySession {
  readonly store: ReplayStore;
  readonly stats = new FrameStatsTracker();
  readonly events: SessionEvents;

  private readonly frames: readonly Frame[];
  private readonly sleep: SleepFn;
  private readonly clock: () => number;
  private readonly abort = new AbortController();
  private started = false;

  constructor(
    frames: readonly Frame[],
    private readonly sink: FrameSink,
    options: ReplaySessionOptions = {}
  ) {
    if (frames.length === 0) {
      throw new ReplayError("No frames in record");
    }
    this.frames = frames;
    this.sleep = options.sleep ?? abortableSleep;
    this.clock = options.clock ?? monotonicClock;
    this.events = options.events ?? new SessionEvents();
    this.store = createReplayStore(normalizeRate(options.rate ?? 1), options.loop ?? false);

    this.store.subscribe((state, prev) => {
      if (state.status === prev.status) return;
      if (state.status === "stopped") this.abort.abort();
      this.events.emit(SESSION_EVENTS.REPLAY_STATE, {
        status: state.status,
        stopReason: state.stopReason,
      });
    });
  }

  // ---- Commands ----

  /** Hold or continue playback. The frame in progress is never skipped. */
  toggleRunning(): void {
    this.store.getState().toggleRunning();
  }

  /** End playback at the next suspend point, cutting the current delay short. */
  stop(): void {
    this.store.getState().requestStop();
  }

  // ---- Lifecycle ----

  async play(): Promise<ReplayResult> {
    if (this.started) {
      throw new ReplayError("Replay session already started");
    }
    this.started = true;

    try {
      await this.sink.open();
    } catch (err) {
      const failure = new ReplayError(`Cannot open sink ${this.sink.name}: ${errorMessage(err)}`, {
        cause: err,
      });
      this.store.getState().finish("error");
      captureError(failure, "replay");
      throw failure;
    }

    const { rate, loop } = this.store.getState();
    this.store.getState().begin();
    tlog.info(`[replay] ${this.frames.length} frame(s) to ${this.sink.name} at ${rate}x${loop ? ", looping" : ""}`);

    try {
      await this.run(rate, loop);
      this.store.getState().finish("completed");
    } finally {
      await this.sink.close().catch((err: unknown) => {
        tlog.debug(`[replay] Closing ${this.sink.name}: ${errorMessage(err)}`);
      });
    }

    const { framesSent, sendFailures, passes, stopReason } = this.store.getState();
    return { framesSent, sendFailures, passes, stopReason: stopReason ?? "completed" };
  }

  private isStopped(): boolean {
    return this.store.getState().status === "stopped";
  }

  private async run(rate: number, loop: boolean): Promise<void> {
    for (let pass = 0; ; pass++) {
      for (let i = 0; i < this.frames.length; i++) {
        const frame = this.frames[i];
        if (this.isStopped()) return;
        if (i > 0) {
          // Out-of-order timestamps play back-to-back
          const gapMs = (Math.max(0, frame.timestamp - this.frames[i - 1].timestamp) * 1000) / rate;
          if (gapMs > 0) await this.sleep(gapMs, this.abort.signal);
        }
        if (this.isStopped()) return;
        await this.whileHeld();
        if (this.isStopped()) return;
        await this.emit(frame, pass, i);
      }
      this.store.getState().passCompleted();
      if (!loop || this.isStopped()) return;
    }
  }

  /** Resolves once the session is no longer held */
  private whileHeld(): Promise<void> {
    if (this.store.getState().status !== "held") return Promise.resolve();
    return new Promise((resolve) => {
      const unsubscribe = this.store.subscribe((state) => {
        if (state.status !== "held") {
          unsubscribe();
          resolve();
        }
      });
    });
  }

  private async emit(frame: Frame, pass: number, index: number): Promise<void> {
    const state = this.store.getState();
    try {
      await this.sink.send(frame);
    } catch (err) {
      state.sendFailed();
      tlog.info(`[replay] Send failed for frame ${index}: ${errorMessage(err)}`);
      return;
    }
    state.frameSent();
    this.stats.update(frame.id, this.clock());
    this.events.emit(SESSION_EVENTS.REPLAY_FRAME, { frame, pass, index });
  }
}
