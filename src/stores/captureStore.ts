// src/stores/captureStore.ts
//
// Zustand store for one capture session: lifecycle, filters, logging flag and
// counters. Command handlers only call these synchronous actions; the capture
// loop reads the state once per line, so a change takes effect on the next line.

import { createStore, type StoreApi } from "zustand/vanilla";
import type { CaptureStatus, StopReason } from "../events/registry";

// ============================================================================
// Types
// ============================================================================

export interface CaptureCounters {
  /** Frames parsed and accepted by the filter */
  framesProcessed: number;
  /** Frames parsed but rejected by the filter */
  framesFiltered: number;
  /** Non-empty lines that did not parse */
  linesRejected: number;
  /** Lines discarded while paused */
  linesDropped: number;
  framesLogged: number;
}

export interface CaptureState extends CaptureCounters {
  status: CaptureStatus;
  stopReason: StopReason | null;
  /** Empty = accept all identifiers */
  filters: ReadonlySet<number>;
  loggingEnabled: boolean;
  /** Base path of the log; null = logging unavailable */
  logPath: string | null;
  /** Last error message (session-scoped) */
  error: string | null;

  // ---- Commands ----
  pause: () => boolean;
  resume: () => boolean;
  setFilters: (ids: Iterable<number>) => void;
  /** Returns the new logging flag; stays off when no log path is set */
  toggleLogging: () => boolean;
  requestStop: () => boolean;

  // ---- Session bookkeeping ----
  begin: () => void;
  finish: (reason: StopReason, error?: string | null) => void;
  setLogging: (enabled: boolean, error?: string | null) => void;
  count: (counter: keyof CaptureCounters) => void;
}

export interface CaptureStoreOptions {
  filters?: Iterable<number>;
  logPath?: string | null;
  loggingEnabled?: boolean;
}

export type CaptureStore = StoreApi<CaptureState>;

const ZERO_COUNTERS: CaptureCounters = {
  framesProcessed: 0,
  framesFiltered: 0,
  linesRejected: 0,
  linesDropped: 0,
  framesLogged: 0,
};

// ============================================================================
// Store
// ============================================================================

export function createCaptureStore(options: CaptureStoreOptions = {}): CaptureStore {
  const logPath = options.logPath ?? null;
  return createStore<CaptureState>((set, get) => ({
    ...ZERO_COUNTERS,
    status: "idle",
    stopReason: null,
    filters: new Set(options.filters ?? []),
    loggingEnabled: (options.loggingEnabled ?? true) && logPath !== null,
    logPath,
    error: null,

    pause: () => {
      if (get().status !== "running") return false;
      set({ status: "paused" });
      return true;
    },

    resume: () => {
      if (get().status !== "paused") return false;
      set({ status: "running" });
      return true;
    },

    setFilters: (ids) => set({ filters: new Set(ids) }),

    toggleLogging: () => {
      const { loggingEnabled, logPath: path } = get();
      const next = !loggingEnabled && path !== null;
      set({ loggingEnabled: next });
      return next;
    },

    requestStop: () => {
      const { status } = get();
      if (status === "stopped") return false;
      set({ status: "stopped", stopReason: "user" });
      return true;
    },

    begin: () =>
      set({ ...ZERO_COUNTERS, status: "running", stopReason: null, error: null }),

    finish: (reason, error) => {
      const current = get();
      set({
        status: "stopped",
        // A user stop recorded first wins over the source ending afterwards
        stopReason: current.stopReason ?? reason,
        error: error ?? current.error,
      });
    },

    setLogging: (enabled, error) => {
      const next = enabled && get().logPath !== null;
      set(error === undefined ? { loggingEnabled: next } : { loggingEnabled: next, error });
    },

    count: (counter) =>
      set((state) => {
        const patch: Partial<CaptureCounters> = {};
        patch[counter] = state[counter] + 1;
        return patch;
      }),
  }));
}

/** Only the counters, for summaries */
export function selectCounters(state: CaptureState): CaptureCounters {
  return {
    framesProcessed: state.framesProcessed,
    framesFiltered: state.framesFiltered,
    linesRejected: state.linesRejected,
    linesDropped: state.linesDropped,
    framesLogged: state.framesLogged,
  };
}
