// src/stores/replayStore.ts
//
// Zustand store for one replay session.

import { createStore, type StoreApi } from "zustand/vanilla";
import type { ReplayStatus, StopReason } from "../events/registry";

export interface ReplayState {
  status: ReplayStatus;
  stopReason: StopReason | null;
  /** Effective rate after clamping */
  rate: number;
  loop: boolean;
  framesSent: number;
  sendFailures: number;
  /** Completed passes over the record */
  passes: number;

  // ---- Commands ----
  /** Flip between playing and held. Returns the new status. */
  toggleRunning: () => ReplayStatus;
  requestStop: () => boolean;

  // ---- Session bookkeeping ----
  begin: () => void;
  finish: (reason: StopReason) => void;
  frameSent: () => void;
  sendFailed: () => void;
  passCompleted: () => void;
}

export type ReplayStore = StoreApi<ReplayState>;

export function createReplayStore(rate: number, loop: boolean): ReplayStore {
  return createStore<ReplayState>((set, get) => ({
    status: "idle",
    stopReason: null,
    rate,
    loop,
    framesSent: 0,
    sendFailures: 0,
    passes: 0,

    toggleRunning: () => {
      const { status } = get();
      const next: ReplayStatus =
        status === "playing" ? "held" : status === "held" ? "playing" : status;
      if (next !== status) set({ status: next });
      return next;
    },

    requestStop: () => {
      if (get().status === "stopped") return false;
      set({ status: "stopped", stopReason: "user" });
      return true;
    },

    begin: () =>
      set({ status: "playing", stopReason: null, framesSent: 0, sendFailures: 0, passes: 0 }),

    finish: (reason) =>
      set((state) => ({ status: "stopped", stopReason: state.stopReason ?? reason })),

    frameSent: () => set((state) => ({ framesSent: state.framesSent + 1 })),
    sendFailed: () => set((state) => ({ sendFailures: state.sendFailures + 1 })),
    passCompleted: () => set((state) => ({ passes: state.passes + 1 })),
  }));
}
