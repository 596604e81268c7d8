// src/events/registry.ts
// Event registry for session observers (console presentation, tests)

import { EventEmitter } from "node:events";
import type { Frame } from "../types/frame";
import type { DecodedSignal } from "../types/catalog";

export const SESSION_EVENTS = {
  // Capture events
  CAPTURE_FRAME: "capture:frame",
  CAPTURE_STATE: "capture:state",
  CAPTURE_ERROR: "capture:error",

  // Replay events
  REPLAY_FRAME: "replay:frame",
  REPLAY_STATE: "replay:state",
} as const;

export type CaptureStatus = "idle" | "running" | "paused" | "stopped";
export type ReplayStatus = "idle" | "playing" | "held" | "stopped";
export type StopReason = "user" | "source-ended" | "error" | "completed";

export interface CaptureFramePayload {
  frame: Frame;
  /** Null when no catalog message matches or decoding failed */
  decoded: DecodedSignal[] | null;
}

export interface CaptureStatePayload {
  status: CaptureStatus;
  stopReason: StopReason | null;
}

export interface SessionErrorPayload {
  error: Error;
  /** True when the session keeps running after the error */
  recovered: boolean;
}

export interface ReplayFramePayload {
  frame: Frame;
  /** Zero-based pass number (increments on each loop) */
  pass: number;
  index: number;
}

export interface ReplayStatePayload {
  status: ReplayStatus;
  stopReason: StopReason | null;
}

/** Payload type for each event name */
export interface SessionEventMap {
  [SESSION_EVENTS.CAPTURE_FRAME]: [CaptureFramePayload];
  [SESSION_EVENTS.CAPTURE_STATE]: [CaptureStatePayload];
  [SESSION_EVENTS.CAPTURE_ERROR]: [SessionErrorPayload];
  [SESSION_EVENTS.REPLAY_FRAME]: [ReplayFramePayload];
  [SESSION_EVENTS.REPLAY_STATE]: [ReplayStatePayload];
}

/** Typed emitter shared by capture and replay sessions */
export class SessionEvents extends EventEmitter<SessionEventMap> {}
