// src/types/frame.ts

import { CAN_EXT_ID_MAX, CAN_MAX_BYTES } from "../constants";

/**
 * A single classic CAN frame as seen on the bus.
 * Frames are frozen on creation and never mutated downstream.
 */
export interface Frame {
  /** Seconds since an arbitrary origin (monotonic during capture) */
  readonly timestamp: number;
  /** 11- or 29-bit identifier */
  readonly id: number;
  /** Data length code, 0-8 */
  readonly dlc: number;
  /** Exactly `dlc` bytes */
  readonly data: readonly number[];
}

/**
 * Build a frame, enforcing the length invariant.
 * Throws RangeError on any contract violation.
 */
export function createFrame(
  timestamp: number,
  id: number,
  dlc: number,
  data: readonly number[]
): Frame {
  if (!Number.isFinite(timestamp)) {
    throw new RangeError(`Invalid frame timestamp: ${timestamp}`);
  }
  if (!Number.isInteger(id) || id < 0 || id > CAN_EXT_ID_MAX) {
    throw new RangeError(`Invalid CAN identifier: ${id}`);
  }
  if (!Number.isInteger(dlc) || dlc < 0 || dlc > CAN_MAX_BYTES) {
    throw new RangeError(`Invalid DLC: ${dlc}`);
  }
  if (data.length !== dlc) {
    throw new RangeError(`Payload length ${data.length} does not match DLC ${dlc}`);
  }
  for (const b of data) {
    if (!Number.isInteger(b) || b < 0 || b > 0xff) {
      throw new RangeError(`Invalid payload byte: ${b}`);
    }
  }
  return Object.freeze({
    timestamp,
    id,
    dlc,
    data: Object.freeze([...data]),
  });
}

/** Same frame, new timestamp. Used when a replayed or parsed frame is re-stamped. */
export function withTimestamp(frame: Frame, timestamp: number): Frame {
  return createFrame(timestamp, frame.id, frame.dlc, frame.data);
}

/** Format a frame ID as uppercase hex with 0x prefix (e.g., "0x7E8") */
export function formatFrameId(id: number): string {
  return `0x${id.toString(16).toUpperCase()}`;
}

/**
 * Format a byte array as a space-separated hex string ("AA BB CC").
 */
export function formatPayloadHex(payload: readonly number[]): string {
  return payload
    .map((b) => b.toString(16).toUpperCase().padStart(2, "0"))
    .join(" ");
}
