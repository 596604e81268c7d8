// src/api/profiles.ts
//
// Transport selection. A session gets its source or sink once, from a profile.

import { FileLineSource, NullFrameSink, type FrameSink, type LineSource } from "./transport";
import { SerialFrameSink, SerialLineSource } from "./serial";

export type LineSourceProfile =
  | { kind: "serial"; port: string; baudRate: number }
  | { kind: "file"; path: string };

export type FrameSinkProfile =
  | { kind: "serial"; port: string; baudRate: number; bitrate?: number }
  | { kind: "none" };

export function createLineSource(profile: LineSourceProfile): LineSource {
  switch (profile.kind) {
    case "serial":
      return new SerialLineSource(profile.port, profile.baudRate);
    case "file":
      return new FileLineSource(profile.path);
  }
}

export function createFrameSink(profile: FrameSinkProfile): FrameSink {
  switch (profile.kind) {
    case "serial":
      return new SerialFrameSink(profile.port, profile.baudRate, profile.bitrate);
    case "none":
      return new NullFrameSink();
  }
}
