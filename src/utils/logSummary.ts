// src/utils/logSummary.ts

import { formatPayloadHex, type Frame } from "../types/frame";
import type { PidTable } from "../types/catalog";
import { describeObdResponse } from "../catalog/obd";

const TOP_IDS = 10;
const SAMPLES_PER_ID = 3;

export interface IdCount {
  id: number;
  count: number;
}

export interface DiagnosticDecode {
  /** Milliseconds, as recorded */
  timestampMs: number;
  id: number;
  text: string;
}

export interface LogSummary {
  totalFrames: number;
  /** Most frequent identifiers, count descending then identifier ascending */
  topIds: IdCount[];
  /** Up to three distinct payloads per identifier, in first-seen order */
  samples: Map<number, string[]>;
  decodes: DiagnosticDecode[];
}

export function summarizeLog(frames: readonly Frame[], table: PidTable): LogSummary {
  const counts = new Map<number, number>();
  const samples = new Map<number, string[]>();
  const decodes: DiagnosticDecode[] = [];

  for (const frame of frames) {
    counts.set(frame.id, (counts.get(frame.id) ?? 0) + 1);

    const seen = samples.get(frame.id) ?? [];
    const hex = formatPayloadHex(frame.data);
    if (seen.length < SAMPLES_PER_ID && !seen.includes(hex)) seen.push(hex);
    samples.set(frame.id, seen);

    const text = describeObdResponse(frame, table);
    if (text !== null) {
      decodes.push({ timestampMs: Math.round(frame.timestamp * 1000), id: frame.id, text });
    }
  }

  const topIds = [...counts.entries()]
    .map(([id, count]) => ({ id, count }))
    .sort((a, b) => b.count - a.count || a.id - b.id)
    .slice(0, TOP_IDS);

  return { totalFrames: frames.length, topIds, samples, decodes };
}

function idLabel(id: number): string {
  return `0x${id.toString(16).toUpperCase().padStart(3, "0")}`;
}

/** Plain-text report, one line per entry */
export function formatLogSummary(summary: LogSummary): string[] {
  const lines = [`Total frames: ${summary.totalFrames}`, "Top CAN IDs:"];
  for (const { id, count } of summary.topIds) {
    lines.push(`  ${idLabel(id)}: ${count}`);
  }
  lines.push("", "Sample payloads:");
  for (const [id, payloads] of summary.samples) {
    lines.push(`  ${idLabel(id)}: ${payloads.map((p) => p || "(empty)").join(", ")}`);
  }
  lines.push("", "OBD-II decodes:");
  for (const decode of summary.decodes) {
    lines.push(`  ts ${decode.timestampMs} id ${idLabel(decode.id)}: ${decode.text}`);
  }
  return lines;
}
