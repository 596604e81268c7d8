// src/utils/frameStats.ts

import { EMA_WEIGHT } from "../constants";
import { formatFrameId } from "../types/frame";

export interface StatEntry {
  count: number;
  /** Timestamp of the latest frame, seconds */
  lastTimestamp?: number;
  /** Smoothed frequency in Hz (0 until two frames with a positive gap arrive) */
  emaHz: number;
}

export interface StatRow extends StatEntry {
  id: number;
}

/**
 * Per-identifier frame counts and exponentially smoothed frequency.
 * Single writer: the session that owns it.
 */
export class FrameStatsTracker {
  private readonly entries = new Map<number, StatEntry>();

  update(id: number, timestamp: number): StatEntry {
    let entry = this.entries.get(id);
    if (!entry) {
      entry = { count: 0, emaHz: 0 };
      this.entries.set(id, entry);
    }
    entry.count += 1;
    if (entry.lastTimestamp !== undefined) {
      const delta = timestamp - entry.lastTimestamp;
      if (delta > 0) {
        const inst = 1 / delta;
        entry.emaHz = entry.emaHz === 0 ? inst : (1 - EMA_WEIGHT) * entry.emaHz + EMA_WEIGHT * inst;
      }
    }
    entry.lastTimestamp = timestamp;
    return entry;
  }

  get(id: number): Readonly<StatEntry> | undefined {
    return this.entries.get(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Rows sorted by identifier */
  snapshot(): StatRow[] {
    return [...this.entries.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, entry]) => ({ id, ...entry }));
  }

  reset(): void {
    this.entries.clear();
  }

  /** `0x631: 3 frames, 10.0 Hz | 0x7E8: ...`, or `<no data>` */
  format(): string {
    const parts = this.snapshot().map(
      (row) => `${formatFrameId(row.id)}: ${row.count} frames, ${row.emaHz.toFixed(1)} Hz`
    );
    return parts.length > 0 ? parts.join(" | ") : "<no data>";
  }
}
