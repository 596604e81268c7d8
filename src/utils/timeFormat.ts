// src/utils/timeFormat.ts

import { LOCALE_TIME_24H } from "../constants";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Filename-friendly local date/time used for rotated log files.
 * Format: YYYYMMDD_HHMMSS (e.g., "20260110_143005")
 */
export function formatRotationStamp(date: Date = new Date()): string {
  const ymd = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const hms = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${ymd}_${hms}`;
}

/**
 * Wall-clock time of day (HH:mm:ss, 24h) for console status lines.
 * @param epochSeconds - Unix timestamp in seconds
 */
export function formatClock(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toLocaleTimeString(LOCALE_TIME_24H, { hour12: false });
}

/** Seconds rendered with millisecond resolution (e.g., "12.345s") */
export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)}s`;
}
