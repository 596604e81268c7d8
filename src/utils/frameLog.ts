// src/utils/frameLog.ts
//
// Frame log store. One CSV file per capture, header
// `timestamp_ms,id_hex,dlc,data_hex`, rotated once it grows past a threshold.
// A writer is the only process appending to its base path; nothing locks it.

import {
  closeSync,
  createReadStream,
  existsSync,
  fstatSync,
  openSync,
  renameSync,
  writeSync,
} from "node:fs";
import { stat } from "node:fs/promises";
import { createInterface } from "node:readline";
import path from "node:path";
import { CAN_EXT_ID_MAX, CAN_MAX_BYTES, LOG_HEADER, LOG_ROTATE_BYTES } from "../constants";
import { createFrame, formatPayloadHex, type Frame } from "../types/frame";
import { LogStoreError, errorMessage } from "../api/errors";
import { tlog } from "../api/settings";
import { formatRotationStamp } from "./timeFormat";

export interface FrameLogWriterOptions {
  /** Rotate once the active file exceeds this many bytes */
  rotateBytes?: number;
  /** Clock used to stamp rotated file names */
  now?: () => Date;
}

export interface LoadedFrameLog {
  frames: Frame[];
  /** Malformed rows that were skipped */
  skipped: number;
}

/** One CSV row (no newline) for a frame */
export function formatLogRow(frame: Frame): string {
  return [
    Math.round(frame.timestamp * 1000),
    frame.id.toString(16).toUpperCase(),
    frame.dlc,
    formatPayloadHex(frame.data),
  ].join(",");
}

/**
 * Parse one CSV row back into a frame. Returns null for the header, blank
 * lines and anything malformed.
 */
export function parseLogRow(line: string): Frame | null {
  const cells = line.trim().split(",");
  if (cells.length !== 4) return null;
  const [tsCell, idCell, dlcCell, dataCell] = cells.map((c) => c.trim());

  if (!/^-?\d+$/.test(tsCell)) return null;
  const idHex = idCell.replace(/^0x/i, "");
  if (!/^[0-9A-Fa-f]+$/.test(idHex)) return null;
  if (!/^\d+$/.test(dlcCell)) return null;

  const id = parseInt(idHex, 16);
  const dlc = parseInt(dlcCell, 10);
  if (id > CAN_EXT_ID_MAX || dlc > CAN_MAX_BYTES) return null;

  const tokens = dataCell === "" ? [] : dataCell.split(/\s+/);
  if (tokens.length !== dlc || !tokens.every((t) => /^[0-9A-Fa-f]{2}$/.test(t))) return null;

  return createFrame(parseInt(tsCell, 10) / 1000, id, dlc, tokens.map((t) => parseInt(t, 16)));
}

/**
 * Pick the name a full log file is renamed to: `<base>_<YYYYMMDD_HHMMSS><ext>`,
 * with `-N` appended while that name is taken.
 */
export function rotatedLogPath(basePath: string, date: Date): string {
  const { dir, name, ext } = path.parse(basePath);
  const stem = path.join(dir, `${name}_${formatRotationStamp(date)}`);
  let candidate = `${stem}${ext}`;
  for (let n = 1; existsSync(candidate); n++) {
    candidate = `${stem}-${n}${ext}`;
  }
  return candidate;
}

/**
 * Append-only frame log with size-based rotation.
 * Every append is written synchronously, so a frame is on disk before the
 * capture loop takes the next line.
 */
export class FrameLogWriter {
  private fd: number | null = null;
  private size = 0;
  private closed = false;
  private readonly rotated: string[] = [];
  private readonly rotateBytes: number;
  private readonly now: () => Date;

  constructor(
    readonly path: string,
    options: FrameLogWriterOptions = {}
  ) {
    this.rotateBytes = options.rotateBytes ?? LOG_ROTATE_BYTES;
    this.now = options.now ?? (() => new Date());
  }

  /** Files this writer has rotated away, oldest first */
  get rotations(): readonly string[] {
    return this.rotated;
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /** Open (or reopen) the base path in append mode, writing the header to an empty file. */
  open(): void {
    if (this.closed) {
      throw new LogStoreError(`Log writer for ${this.path} is closed`);
    }
    if (this.fd !== null) return;
    try {
      const fd = openSync(this.path, "a");
      this.fd = fd;
      this.size = fstatSync(fd).size;
      if (this.size === 0) this.write(LOG_HEADER);
    } catch (err) {
      this.release();
      throw new LogStoreError(`Cannot open log ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  append(frame: Frame): void {
    if (this.closed || this.fd === null) {
      throw new LogStoreError(`Log ${this.path} is not open`);
    }
    try {
      this.write(formatLogRow(frame));
    } catch (err) {
      throw new LogStoreError(`Cannot write log ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    if (this.size > this.rotateBytes) {
      this.rotate();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.release();
  }

  private write(row: string): void {
    if (this.fd === null) return;
    const line = row + "\n";
    writeSync(this.fd, line);
    this.size += Buffer.byteLength(line);
  }

  private rotate(): void {
    this.release();
    const target = rotatedLogPath(this.path, this.now());
    try {
      renameSync(this.path, target);
    } catch (err) {
      this.closed = true;
      throw new LogStoreError(`Cannot rotate log ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    this.rotated.push(target);
    tlog.info(`[frameLog] Rotated ${this.path} -> ${target}`);
    this.open();
  }

  private release(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    this.size = 0;
    closeSync(fd);
  }
}

/**
 * Load a recorded log in file order. Malformed rows are skipped and counted.
 * Throws LogStoreError when the file cannot be read.
 */
export async function loadFrameLog(filePath: string): Promise<LoadedFrameLog> {
  try {
    await stat(filePath);
  } catch (err) {
    throw new LogStoreError(`Cannot read log ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  const frames: Frame[] = [];
  let skipped = 0;
  const reader = createInterface({
    input: createReadStream(filePath, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });
  try {
    for await (const line of reader) {
      const trimmed = line.trim();
      if (trimmed === "" || trimmed === LOG_HEADER) continue;
      const frame = parseLogRow(trimmed);
      if (frame) {
        frames.push(frame);
      } else {
        skipped++;
      }
    }
  } catch (err) {
    throw new LogStoreError(`Cannot read log ${filePath}: ${errorMessage(err)}`, { cause: err });
  } finally {
    reader.close();
  }

  if (skipped > 0) {
    tlog.debug(`[frameLog] Skipped ${skipped} malformed row(s) in ${filePath}`);
  }
  return { frames, skipped };
}
