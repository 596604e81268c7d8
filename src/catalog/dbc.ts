// src/catalog/dbc.ts
//
// Minimal DBC support. Writes and reads the subset a generated catalog needs:
// BO_ and SG_ lines with multiplex markers. Other sections are ignored.

import type { MessageDef, Schema, SignalDef } from "../types/catalog";
import { CAN_EXT_ID_MAX, CAN_STD_ID_MAX } from "../constants";
import { tlog } from "../api/settings";
import { formatScaled, scaleRaw } from "../utils/signalDecode";
import { sortedMessages } from "./synthesize";

const NODE = "Vector__XXX";
const DBC_EXTENDED_FLAG = 0x80000000;

export interface DbcOptions {
  /** Write the VERSION/NS_/BS_/BU_ preamble (a new file) */
  header: boolean;
}

const DBC_HEADER = ['VERSION "cantrace"', "", "NS_ :", "", "BS_:", "", `BU_: ${NODE}`, "", ""].join(
  "\n"
);

/** Swap between MSB-first sequential numbering and DBC byte-wise numbering */
function flipBitInByte(bit: number): number {
  return Math.floor(bit / 8) * 8 + (7 - (bit % 8));
}

/**
 * DBC start bit. Big-endian (Motorola) signals are addressed by their MSB
 * position in the byte-wise numbering, so sequential MSB-first bit 16 is bit 23.
 */
export function dbcStartBit(signal: SignalDef): number {
  return signal.byte_order === "little" ? signal.start_bit : flipBitInByte(signal.start_bit);
}

function signalRange(signal: SignalDef): [string, string] {
  const maxRaw = 2 ** signal.bit_length - 1;
  const a = scaleRaw(0, signal.factor, signal.offset);
  const b = scaleRaw(maxRaw, signal.factor, signal.offset);
  const [lo, hi] = a.lte(b) ? [a, b] : [b, a];
  return [formatScaled(lo), formatScaled(hi)];
}

function muxMarker(signal: SignalDef): string {
  if (signal.multiplexor) return " M";
  if (signal.mux_value !== undefined) return ` m${signal.mux_value}`;
  return "";
}

export function formatSignalLine(signal: SignalDef): string {
  const order = signal.byte_order === "little" ? "1" : "0";
  const [min, max] = signalRange(signal);
  const unit = signal.unit.replace(/"/g, "'");
  return (
    ` SG_ ${signal.name}${muxMarker(signal)} : ${dbcStartBit(signal)}|${signal.bit_length}@${order}+` +
    ` (${signal.factor},${signal.offset}) [${min}|${max}] "${unit}" ${NODE}`
  );
}

/** Render messages in identifier order, each followed by a blank line. */
export function schemaToDbc(schema: Schema, options: DbcOptions): string {
  const lines: string[] = [];
  for (const message of sortedMessages(schema)) {
    const dbcId = message.id > CAN_STD_ID_MAX ? (message.id | DBC_EXTENDED_FLAG) >>> 0 : message.id;
    lines.push(`BO_ ${dbcId} ${message.name}: ${message.length} ${NODE}`);
    for (const signal of message.signals) {
      lines.push(formatSignalLine(signal));
    }
    lines.push("");
  }
  const body = lines.join("\n") + (lines.length > 0 ? "\n" : "");
  return options.header ? DBC_HEADER + body : body;
}

const BO_LINE = /^BO_\s+(\d+)\s+(\w+)\s*:\s*(\d+)/;
const SG_LINE =
  /^SG_\s+(\w+)\s*(M|m\d+)?\s*:\s*(\d+)\|(\d+)@([01])([+-])\s*\(([^,]+),([^)]+)\)\s*\[[^\]]*\]\s*"([^"]*)"/;

function messageId(raw: number): number | null {
  const id = raw >= DBC_EXTENDED_FLAG ? raw - DBC_EXTENDED_FLAG : raw;
  return id > CAN_EXT_ID_MAX ? null : id;
}

function parseSignalLine(match: RegExpExecArray): SignalDef | null {
  const [, name, marker, start, length, order, sign, factor, offset, unit] = match;
  const bitLength = Number(length);
  const scale = Number(factor);
  const shift = Number(offset);
  if (bitLength < 1 || !Number.isFinite(scale) || !Number.isFinite(shift)) return null;
  if (sign === "-") {
    tlog.debug(`[dbc] Signal ${name} is signed; decoding it as unsigned`);
  }

  const byteOrder = order === "1" ? "little" : "big";
  const signal: SignalDef = {
    name,
    start_bit: byteOrder === "little" ? Number(start) : flipBitInByte(Number(start)),
    bit_length: bitLength,
    factor: scale,
    offset: shift,
    unit,
    byte_order: byteOrder,
  };
  if (marker === "M") signal.multiplexor = true;
  if (marker?.startsWith("m")) signal.mux_value = Number(marker.slice(1));
  return signal;
}

/**
 * Read messages and signals back from DBC text. SG_ lines belong to the
 * BO_ line above them; lines that do not parse are skipped.
 */
export function parseDbc(text: string): Schema {
  const schema: Schema = new Map();
  let current: MessageDef | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const bo = BO_LINE.exec(line);
    if (bo) {
      const id = messageId(Number(bo[1]));
      current = id === null ? null : { id, name: bo[2], length: Number(bo[3]), signals: [] };
      if (current) schema.set(current.id, current);
      continue;
    }
    if (!line.startsWith("SG_")) continue;
    const sg = SG_LINE.exec(line);
    const signal = sg ? parseSignalLine(sg) : null;
    if (!current || !signal) {
      tlog.debug(`[dbc] Skipping signal line: ${line}`);
      continue;
    }
    current.signals.push(signal);
  }
  return schema;
}

/** Identifiers of every `BO_` line, with the extended-frame flag removed */
export function readDbcMessageIds(text: string): Set<number> {
  return new Set(parseDbc(text).keys());
}
