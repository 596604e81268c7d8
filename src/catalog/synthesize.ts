// src/catalog/synthesize.ts
//
// Derive a minimal message/signal schema from observed traffic.

import { OBD_RESPONSE_MARKER, OBD_VALUE_START_BIT } from "../constants";
import type { Frame } from "../types/frame";
import type { MessageDef, PidTable, Schema, SignalDef } from "../types/catalog";
import { EMPTY_PID_TABLE, formatPid } from "./obd";

/** Name used for identifiers with no well-known message name */
export function defaultMessageName(id: number): string {
  return `MSG_${id.toString(16).toUpperCase().padStart(3, "0")}`;
}

function rawByteSignal(name: string, startBit: number): SignalDef {
  return {
    name,
    start_bit: startBit,
    bit_length: 8,
    factor: 1,
    offset: 0,
    unit: "",
    byte_order: "little",
  };
}

/** Service byte and PID selector shared by every diagnostic response message */
function diagnosticHeaderSignals(): SignalDef[] {
  return [rawByteSignal("Service", 0), { ...rawByteSignal("PID", 8), multiplexor: true }];
}

function pidSignal(pid: number, table: PidTable): SignalDef {
  const def = table.pids.get(pid);
  if (!def) {
    return {
      ...rawByteSignal(`PID_${formatPid(pid).slice(2)}`, OBD_VALUE_START_BIT),
      byte_order: "big",
      mux_value: pid,
    };
  }
  return {
    name: def.name,
    start_bit: OBD_VALUE_START_BIT,
    bit_length: def.bit_length,
    factor: def.factor,
    offset: def.offset,
    unit: def.unit,
    byte_order: "big",
    mux_value: pid,
  };
}

function groupById(frames: readonly Frame[]): Map<number, Frame[]> {
  const groups = new Map<number, Frame[]>();
  for (const frame of frames) {
    const group = groups.get(frame.id);
    if (group) {
      group.push(frame);
    } else {
      groups.set(frame.id, [frame]);
    }
  }
  return groups;
}

function synthesizeMessage(id: number, frames: Frame[], table: PidTable): MessageDef {
  // Adapters occasionally report a frame short; the longest one wins
  const length = Math.max(...frames.map((f) => f.dlc));
  const name = table.messageNames.get(id) ?? defaultMessageName(id);

  const isDiagnostic = frames.some(
    (f) => f.dlc >= 2 && f.data[0] === OBD_RESPONSE_MARKER && table.pids.has(f.data[1])
  );

  if (isDiagnostic) {
    const selectors = new Set<number>();
    for (const f of frames) {
      if (f.dlc >= 2 && f.data[0] === OBD_RESPONSE_MARKER) selectors.add(f.data[1]);
    }
    const signals = diagnosticHeaderSignals();
    for (const pid of [...selectors].sort((a, b) => a - b)) {
      signals.push(pidSignal(pid, table));
    }
    return { id, name, length, signals };
  }

  const signals: SignalDef[] = [];
  for (let i = 0; i < length; i++) {
    signals.push(rawByteSignal(`BYTE${i}`, i * 8));
  }
  return { id, name, length, signals };
}

/**
 * Build schema entries for every identifier in `frames` not already in
 * `existingIds`. Known identifiers are never rewritten, so merging the result
 * and synthesizing again adds nothing.
 *
 * Without a PID table nothing is treated as a diagnostic response.
 */
export function synthesizeCatalog(
  frames: readonly Frame[],
  existingIds: ReadonlySet<number>,
  table: PidTable = EMPTY_PID_TABLE
): Schema {
  const schema: Schema = new Map();
  const groups = groupById(frames);
  for (const id of [...groups.keys()].sort((a, b) => a - b)) {
    if (existingIds.has(id)) continue;
    const group = groups.get(id);
    if (!group) continue;
    schema.set(id, synthesizeMessage(id, group, table));
  }
  return schema;
}

/** Identifiers ascending */
export function sortedMessages(schema: Schema): MessageDef[] {
  return [...schema.values()].sort((a, b) => a.id - b.id);
}
