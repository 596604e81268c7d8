// src/catalog/obd.ts
//
// OBD-II mode 01 helpers. The parameter table is data (src/data/obdPids.json),
// loaded once and passed to whatever needs it.

import { readFileSync } from "node:fs";
import { z } from "zod";
import { OBD_REQUEST_ID, OBD_RESPONSE_MARKER, OBD_VALUE_START_BIT } from "../constants";
import { createFrame, formatPayloadHex, type Frame } from "../types/frame";
import type { PidDefinition, PidTable } from "../types/catalog";
import { CatalogError, errorMessage } from "../api/errors";
import { extractBits, fitsPayload } from "../utils/bits";
import { formatScaled, scaleRaw } from "../utils/signalDecode";

const PID_TABLE_URL = new URL("../data/obdPids.json", import.meta.url);

const hexId = z
  .string()
  .regex(/^0x[0-9A-Fa-f]+$/, "expected a 0x-prefixed hex string")
  .transform((s) => parseInt(s, 16));

const pidTableSchema = z.object({
  pids: z.array(
    z.object({
      pid: hexId.refine((n) => n <= 0xff, "PID must fit one byte"),
      name: z.string().min(1),
      label: z.string().min(1),
      bit_length: z.number().int().min(1).max(48),
      factor: z.number(),
      offset: z.number(),
      unit: z.string(),
      precision: z.number().int().min(0),
    })
  ),
  messages: z.array(z.object({ id: hexId, name: z.string().min(1) })).default([]),
});

/** An empty table: nothing is recognised as a diagnostic response */
export const EMPTY_PID_TABLE: PidTable = { pids: new Map(), messageNames: new Map() };

/** Validate raw JSON into a table. Throws CatalogError naming the bad field. */
export function parsePidTable(json: unknown): PidTable {
  const result = pidTableSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CatalogError(`Invalid PID table at ${issue.path.join(".")}: ${issue.message}`);
  }
  const pids = new Map<number, PidDefinition>();
  for (const def of result.data.pids) {
    pids.set(def.pid, def);
  }
  const messageNames = new Map<number, string>();
  for (const msg of result.data.messages) {
    messageNames.set(msg.id, msg.name);
  }
  return { pids, messageNames };
}

let cachedTable: PidTable | null = null;

/** Load the bundled table once; later calls return the same instance. */
export function loadPidTable(): PidTable {
  if (cachedTable) return cachedTable;
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(PID_TABLE_URL, "utf8"));
  } catch (err) {
    throw new CatalogError(`Cannot load PID table: ${errorMessage(err)}`, { cause: err });
  }
  cachedTable = parsePidTable(json);
  return cachedTable;
}

export function formatPid(pid: number): string {
  return `0x${pid.toString(16).toUpperCase().padStart(2, "0")}`;
}

/** True when the payload starts with the mode 01 response marker and carries a PID byte */
export function isObdResponse(frame: Frame): boolean {
  return frame.dlc >= 2 && frame.data[0] === OBD_RESPONSE_MARKER;
}

/**
 * Describe a mode 01 response, e.g. "Engine RPM: 1726 rpm".
 * Unknown PIDs (or a payload too short for the PID) describe the raw data bytes.
 * Returns null for anything that is not a response.
 */
export function describeObdResponse(frame: Frame, table: PidTable): string | null {
  if (!isObdResponse(frame)) return null;
  const pid = frame.data[1];
  const def = table.pids.get(pid);
  if (!def || !fitsPayload(frame.dlc, OBD_VALUE_START_BIT, def.bit_length)) {
    return `PID ${formatPid(pid)} data: ${formatPayloadHex(frame.data.slice(2))}`;
  }
  const raw = extractBits(frame.data, OBD_VALUE_START_BIT, def.bit_length, "big");
  const value = formatScaled(scaleRaw(raw, def.factor, def.offset), def.precision);
  return def.unit ? `${def.label}: ${value} ${def.unit}` : `${def.label}: ${value}`;
}

/** Functional mode 01 request for one PID: `7DF#0201PP0000000000` */
export function buildPidRequest(pid: number, timestamp = 0): Frame {
  if (!Number.isInteger(pid) || pid < 0 || pid > 0xff) {
    throw new RangeError(`Invalid PID: ${pid}`);
  }
  return createFrame(timestamp, OBD_REQUEST_ID, 8, [0x02, 0x01, pid, 0, 0, 0, 0, 0]);
}
