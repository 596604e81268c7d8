// src/utils/lineParser.ts
//
// Parses one line of serial adapter text into a frame. Adapters print frames in
// a few close variants:
//
//   ID: 0x631, Data: 8 40 05 30 FF 00 40 00 00
//   ID: 0x631, DLC: 8 40 05 30 FF 00 40 00 00
//   ID: 0x631 DLC:8 Data: 40 05 30 FF 00 40 00 00
//
// Anything else (banners, "OK", partial lines) is noise and returns null.

import { CAN_EXT_ID_MAX, CAN_MAX_BYTES } from "../constants";
import { createFrame, type Frame } from "../types/frame";

const BYTES = "((?:\\s+[0-9A-Fa-f]{2})*)";

const LINE_PATTERNS: RegExp[] = [
  new RegExp(`^ID:\\s*0x([0-9A-Fa-f]+)\\s*,\\s*(?:DLC|Data):\\s*(\\d+)${BYTES}$`, "i"),
  new RegExp(`^ID:\\s*0x([0-9A-Fa-f]+)\\s+DLC:\\s*(\\d+)\\s+Data:${BYTES}$`, "i"),
];

/**
 * Parse an adapter line. Returns null when the line is not a well-formed frame:
 * unknown shape, DLC above 8, byte count different from DLC, or an identifier
 * wider than 29 bits.
 */
export function parseAdapterLine(line: string, timestamp = 0): Frame | null {
  const trimmed = line.trim();
  for (const pattern of LINE_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (!match) continue;

    const id = parseInt(match[1], 16);
    const dlc = parseInt(match[2], 10);
    if (id > CAN_EXT_ID_MAX || dlc > CAN_MAX_BYTES) return null;

    const tokens = match[3].trim() === "" ? [] : match[3].trim().split(/\s+/);
    if (tokens.length !== dlc) return null;

    return createFrame(timestamp, id, dlc, tokens.map((t) => parseInt(t, 16)));
  }
  return null;
}

/**
 * Parse a comma-separated list of hex identifiers ("631, 0x7E8").
 * Empty input yields an empty list (accept all). Throws on a malformed token.
 */
export function parseFilterIds(text: string): number[] {
  const ids: number[] = [];
  for (const raw of text.split(",")) {
    const token = raw.trim();
    if (!token) continue;
    const hex = token.replace(/^0x/i, "");
    if (!/^[0-9A-Fa-f]+$/.test(hex)) {
      throw new Error(`Invalid CAN ID "${token}"`);
    }
    const id = parseInt(hex, 16);
    if (id > CAN_EXT_ID_MAX) {
      throw new Error(`CAN ID "${token}" exceeds 29 bits`);
    }
    ids.push(id);
  }
  return ids;
}
