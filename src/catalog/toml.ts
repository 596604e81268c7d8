// src/catalog/toml.ts
//
// TOML catalog format:
//
//   [meta]
//   name = "vehicle"
//   version = 1
//
//   [frame.can."0x7E8"]
//   name = "MSG_7E8"
//   length = 8
//   signals = [...]            # unmultiplexed signals
//
//   [frame.can."0x7E8".mux]    # selector
//   name = "PID"
//   start_bit = 8
//   bit_length = 8
//
//   [frame.can."0x7E8".mux."12"]
//   signals = [...]            # signals active when the selector reads 12

import TOML from "smol-toml";
import { z } from "zod";
import type { CatalogMeta, Endianness, MessageDef, Schema, SignalDef } from "../types/catalog";
import { CatalogError, errorMessage } from "../api/errors";
import { tlog } from "../api/settings";
import { defaultMessageName, sortedMessages } from "./synthesize";

const byteOrder = z.enum(["little", "big"]);

const signalSchema = z.object({
  name: z.string().min(1),
  start_bit: z.number().int().min(0),
  bit_length: z.number().int().min(1).max(64),
  factor: z.number().default(1),
  offset: z.number().default(0),
  unit: z.string().default(""),
  byte_order: byteOrder.default("little"),
});

const muxCaseSchema = z.object({
  signals: z.array(signalSchema).default([]),
});

const muxSchema = z
  .object({
    name: z.string().default("Mux"),
    start_bit: z.number().int().min(0),
    bit_length: z.number().int().min(1).max(32).default(8),
    byte_order: byteOrder.default("little"),
  })
  .catchall(z.unknown());

const frameSchema = z.object({
  name: z.string().optional(),
  length: z.number().int().min(0).max(8).default(8),
  signals: z.array(signalSchema).default([]),
  mux: muxSchema.optional(),
});

const catalogSchema = z.object({
  meta: z
    .object({
      name: z.string().default(""),
      version: z.number().int().default(1),
    })
    .default({}),
  frame: z
    .object({
      can: z.record(z.unknown()).default({}),
    })
    .default({}),
});

export interface ParsedCatalog {
  meta: CatalogMeta;
  schema: Schema;
}

/**
 * Parse a CAN ID string (hex or decimal) to a number.
 */
export function parseCanId(id: string): number | null {
  const trimmed = id.trim();
  if (/^0x[0-9a-fA-F]+$/i.test(trimmed)) return parseInt(trimmed, 16);
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);
  return null;
}

function formatCatalogId(id: number): string {
  return `0x${id.toString(16).toUpperCase()}`;
}

function issueText(err: z.ZodError): string {
  const issue = err.issues[0];
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/** Case keys are decimal selector values */
function isMuxCaseKey(key: string): boolean {
  return /^\d+$/.test(key);
}

function parseFrameBody(id: number, key: string, body: unknown): MessageDef {
  const frame = frameSchema.safeParse(body);
  if (!frame.success) {
    throw new CatalogError(`Invalid frame ${key}: ${issueText(frame.error)}`);
  }
  const { name, length, signals, mux } = frame.data;
  const message: MessageDef = {
    id,
    name: name ?? defaultMessageName(id),
    length,
    signals: [...signals],
  };
  if (!mux) return message;

  message.signals.push({
    name: mux.name,
    start_bit: mux.start_bit,
    bit_length: mux.bit_length,
    factor: 1,
    offset: 0,
    unit: "",
    byte_order: mux.byte_order,
    multiplexor: true,
  });
  const caseKeys = Object.keys(mux)
    .filter(isMuxCaseKey)
    .sort((a, b) => Number(a) - Number(b));
  for (const caseKey of caseKeys) {
    const parsedCase = muxCaseSchema.safeParse(mux[caseKey]);
    if (!parsedCase.success) {
      throw new CatalogError(`Invalid mux case ${key}.${caseKey}: ${issueText(parsedCase.error)}`);
    }
    const muxValue = Number(caseKey);
    for (const signal of parsedCase.data.signals) {
      message.signals.push({ ...signal, mux_value: muxValue });
    }
  }
  return message;
}

/**
 * Parse catalog TOML into a schema.
 * Frame keys that are not CAN IDs are ignored; malformed frames throw CatalogError.
 */
export function parseCatalogToml(text: string): ParsedCatalog {
  let raw: unknown;
  try {
    raw = TOML.parse(text);
  } catch (err) {
    throw new CatalogError(`Invalid catalog TOML: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogError(`Invalid catalog: ${issueText(parsed.error)}`);
  }

  const schema: Schema = new Map();
  for (const [key, body] of Object.entries(parsed.data.frame.can)) {
    const id = parseCanId(key);
    if (id === null) {
      tlog.debug(`[catalog] Ignoring frame key "${key}"`);
      continue;
    }
    schema.set(id, parseFrameBody(id, key, body));
  }
  return { meta: parsed.data.meta, schema };
}

type TomlSignal = {
  name: string;
  start_bit: number;
  bit_length: number;
  factor: number;
  offset: number;
  unit: string;
  byte_order: Endianness;
};

function toTomlSignal(signal: SignalDef): TomlSignal {
  return {
    name: signal.name,
    start_bit: signal.start_bit,
    bit_length: signal.bit_length,
    factor: signal.factor,
    offset: signal.offset,
    unit: signal.unit,
    byte_order: signal.byte_order,
  };
}

type TomlFrame = {
  name: string;
  length: number;
  signals: TomlSignal[];
  mux?: Record<string, string | number | { signals: TomlSignal[] }>;
};

function toTomlFrame(message: MessageDef): TomlFrame {
  const plain = message.signals.filter((s) => !s.multiplexor && s.mux_value === undefined);
  const frame: TomlFrame = {
    name: message.name,
    length: message.length,
    signals: plain.map(toTomlSignal),
  };

  const selector = message.signals.find((s) => s.multiplexor);
  if (!selector) return frame;

  const mux: Record<string, string | number | { signals: TomlSignal[] }> = {
    name: selector.name,
    start_bit: selector.start_bit,
    bit_length: selector.bit_length,
    byte_order: selector.byte_order,
  };
  const cases = new Map<number, TomlSignal[]>();
  for (const signal of message.signals) {
    if (signal.mux_value === undefined) continue;
    const list = cases.get(signal.mux_value) ?? [];
    list.push(toTomlSignal(signal));
    cases.set(signal.mux_value, list);
  }
  for (const value of [...cases.keys()].sort((a, b) => a - b)) {
    mux[String(value)] = { signals: cases.get(value) ?? [] };
  }
  frame.mux = mux;
  return frame;
}

/**
 * Stringify with quoting fixes for TOML table headers like:
 * [frame.can.0x123] -> [frame.can."0x123"]
 */
function tomlStringify(obj: Record<string, unknown>): string {
  return TOML.stringify(obj).replace(
    /^(\[{1,2})([^\]]+)(\]{1,2})$/gm,
    (_match, open: string, path: string, close: string) => {
      const quoted = path.split(".").map((part) => {
        if (part.startsWith('"') && part.endsWith('"')) return part;
        return /^[0-9]/.test(part) ? `"${part}"` : part;
      });
      return `${open}${quoted.join(".")}${close}`;
    }
  );
}

/** Render a schema as catalog TOML, frames ordered by identifier. */
export function schemaToToml(schema: Schema, meta: CatalogMeta): string {
  const can: Record<string, TomlFrame> = {};
  for (const message of sortedMessages(schema)) {
    can[formatCatalogId(message.id)] = toTomlFrame(message);
  }
  return tomlStringify({
    meta: { name: meta.name, version: meta.version, default_frame: "can" },
    frame: { can },
  });
}
