// src/catalog/decode.ts

import { createFrame, type Frame } from "../types/frame";
import type { DecodedSignal, MessageDef, Schema, SignalDef } from "../types/catalog";
import { CatalogError, errorMessage } from "../api/errors";
import { extractBits, fitsPayload } from "../utils/bits";
import { decodeSignal, encodeSignal } from "../utils/signalDecode";

/**
 * Decode a frame against a schema.
 * Reads the mux selector first and only decodes signals of the matching case.
 * Signals that do not fit the received payload are left out.
 * Returns null when the schema has no message for the frame's identifier.
 */
export function decodeFrame(schema: Schema, frame: Frame): DecodedSignal[] | null {
  const message = schema.get(frame.id);
  if (!message) return null;

  const fits = (s: SignalDef) => fitsPayload(frame.dlc, s.start_bit, s.bit_length);

  const selector = message.signals.find((s) => s.multiplexor);
  const selectorValue =
    selector && fits(selector)
      ? extractBits(frame.data, selector.start_bit, selector.bit_length, selector.byte_order)
      : undefined;

  const decoded: DecodedSignal[] = [];
  for (const signal of message.signals) {
    if (signal.mux_value !== undefined && signal.mux_value !== selectorValue) continue;
    if (!fits(signal)) continue;
    decoded.push(decodeSignal(frame.data, signal));
  }
  return decoded;
}

/** `Service=65 PID=12 EngineRPM=1726rpm` style annotation for console output */
export function formatDecoded(signals: readonly DecodedSignal[]): string {
  return signals.map((s) => `${s.signal}=${s.display}${s.unit ?? ""}`).join(" ");
}

/**
 * Build a frame for a message from physical signal values.
 * Unnamed signals stay 0. When the values belong to one mux case and no
 * selector value is given, the selector is set to that case.
 */
export function encodeFrame(
  message: MessageDef,
  values: ReadonlyMap<string, number>,
  timestamp = 0
): Frame {
  const byName = new Map(message.signals.map((s) => [s.name, s]));
  for (const name of values.keys()) {
    if (!byName.has(name)) {
      throw new CatalogError(`${message.name} has no signal "${name}"`);
    }
  }

  const selector = message.signals.find((s) => s.multiplexor);
  const cases = new Set<number>();
  for (const name of values.keys()) {
    const muxValue = byName.get(name)?.mux_value;
    if (muxValue !== undefined) cases.add(muxValue);
  }
  if (cases.size > 1) {
    throw new CatalogError(`${message.name}: signals from different mux cases (${[...cases].join(", ")})`);
  }

  const toWrite = new Map(values);
  const [activeCase] = cases;
  if (selector && activeCase !== undefined) {
    const given = toWrite.get(selector.name);
    if (given === undefined) {
      toWrite.set(selector.name, activeCase);
    } else if (given !== activeCase) {
      throw new CatalogError(`${message.name}: ${selector.name}=${given} does not select case ${activeCase}`);
    }
  }

  const bytes = new Array<number>(message.length).fill(0);
  for (const [name, value] of toWrite) {
    const signal = byName.get(name);
    if (!signal) continue;
    if (!fitsPayload(message.length, signal.start_bit, signal.bit_length)) {
      throw new CatalogError(`${message.name}: ${name} does not fit a ${message.length}-byte payload`);
    }
    try {
      encodeSignal(bytes, signal, value);
    } catch (err) {
      throw new CatalogError(`${message.name}: ${errorMessage(err)}`, { cause: err });
    }
  }
  return createFrame(timestamp, message.id, bytes.length, bytes);
}

/** Find a message by name, or by identifier written as hex (`0x7E8`) or decimal */
export function findMessage(schema: Schema, key: string): MessageDef | null {
  for (const message of schema.values()) {
    if (message.name === key) return message;
  }
  const id = /^0x[0-9a-f]+$/i.test(key) ? parseInt(key.slice(2), 16) : /^\d+$/.test(key) ? Number(key) : NaN;
  return schema.get(id) ?? null;
}
