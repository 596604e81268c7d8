// src/utils/signalDecode.ts

import Decimal from "decimal.js-light";
import type { DecodedSignal, SignalDef } from "../types/catalog";
import { extractBits, insertBits } from "./bits";

/**
 * Apply factor and offset to a raw value.
 * Decimal keeps results such as 0.25 * 6904 exact instead of carrying float noise.
 */
export function scaleRaw(raw: number, factor: number, offset: number): Decimal {
  return new Decimal(raw).mul(factor).add(offset);
}

/** Render a scaled value, optionally fixed to `precision` decimal places */
export function formatScaled(value: Decimal, precision?: number): string {
  if (precision === undefined) return value.toString();
  return value.toDecimalPlaces(precision).toString();
}

/**
 * Decode a single signal from a payload.
 * The caller checks that the field fits the payload.
 */
export function decodeSignal(bytes: readonly number[], def: SignalDef): DecodedSignal {
  const raw = extractBits(bytes, def.start_bit, def.bit_length, def.byte_order);
  const scaled = scaleRaw(raw, def.factor, def.offset);
  return {
    signal: def.name,
    value: raw,
    scaled: scaled.toNumber(),
    display: scaled.toString(),
    unit: def.unit || undefined,
  };
}

/**
 * Raw field value for a physical value: (value - offset) / factor, rounded to
 * the nearest step. Throws a RangeError when the result does not fit the field.
 */
export function unscaleValue(value: number, def: SignalDef): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${def.name}: ${value} is not a finite number`);
  }
  if (def.factor === 0) {
    throw new RangeError(`${def.name}: factor 0 cannot be encoded`);
  }
  const raw = new Decimal(value).minus(def.offset).div(def.factor).toDecimalPlaces(0);
  const max = new Decimal(2).pow(def.bit_length).minus(1);
  if (raw.lt(0) || raw.gt(max)) {
    throw new RangeError(`${def.name}: ${value} is outside the field range`);
  }
  return raw.toNumber();
}

/** Encode a physical value into its field of `bytes`. The caller checks the field fits. */
export function encodeSignal(bytes: number[], def: SignalDef, value: number): number {
  const raw = unscaleValue(value, def);
  insertBits(bytes, def.start_bit, def.bit_length, def.byte_order, raw);
  return raw;
}
