// src/types/catalog.ts

export type Endianness = "little" | "big";

/**
 * One signal inside a catalog message.
 * Bit numbering follows `extractBits`: little-endian counts from the LSB of byte 0,
 * big-endian counts MSB-first through the payload.
 */
export interface SignalDef {
  name: string;
  start_bit: number;
  bit_length: number;
  factor: number;
  offset: number;
  unit: string;
  byte_order: Endianness;
  /** Set on the selector signal of a multiplexed message */
  multiplexor?: boolean;
  /** Selector value this signal applies to; absent = always present */
  mux_value?: number;
}

export interface MessageDef {
  id: number;
  name: string;
  /** Byte length */
  length: number;
  signals: SignalDef[];
}

/** Identifier -> message. Iteration order is not significant; writers sort by ID. */
export type Schema = Map<number, MessageDef>;

export interface CatalogMeta {
  name: string;
  version: number;
}

// Decoded signal for display annotation
export interface DecodedSignal {
  signal: string;
  value: number;
  scaled: number;
  display: string;
  unit?: string;
}

/** Entry in the static OBD-II parameter table */
export interface PidDefinition {
  pid: number;
  /** Signal name used in catalogs (e.g., "EngineRPM") */
  name: string;
  /** Human label used in descriptions (e.g., "Engine RPM") */
  label: string;
  bit_length: number;
  factor: number;
  offset: number;
  unit: string;
  /** Decimal places when describing a value */
  precision: number;
}

export interface PidTable {
  pids: Map<number, PidDefinition>;
  /** Well-known message names keyed by identifier */
  messageNames: Map<number, string>;
}
