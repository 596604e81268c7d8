// src/utils/bits.ts

import type { Endianness } from "../types/catalog";

/**
 * Expand a payload into a flat bit list.
 * Little-endian walks each byte LSB-first, big-endian walks MSB-first.
 */
function payloadBits(bytes: readonly number[], endianness: Endianness): number[] {
  const bits: number[] = [];
  for (const b of bytes) {
    if (endianness === "little") {
      for (let bit = 0; bit < 8; bit++) bits.push((b >> bit) & 1);
    } else {
      for (let bit = 7; bit >= 0; bit--) bits.push((b >> bit) & 1);
    }
  }
  return bits;
}

/** True when the field lies entirely inside the payload */
export function fitsPayload(byteLength: number, startBit: number, bitLength: number): boolean {
  return startBit >= 0 && bitLength > 0 && startBit + bitLength <= byteLength * 8;
}

/**
 * Extract a bitfield from a byte array.
 * Big-endian fields read MSB-first, so start bit 16 with length 16 is bytes 2..3 as a
 * big-endian word. Uses BigInt for fields wider than 32 bits.
 */
export function extractBits(
  bytes: readonly number[],
  startBit: number,
  bitLength: number,
  endianness: Endianness,
  signed = false
): number {
  if (bitLength <= 0) return 0;

  const slice = payloadBits(bytes, endianness).slice(startBit, startBit + bitLength);
  // Little-endian slices hold the LSB first
  const ordered = endianness === "little" ? [...slice].reverse() : slice;

  let value = 0n;
  for (const bit of ordered) {
    value = (value << 1n) | BigInt(bit);
  }
  if (signed) {
    const signBit = 1n << BigInt(bitLength - 1);
    if (value & signBit) {
      value -= 1n << BigInt(bitLength);
    }
  }
  return Number(value);
}

/**
 * Write an unsigned value into a bitfield, the inverse of `extractBits`.
 * The caller checks that the field fits and the value fits the field.
 */
export function insertBits(
  bytes: number[],
  startBit: number,
  bitLength: number,
  endianness: Endianness,
  value: number
): void {
  const raw = BigInt(value);
  for (let j = 0; j < bitLength; j++) {
    // Slice position j carries value bit j (little) or bit len-1-j (big)
    const valueBit = endianness === "little" ? j : bitLength - 1 - j;
    const k = startBit + j;
    const shift = endianness === "little" ? k & 7 : 7 - (k & 7);
    const mask = 1 << shift;
    const set = (raw >> BigInt(valueBit)) & 1n;
    bytes[k >> 3] = set ? bytes[k >> 3] | mask : bytes[k >> 3] & ~mask & 0xff;
  }
}
