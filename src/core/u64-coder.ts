/**
 * Variable-length encoding of unsigned 64-bit values (sizes, extension masks).
 *
 * Selector 0: value 0
 * Selector 1: 1 + 4 bits       (1..16)
 * Selector 2: 17 + 8 bits      (17..272)
 * Selector 3: 12 low bits, then groups of [1][8 bits] ended by [0];
 *             the group at shift 60 is [1][4 bits] with no terminator.
 */

import type { BitSink, BitSource } from './bit-stream.js';
import { SELECTOR_BITS } from './u32-coder.js';

export const U64_MAX = (1n << 64n) - 1n;

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

/**
 * Encoded size of `value` in bits.
 */
export function u64Cost(value: bigint): number {
  if (value === 0n) return SELECTOR_BITS;
  if (value <= 16n) return SELECTOR_BITS + 4;
  if (value <= 272n) return SELECTOR_BITS + 8;

  let cost = SELECTOR_BITS + 12;
  let rest = value >> 12n;
  let shift = 12n;
  while (rest > 0n && shift < 60n) {
    cost += 9;
    rest >>= 8n;
    shift += 8n;
  }
  // Either the 4-bit tail group or the terminating 0.
  cost += rest > 0n ? 5 : 1;
  return cost;
}

export function writeU64(sink: BitSink, value: bigint): void {
  if (value === 0n) {
    sink.writeBits(0, SELECTOR_BITS);
  } else if (value <= 16n) {
    sink.writeBits(1, SELECTOR_BITS);
    sink.writeBits(Number(value - 1n), 4);
  } else if (value <= 272n) {
    sink.writeBits(2, SELECTOR_BITS);
    sink.writeBits(Number(value - 17n), 8);
  } else {
    sink.writeBits(3, SELECTOR_BITS);
    sink.writeBits(Number(value & 0xfffn), 12);
    let rest = value >> 12n;
    let shift = 12n;
    while (rest > 0n && shift < 60n) {
      sink.writeBits(1, 1);
      sink.writeBits(Number(rest & 0xffn), 8);
      rest >>= 8n;
      shift += 8n;
    }
    if (rest > 0n) {
      // shift == 60: only 4 bits remain.
      sink.writeBits(1, 1);
      sink.writeBits(Number(rest & 0xfn), 4);
    } else {
      sink.writeBits(0, 1);
    }
  }
}

export function readU64(source: BitSource): bigint {
  const selector = source.readBits(SELECTOR_BITS);
  if (selector === 0) return 0n;
  if (selector === 1) return 1n + BigInt(source.readBits(4));
  if (selector === 2) return 17n + BigInt(source.readBits(8));

  let value = BigInt(source.readBits(12));
  let shift = 12n;
  while (source.readBits(1) === 1) {
    if (shift === 60n) {
      value |= BigInt(source.readBits(4)) << 60n;
      break;
    }
    value |= BigInt(source.readBits(8)) << shift;
    shift += 8n;
  }
  return value;
}
