/**
 * Compressed encoding of unsigned 32-bit fields.
 *
 * Each field declares a distribution: either a fixed raw width, or exactly
 * four alternatives addressed by a 2-bit selector. An alternative is a literal
 * (costs nothing beyond the selector) or a stored width plus additive offset.
 * Frequent values such as geometry defaults therefore cost 2 bits while the
 * full 32-bit range stays reachable.
 */

import type { BitSink, BitSource } from './bit-stream.js';

export const U32_MAX = 0xffffffff;

/** Width of the selector written before every non-raw value. */
export const SELECTOR_BITS = 2;

export type U32Alternative =
  | { readonly kind: 'literal'; readonly value: number }
  | { readonly kind: 'stored'; readonly bits: number; readonly offset: number };

export type U32Distribution =
  | { readonly kind: 'raw'; readonly bits: number }
  | {
      readonly kind: 'select';
      readonly alternatives: readonly [
        U32Alternative,
        U32Alternative,
        U32Alternative,
        U32Alternative,
      ];
    };

/**
 * The alternative the encoder picked for a value.
 */
export interface U32Choice {
  /** Selector index, or -1 for raw distributions. */
  selector: number;
  /** Number of stored bits following the selector. */
  bits: number;
  /** Value of the stored bits (value - offset). */
  stored: number;
}

function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= U32_MAX;
}

/**
 * Literal alternative: the value itself, zero stored bits.
 */
export function val(value: number): U32Alternative {
  if (!isU32(value)) {
    throw new RangeError(`Literal ${value} is not a u32`);
  }
  return { kind: 'literal', value };
}

/**
 * Stored alternative: `count` bits added to `offset`.
 */
export function bits(count: number, offset: number = 0): U32Alternative {
  if (!Number.isInteger(count) || count < 1 || count > 32) {
    throw new RangeError(`Stored width must be 1-32 bits, got ${count}`);
  }
  if (!isU32(offset) || offset + 2 ** count - 1 > U32_MAX) {
    throw new RangeError(`Offset ${offset} + ${count} bits exceeds u32 range`);
  }
  return { kind: 'stored', bits: count, offset };
}

/**
 * Build a selector-based distribution from exactly four alternatives.
 */
export function distribution(
  a0: U32Alternative,
  a1: U32Alternative,
  a2: U32Alternative,
  a3: U32Alternative
): U32Distribution {
  return { kind: 'select', alternatives: [a0, a1, a2, a3] };
}

/**
 * Fixed-width distribution without a selector.
 */
export function rawBits(count: number): U32Distribution {
  if (!Number.isInteger(count) || count < 1 || count > 32) {
    throw new RangeError(`Raw width must be 1-32 bits, got ${count}`);
  }
  return { kind: 'raw', bits: count };
}

/**
 * Pick the cheapest alternative that represents `value` exactly.
 * Ties go to the lowest selector. Returns null if none can.
 */
export function chooseU32(dist: U32Distribution, value: number): U32Choice | null {
  if (!isU32(value)) return null;

  if (dist.kind === 'raw') {
    if (value > 2 ** dist.bits - 1) return null;
    return { selector: -1, bits: dist.bits, stored: value };
  }

  let best: U32Choice | null = null;
  for (let selector = 0; selector < dist.alternatives.length; selector++) {
    const alternative = dist.alternatives[selector];
    let candidate: U32Choice | null = null;
    if (alternative.kind === 'literal') {
      if (alternative.value === value) {
        candidate = { selector, bits: 0, stored: 0 };
      }
    } else if (
      value >= alternative.offset &&
      value - alternative.offset <= 2 ** alternative.bits - 1
    ) {
      candidate = { selector, bits: alternative.bits, stored: value - alternative.offset };
    }
    if (candidate !== null && (best === null || candidate.bits < best.bits)) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Encoded size of `value` in bits, or null if it is not representable.
 */
export function u32Cost(dist: U32Distribution, value: number): number | null {
  const choice = chooseU32(dist, value);
  if (choice === null) return null;
  return dist.kind === 'raw' ? choice.bits : SELECTOR_BITS + choice.bits;
}

/**
 * Fewest bits any value of `dist` can take.
 */
export function minU32Cost(dist: U32Distribution): number {
  if (dist.kind === 'raw') return dist.bits;
  const stored = dist.alternatives.map((alternative) =>
    alternative.kind === 'literal' ? 0 : alternative.bits
  );
  return SELECTOR_BITS + Math.min(...stored);
}

/**
 * Write a previously chosen alternative.
 */
export function writeU32Choice(sink: BitSink, choice: U32Choice): void {
  if (choice.selector >= 0) {
    sink.writeBits(choice.selector, SELECTOR_BITS);
  }
  if (choice.bits > 0) {
    sink.writeBits(choice.stored, choice.bits);
  }
}

/**
 * Read a value: selector, then the selected alternative's stored bits.
 */
export function readU32(source: BitSource, dist: U32Distribution): number {
  if (dist.kind === 'raw') {
    return source.readBits(dist.bits);
  }
  const alternative = dist.alternatives[source.readBits(SELECTOR_BITS)];
  if (alternative.kind === 'literal') {
    return alternative.value;
  }
  return alternative.offset + source.readBits(alternative.bits);
}
