import { describe, it, expect } from 'vitest';
import { BitInputStream, BitOutputStream } from '../src/core/bit-stream.js';
import {
  bits,
  chooseU32,
  distribution,
  minU32Cost,
  rawBits,
  readU32,
  u32Cost,
  val,
  writeU32Choice,
  type U32Distribution,
} from '../src/core/u32-coder.js';

const SMALL = distribution(val(0), val(1), bits(4, 2), bits(32));

function encode(dist: U32Distribution, values: number[]): Uint8Array {
  const out = new BitOutputStream();
  for (const value of values) {
    const choice = chooseU32(dist, value);
    if (choice === null) throw new Error(`unrepresentable ${value}`);
    writeU32Choice(out, choice);
  }
  out.flush();
  return out.toUint8Array();
}

describe('chooseU32', () => {
  it('should pick literals for free', () => {
    expect(chooseU32(SMALL, 0)).toEqual({ selector: 0, bits: 0, stored: 0 });
    expect(chooseU32(SMALL, 1)).toEqual({ selector: 1, bits: 0, stored: 0 });
    expect(u32Cost(SMALL, 1)).toBe(2);
  });

  it('should subtract the offset of stored alternatives', () => {
    expect(chooseU32(SMALL, 5)).toEqual({ selector: 2, bits: 4, stored: 3 });
    expect(chooseU32(SMALL, 17)).toEqual({ selector: 2, bits: 4, stored: 15 });
    expect(chooseU32(SMALL, 18)).toEqual({ selector: 3, bits: 32, stored: 18 });
    expect(u32Cost(SMALL, 17)).toBe(6);
    expect(u32Cost(SMALL, 18)).toBe(34);
  });

  it('should prefer the cheapest alternative, then the lowest selector', () => {
    const dist = distribution(bits(4), bits(4), val(7), bits(8));

    expect(chooseU32(dist, 7)).toEqual({ selector: 2, bits: 0, stored: 0 });
    expect(chooseU32(dist, 3)).toEqual({ selector: 0, bits: 4, stored: 3 });
    expect(chooseU32(dist, 200)).toEqual({ selector: 3, bits: 8, stored: 200 });
  });

  it('should report unrepresentable values as null', () => {
    const dist = distribution(val(1), val(2), val(3), bits(2, 4));

    expect(chooseU32(dist, 7)).toEqual({ selector: 3, bits: 2, stored: 3 });
    expect(chooseU32(dist, 8)).toBeNull();
    expect(chooseU32(dist, 0)).toBeNull();
    expect(chooseU32(dist, -1)).toBeNull();
    expect(chooseU32(dist, 1.5)).toBeNull();
    expect(u32Cost(dist, 8)).toBeNull();
  });

  it('should code raw distributions without a selector', () => {
    const dist = rawBits(8);

    expect(chooseU32(dist, 255)).toEqual({ selector: -1, bits: 8, stored: 255 });
    expect(chooseU32(dist, 256)).toBeNull();
    expect(u32Cost(dist, 0)).toBe(8);
  });
});

describe('distribution builders', () => {
  it('should reject invalid widths and offsets', () => {
    expect(() => bits(0)).toThrow(RangeError);
    expect(() => bits(33)).toThrow(RangeError);
    expect(() => bits(32, 1)).toThrow(RangeError);
    expect(() => val(-1)).toThrow(RangeError);
    expect(() => val(2 ** 32)).toThrow(RangeError);
    expect(() => rawBits(0)).toThrow(RangeError);
  });
});

describe('minU32Cost', () => {
  it('should count the selector plus the narrowest alternative', () => {
    expect(minU32Cost(SMALL)).toBe(2);
    expect(minU32Cost(distribution(bits(12), bits(14), bits(15), bits(21)))).toBe(14);
  });

  it('should use the fixed width for raw fields', () => {
    expect(minU32Cost(rawBits(8))).toBe(8);
  });
});

describe('writeU32Choice / readU32', () => {
  it('should write selector then stored bits, MSB first', () => {
    const bytes = encode(SMALL, [0, 5, 0xffffffff]);

    // 00 | 10 0011 | 11 + 32 ones, padded
    expect(Array.from(bytes)).toEqual([0x23, 0xff, 0xff, 0xff, 0xff, 0xc0]);
  });

  it('should read back what was written', () => {
    const values = [0, 1, 2, 17, 18, 1000, 0xffffffff];
    const input = new BitInputStream(encode(SMALL, values));

    expect(values.map(() => readU32(input, SMALL))).toEqual(values);
  });

  it('should read raw fields', () => {
    const input = new BitInputStream(encode(rawBits(12), [0xabc]));
    expect(readU32(input, rawBits(12))).toBe(0xabc);
  });
});
