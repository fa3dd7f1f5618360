import { describe, it, expect } from 'vitest';
import { BitOutputStream, BitInputStream, BitCounter } from '../src/core/bit-stream.js';
import { HeaderError } from '../src/errors.js';

describe('BitOutputStream', () => {
  it('should write and flush single bits correctly', () => {
    const stream = new BitOutputStream();

    // Write 8 bits: 10110100
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(0);

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b10110100);
  });

  it('should handle partial bytes with flush', () => {
    const stream = new BitOutputStream();

    // Write 5 bits: 10110
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);
    stream.writeBit(1);
    stream.writeBit(0);
    stream.flush();

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b10110000); // Padded with zeros
  });

  it('should write multiple bytes', () => {
    const stream = new BitOutputStream();

    // Write 16 bits
    for (let i = 0; i < 16; i++) {
      stream.writeBit(i % 2);
    }

    const result = stream.toUint8Array();
    expect(result.length).toBe(2);
    expect(result[0]).toBe(0b01010101);
    expect(result[1]).toBe(0b01010101);
  });

  it('should write multiple bits at once', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0b11010, 5);
    stream.writeBits(0b101, 3);

    const result = stream.toUint8Array();
    expect(result.length).toBe(1);
    expect(result[0]).toBe(0b11010101);
  });

  it('should track bit count correctly', () => {
    const stream = new BitOutputStream();
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);

    expect(stream.bitCount).toBe(3);
    expect(stream.byteCount).toBe(0);

    stream.writeBits(0, 5);
    expect(stream.bitCount).toBe(8);
    expect(stream.byteCount).toBe(1);
  });

  it('should write whole bytes aligned and unaligned', () => {
    const aligned = new BitOutputStream();
    aligned.writeBytes(new Uint8Array([0x12, 0x34]));
    expect(Array.from(aligned.toUint8Array())).toEqual([0x12, 0x34]);

    const shifted = new BitOutputStream();
    shifted.writeBits(0b1111, 4);
    shifted.writeBytes(new Uint8Array([0x12, 0x34]));
    shifted.flush();
    expect(Array.from(shifted.toUint8Array())).toEqual([0xf1, 0x23, 0x40]);
  });

  it('should write 32-bit values', () => {
    const stream = new BitOutputStream();
    stream.writeBits(0x0a4d4cd7, 32);
    expect(Array.from(stream.toUint8Array())).toEqual([0x0a, 0x4d, 0x4c, 0xd7]);
  });
});

describe('BitCounter', () => {
  it('should count without storing', () => {
    const counter = new BitCounter();
    counter.writeBits(0xffff, 16);
    counter.writeBits(1, 3);
    counter.add(5);

    expect(counter.bitCount).toBe(24);
  });
});

describe('BitInputStream', () => {
  it('should read single bits correctly', () => {
    const data = new Uint8Array([0b10110100]);
    const stream = new BitInputStream(data);

    expect(stream.readBit()).toBe(1);
    expect(stream.readBit()).toBe(0);
    expect(stream.readBit()).toBe(1);
    expect(stream.readBit()).toBe(1);
    expect(stream.readBit()).toBe(0);
    expect(stream.readBit()).toBe(1);
    expect(stream.readBit()).toBe(0);
    expect(stream.readBit()).toBe(0);
  });

  it('should read multiple bytes', () => {
    const data = new Uint8Array([0xff, 0x00]);
    const stream = new BitInputStream(data);

    for (let i = 0; i < 8; i++) {
      expect(stream.readBit()).toBe(1);
    }
    for (let i = 0; i < 8; i++) {
      expect(stream.readBit()).toBe(0);
    }
  });

  it('should fail when reading past the end', () => {
    const data = new Uint8Array([0xff]);
    const stream = new BitInputStream(data);

    for (let i = 0; i < 8; i++) {
      stream.readBit();
    }

    expect(() => stream.readBit()).toThrow(HeaderError);
    expect(stream.isAtEnd).toBe(true);
  });

  it('should not consume bits when a multi-bit read is too long', () => {
    const stream = new BitInputStream(new Uint8Array([0xab]));
    stream.readBits(3);

    let error: unknown;
    try {
      stream.readBits(6);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(HeaderError);
    expect(error instanceof HeaderError && error.code).toBe('TruncatedStream');
    expect(stream.position).toBe(3);
    expect(stream.readBits(5)).toBe(0b01011);
  });

  it('should read full 32-bit values as unsigned', () => {
    const stream = new BitInputStream(new Uint8Array([0xff, 0xff, 0xff, 0xfe]));
    expect(stream.readBits(32)).toBe(0xfffffffe);
  });

  it('should skip bits and report byte offsets', () => {
    const stream = new BitInputStream(new Uint8Array([0x00, 0x0f, 0xf0]));

    stream.skipBits(12);
    expect(stream.position).toBe(12);
    expect(stream.byteOffset).toBe(2);
    expect(stream.remaining).toBe(12);
    expect(stream.readBits(8)).toBe(0xff);

    stream.jumpToByteBoundary();
    expect(stream.position).toBe(24);
    expect(() => stream.skipBits(1)).toThrow(HeaderError);
  });

  it('should read multiple bits at once', () => {
    const data = new Uint8Array([0b11010101]);
    const stream = new BitInputStream(data);

    expect(stream.readBits(5)).toBe(0b11010);
    expect(stream.readBits(3)).toBe(0b101);
  });

  it('should track position correctly', () => {
    const data = new Uint8Array([0xff, 0x00]);
    const stream = new BitInputStream(data);

    expect(stream.position).toBe(0);
    expect(stream.size).toBe(16);

    stream.readBit();
    expect(stream.position).toBe(1);

    stream.readBits(7);
    expect(stream.position).toBe(8);
  });
});

describe('BitStream roundtrip', () => {
  it('should preserve data through write/read cycle', () => {
    const outStream = new BitOutputStream();
    const testData = [1, 0, 1, 1, 0, 0, 1, 0, 1, 1, 1, 0];

    for (const bit of testData) {
      outStream.writeBit(bit);
    }
    outStream.flush();

    const inStream = new BitInputStream(outStream.toUint8Array());
    const result: number[] = [];

    for (let i = 0; i < testData.length; i++) {
      result.push(inStream.readBit());
    }

    expect(result).toEqual(testData);
  });

  it('should handle large sequences', () => {
    const outStream = new BitOutputStream();
    const testData: number[] = [];

    for (let i = 0; i < 1000; i++) {
      const bit = (i * 7 + (i >> 3)) % 3 === 0 ? 1 : 0;
      testData.push(bit);
      outStream.writeBit(bit);
    }
    outStream.flush();

    const inStream = new BitInputStream(outStream.toUint8Array());
    const result: number[] = [];

    for (let i = 0; i < testData.length; i++) {
      result.push(inStream.readBit());
    }

    expect(result).toEqual(testData);
  });
});
