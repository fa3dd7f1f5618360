import { HeaderError } from '../errors.js';

/**
 * Anything that accepts bits MSB-first: the real output stream, or a counter
 * used for size measurement.
 */
export interface BitSink {
  /** Write the low `count` bits of `value` (0-32), MSB first. */
  writeBits(value: number, count: number): void;

  /** Total number of bits accepted so far. */
  readonly bitCount: number;
}

/**
 * Sequential bit source.
 */
export interface BitSource {
  /** Read `count` bits (0-32) as an unsigned number, MSB first. */
  readBits(count: number): number;

  /** Discard `count` bits. */
  skipBits(count: number): void;

  /** Current position in bits. */
  readonly position: number;

  /** Bits left before the end of the data. */
  readonly remaining: number;
}

/**
 * Bit-level output stream.
 * Accumulates bits and outputs bytes when full.
 */
export class BitOutputStream implements BitSink {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit to the stream.
   * @param bit - 0 or 1
   */
  writeBit(bit: number): void {
    this.currentByte = (this.currentByte << 1) | (bit & 1);
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write multiple bits from a number (MSB first).
   * @param value - The value containing the bits
   * @param count - Number of bits to write (0-32)
   */
  writeBits(value: number, count: number): void {
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit((value >>> i) & 1);
    }
  }

  /**
   * Write whole bytes. They are byte-aligned only if the stream is.
   */
  writeBytes(bytes: Uint8Array): void {
    if (this.bitPosition === 0) {
      for (const byte of bytes) {
        this.buffer.push(byte);
      }
      return;
    }
    for (const byte of bytes) {
      this.writeBits(byte, 8);
    }
  }

  /**
   * Pad the current byte with zeros.
   * Headers that must start on a byte boundary call this first.
   */
  flush(): void {
    if (this.bitPosition > 0) {
      this.currentByte <<= 8 - this.bitPosition;
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Get the current byte count (before flush).
   */
  get byteCount(): number {
    return this.buffer.length;
  }

  /**
   * Get the total bit count written.
   */
  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Convert the stream to a Uint8Array.
   * Call flush() first if you want to include partial bytes.
   */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer);
  }
}

/**
 * Sink that only counts, for dry runs of the encoder.
 */
export class BitCounter implements BitSink {
  private count = 0;

  writeBits(_value: number, count: number): void {
    this.count += count;
  }

  /** Account for bits written out of order (e.g. a length prefix). */
  add(count: number): void {
    this.count += count;
  }

  get bitCount(): number {
    return this.count;
  }
}

/**
 * Bit-level input stream over a Uint8Array.
 * Reading past the end is a TruncatedStream error, never zero padding.
 */
export class BitInputStream implements BitSource {
  private data: Uint8Array;
  private bytePosition: number = 0;
  private bitPosition: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read a single bit from the stream.
   */
  readBit(): number {
    if (this.bytePosition >= this.data.length) {
      throw new HeaderError(
        'TruncatedStream',
        `Read past end of stream (${this.data.length} bytes)`
      );
    }

    const bit = (this.data[this.bytePosition] >>> (7 - this.bitPosition)) & 1;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.bytePosition++;
      this.bitPosition = 0;
    }

    return bit;
  }

  /**
   * Read multiple bits as a number (MSB first).
   * @param count - Number of bits to read (0-32)
   */
  readBits(count: number): number {
    if (count > this.remaining) {
      throw new HeaderError(
        'TruncatedStream',
        `Need ${count} bits at position ${this.position}, only ${this.remaining} left`
      );
    }
    // Multiply rather than shift: 32-bit values would turn negative.
    let value = 0;
    for (let i = 0; i < count; i++) {
      value = value * 2 + this.readBit();
    }
    return value;
  }

  skipBits(count: number): void {
    if (count > this.remaining) {
      throw new HeaderError(
        'TruncatedStream',
        `Cannot skip ${count} bits at position ${this.position}, only ${this.remaining} left`
      );
    }
    const target = this.position + count;
    this.bytePosition = Math.floor(target / 8);
    this.bitPosition = target % 8;
  }

  /**
   * Skip to the start of the next byte unless already there.
   */
  jumpToByteBoundary(): void {
    if (this.bitPosition !== 0) {
      this.bytePosition++;
      this.bitPosition = 0;
    }
  }

  /**
   * Check if we've reached the end of the data.
   */
  get isAtEnd(): boolean {
    return this.bytePosition >= this.data.length;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bytePosition * 8 + this.bitPosition;
  }

  /**
   * Byte offset of the next unread byte (rounded up).
   */
  get byteOffset(): number {
    return this.bitPosition === 0 ? this.bytePosition : this.bytePosition + 1;
  }

  /**
   * Get total size in bits.
   */
  get size(): number {
    return this.data.length * 8;
  }

  get remaining(): number {
    return Math.max(0, this.size - this.position);
  }
}
