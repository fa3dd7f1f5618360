import type { BitSource } from '../core/bit-stream.js';
import { minU32Cost, readU32, type U32Distribution } from '../core/u32-coder.js';
import { readU64 } from '../core/u64-coder.js';
import { HeaderError } from '../errors.js';
import { HeaderScope } from './header-scope.js';
import {
  EXTENSION_BITS_DIST,
  type BytesEncoding,
  type EnumDescriptor,
  type FieldVisitor,
  type HeaderFields,
} from './visitor.js';

interface OpenRegion {
  start: number;
  declared: number;
}

/**
 * Decode direction: every operation reads from the cursor and returns the
 * decoded value. Guards see fields decoded earlier in the same walk.
 */
export class ReadingVisitor implements FieldVisitor {
  private readonly source: BitSource;
  private readonly scope = new HeaderScope();
  private readonly open: Array<OpenRegion | null> = [];

  constructor(source: BitSource) {
    this.source = source;
  }

  visitHeader<T extends object, C>(fields: HeaderFields<T, C>, header: T, context: C): void {
    this.scope.run(fields.name, () => fields.visit(this, header, context));
  }

  bool(_defaultValue: boolean, _value: boolean): boolean {
    return this.source.readBits(1) === 1;
  }

  u32(dist: U32Distribution, _defaultValue: number, _value: number): number {
    return readU32(this.source, dist);
  }

  u64(_defaultValue: bigint, _value: bigint): bigint {
    return readU64(this.source);
  }

  enumValue<E extends number>(descriptor: EnumDescriptor<E>, _defaultValue: E, _value: E): E {
    const value = readU32(this.source, descriptor.distribution);
    if (!descriptor.isValid(value)) {
      throw new HeaderError('InvalidEnumValue', `${value} is not a valid ${descriptor.name}`);
    }
    return value;
  }

  bytes(_encoding: BytesEncoding, _value: Uint8Array): Uint8Array {
    const length = readU64(this.source);
    if (length * 8n > BigInt(this.source.remaining)) {
      throw new HeaderError(
        'TruncatedStream',
        `Byte field of ${length} bytes exceeds the ${this.source.remaining} bits left`
      );
    }
    const bytes = new Uint8Array(Number(length));
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = this.source.readBits(8);
    }
    return bytes;
  }

  visitNested<T extends object>(fields: HeaderFields<T>, child: T): void {
    this.scope.run(fields.name, () => fields.visit(this, child));
  }

  conditional(condition: boolean): boolean {
    return condition;
  }

  allDefault<T extends object, C>(fields: HeaderFields<T, C>, header: T, _context: C): boolean {
    const allDefault = this.source.readBits(1) === 1;
    if (allDefault) {
      Object.assign(header, fields.create());
    }
    return allDefault;
  }

  beginExtensions(_extensions: bigint): bigint {
    const extensions = readU64(this.source);
    if (extensions === 0n) {
      this.open.push(null);
    } else {
      const declared = readU32(this.source, EXTENSION_BITS_DIST);
      this.open.push({ start: this.source.position, declared });
    }
    return extensions;
  }

  endExtensions(): void {
    const region = this.open.pop();
    if (region === undefined) {
      throw new Error('endExtensions without matching beginExtensions');
    }
    if (region === null) return;

    const consumed = this.source.position - region.start;
    if (consumed > region.declared) {
      throw new HeaderError(
        'ExtensionLengthMismatch',
        `Read ${consumed} extension bits but only ${region.declared} were declared`
      );
    }
    // Extensions newer than this decoder.
    this.source.skipBits(region.declared - consumed);
  }

  setSizeWhenReading(count: number, _values: number[], entry: U32Distribution): number[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new HeaderError('FieldCountMismatch', `Invalid entry count ${count}`);
    }
    const needed = count * minU32Cost(entry);
    if (needed > this.source.remaining) {
      throw new HeaderError(
        'TruncatedStream',
        `${count} entries need at least ${needed} bits, only ${this.source.remaining} left`
      );
    }
    return new Array<number>(count).fill(0);
  }
}
