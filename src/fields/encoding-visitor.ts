import { BitCounter, type BitSink } from '../core/bit-stream.js';
import {
  chooseU32,
  u32Cost,
  writeU32Choice,
  type U32Distribution,
} from '../core/u32-coder.js';
import { isU64, writeU64 } from '../core/u64-coder.js';
import { HeaderError } from '../errors.js';
import { AllDefaultVisitor } from './all-default-visitor.js';
import { HeaderScope } from './header-scope.js';
import {
  EXTENSION_BITS_DIST,
  type BytesEncoding,
  type EnumDescriptor,
  type FieldVisitor,
  type HeaderFields,
} from './visitor.js';

/**
 * Encode direction shared by measurement and writing: values are validated
 * and emitted into a sink. Only the extension region differs, because the
 * payload length precedes the payload.
 */
export abstract class EncodingVisitor implements FieldVisitor {
  protected readonly sink: BitSink;
  private readonly scope = new HeaderScope();

  constructor(sink: BitSink) {
    this.sink = sink;
  }

  /** Run a top-level header's field list. */
  visitHeader<T extends object, C>(fields: HeaderFields<T, C>, header: T, context: C): void {
    this.scope.run(fields.name, () => fields.visit(this, header, context));
  }

  bool(_defaultValue: boolean, value: boolean): boolean {
    this.sink.writeBits(value ? 1 : 0, 1);
    return value;
  }

  u32(dist: U32Distribution, _defaultValue: number, value: number): number {
    this.writeU32(dist, value, 'Field');
    return value;
  }

  u64(_defaultValue: bigint, value: bigint): bigint {
    this.writeU64(value);
    return value;
  }

  enumValue<E extends number>(descriptor: EnumDescriptor<E>, _defaultValue: E, value: E): E {
    if (!descriptor.isValid(value)) {
      throw new HeaderError(
        'UnrepresentableFieldValue',
        `${value} is not a valid ${descriptor.name}`
      );
    }
    this.writeU32(descriptor.distribution, value, descriptor.name);
    return value;
  }

  bytes(_encoding: BytesEncoding, value: Uint8Array): Uint8Array {
    writeU64(this.sink, BigInt(value.length));
    for (const byte of value) {
      this.sink.writeBits(byte, 8);
    }
    return value;
  }

  visitNested<T extends object>(fields: HeaderFields<T>, child: T): void {
    this.scope.run(fields.name, () => fields.visit(this, child));
  }

  conditional(condition: boolean): boolean {
    return condition;
  }

  allDefault<T extends object, C>(fields: HeaderFields<T, C>, header: T, context: C): boolean {
    const allDefault = AllDefaultVisitor.check(fields, header, context);
    this.sink.writeBits(allDefault ? 1 : 0, 1);
    return allDefault;
  }

  abstract beginExtensions(extensions: bigint): bigint;

  abstract endExtensions(): void;

  setSizeWhenReading(count: number, values: number[], _entry: U32Distribution): number[] {
    if (values.length !== count) {
      throw new HeaderError(
        'FieldCountMismatch',
        `Expected ${count} entries, got ${values.length}`
      );
    }
    return values;
  }

  protected writeU32(dist: U32Distribution, value: number, what: string): void {
    const choice = chooseU32(dist, value);
    if (choice === null) {
      throw new HeaderError(
        'UnrepresentableFieldValue',
        `${what} value ${value} has no representation in its distribution`
      );
    }
    writeU32Choice(this.sink, choice);
  }

  protected writeU64(value: bigint): void {
    if (!isU64(value)) {
      throw new HeaderError('UnrepresentableFieldValue', `${value} is not a u64`);
    }
    writeU64(this.sink, value);
  }
}

interface MeasuredRegion {
  index: number;
  start: number;
  outermost: boolean;
}

/**
 * Dry run of the encoder: counts bits, validates every value and records the
 * payload length of each non-empty extension region.
 */
export class MeasuringVisitor extends EncodingVisitor {
  private readonly counter: BitCounter;
  private readonly open: Array<MeasuredRegion | null> = [];

  /** Payload bits of each non-empty region, in the order regions begin. */
  readonly extensionRegions: number[] = [];

  /** Payload bits of regions not nested in another non-empty region. */
  extensionBits = 0;

  constructor(counter: BitCounter = new BitCounter()) {
    super(counter);
    this.counter = counter;
  }

  get bitCount(): number {
    return this.counter.bitCount;
  }

  beginExtensions(extensions: bigint): bigint {
    this.writeU64(extensions);
    if (extensions === 0n) {
      this.open.push(null);
      return extensions;
    }
    const outermost = this.open.every((region) => region === null);
    this.open.push({
      index: this.extensionRegions.length,
      start: this.counter.bitCount,
      outermost,
    });
    this.extensionRegions.push(0);
    return extensions;
  }

  endExtensions(): void {
    const region = this.open.pop();
    if (region === undefined) {
      throw new Error('endExtensions without matching beginExtensions');
    }
    if (region === null) return;

    const payload = this.counter.bitCount - region.start;
    this.extensionRegions[region.index] = payload;
    if (region.outermost) {
      this.extensionBits += payload;
    }
    // The length prefix is written before the payload; count it now.
    const lengthBits = u32Cost(EXTENSION_BITS_DIST, payload);
    if (lengthBits === null) {
      throw new HeaderError(
        'UnrepresentableFieldValue',
        `Extension payload of ${payload} bits is too large`
      );
    }
    this.counter.add(lengthBits);
  }
}

interface WrittenRegion {
  start: number;
  planned: number;
}

/**
 * Writes a header using the extension plan from a preceding measurement.
 */
export class WritingVisitor extends EncodingVisitor {
  private readonly plan: readonly number[];
  private nextRegion = 0;
  private readonly open: Array<WrittenRegion | null> = [];

  constructor(sink: BitSink, extensionRegions: readonly number[]) {
    super(sink);
    this.plan = extensionRegions;
  }

  beginExtensions(extensions: bigint): bigint {
    this.writeU64(extensions);
    if (extensions === 0n) {
      this.open.push(null);
      return extensions;
    }
    if (this.nextRegion >= this.plan.length) {
      throw new HeaderError(
        'ExtensionLengthMismatch',
        'Extension region was not measured before writing'
      );
    }
    const planned = this.plan[this.nextRegion++];
    this.writeU32(EXTENSION_BITS_DIST, planned, 'Extension length');
    this.open.push({ start: this.sink.bitCount, planned });
    return extensions;
  }

  endExtensions(): void {
    const region = this.open.pop();
    if (region === undefined) {
      throw new Error('endExtensions without matching beginExtensions');
    }
    if (region === null) return;

    const written = this.sink.bitCount - region.start;
    if (written !== region.planned) {
      throw new HeaderError(
        'ExtensionLengthMismatch',
        `Wrote ${written} extension bits, measured ${region.planned}`
      );
    }
  }
}
