/**
 * Generic entry points: size check, write and read for any header type.
 *
 * ```typescript
 * const size = canEncode(TILE_HEADER_FIELDS, tile, undefined);
 * const out = new BitOutputStream();
 * writeHeader(TILE_HEADER_FIELDS, tile, size, out, undefined);
 * ```
 */

import { BitOutputStream, type BitSink, type BitSource } from '../core/bit-stream.js';
import { MeasuringVisitor, WritingVisitor } from './encoding-visitor.js';
import { ReadingVisitor } from './reading-visitor.js';
import type { HeaderFields } from './visitor.js';

/**
 * Result of the size/validity oracle.
 */
export interface SizeReport {
  /** Exact number of bits the header encodes to. */
  totalBits: number;

  /** Payload bits of the header's extension region(s), nested regions excluded. */
  extensionBits: number;

  /** Payload bits of every non-empty extension region, in the order they begin. */
  extensionRegions: readonly number[];
}

/**
 * Measure a header without writing it. Throws a HeaderError if any field
 * cannot be represented, so call this before sizing output buffers.
 */
export function canEncode<T extends object, C>(
  fields: HeaderFields<T, C>,
  header: T,
  context: C
): SizeReport {
  const visitor = new MeasuringVisitor();
  visitor.visitHeader(fields, header, context);
  return {
    totalBits: visitor.bitCount,
    extensionBits: visitor.extensionBits,
    extensionRegions: [...visitor.extensionRegions],
  };
}

/**
 * Write a header measured by `canEncode`. The header must not change in
 * between.
 */
export function writeHeader<T extends object, C>(
  fields: HeaderFields<T, C>,
  header: T,
  size: SizeReport,
  sink: BitSink,
  context: C
): void {
  const start = sink.bitCount;
  new WritingVisitor(sink, size.extensionRegions).visitHeader(fields, header, context);

  const written = sink.bitCount - start;
  if (written !== size.totalBits) {
    throw new Error(
      `${fields.name} changed after canEncode: wrote ${written} bits, expected ${size.totalBits}`
    );
  }
}

/**
 * Decode a header. The result starts from defaults and is only returned if
 * every field decoded.
 */
export function readHeader<T extends object, C>(
  fields: HeaderFields<T, C>,
  source: BitSource,
  context: C
): T {
  const header = fields.create();
  new ReadingVisitor(source).visitHeader(fields, header, context);
  return header;
}

/**
 * Measure and write a header on its own, padded to a whole byte.
 */
export function encodeHeader<T extends object, C>(
  fields: HeaderFields<T, C>,
  header: T,
  context: C
): Uint8Array {
  const size = canEncode(fields, header, context);
  const out = new BitOutputStream();
  writeHeader(fields, header, size, out, context);
  out.flush();
  return out.toUint8Array();
}
