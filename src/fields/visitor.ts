/**
 * Field visitor protocol.
 *
 * Every header type describes its wire layout once, as a `visit` function
 * that calls the operations below in order. Encoders, the size oracle, the
 * all-default check and the decoder are all visitors, so the field order
 * cannot diverge between directions.
 *
 * Value-bearing operations return the field's value after the visit (the
 * input when encoding, the decoded value when reading); field lists assign
 * it back:
 *
 * ```typescript
 * tile.haveProjectiveTransform = visitor.bool(false, tile.haveProjectiveTransform);
 * if (visitor.conditional(tile.haveProjectiveTransform)) {
 *   visitor.visitNested(PROJECTIVE_TRANSFORM_FIELDS, tile.projectiveTransform);
 * }
 * ```
 */

import { bits, distribution, type U32Distribution } from '../core/u32-coder.js';

/**
 * Payload encodings for byte blobs.
 */
export const BytesEncoding = {
  Raw: 0,
} as const;
export type BytesEncoding = (typeof BytesEncoding)[keyof typeof BytesEncoding];

/**
 * An enum field: its distribution and the set of valid values.
 */
export interface EnumDescriptor<E extends number> {
  readonly name: string;
  readonly distribution: U32Distribution;
  readonly values: readonly E[];
  isValid(value: number): value is E;
}

export function defineEnum<E extends number>(
  name: string,
  values: Readonly<Record<string, E>>,
  dist: U32Distribution
): EnumDescriptor<E> {
  const valid: readonly E[] = Object.values(values);
  return {
    name,
    distribution: dist,
    values: valid,
    isValid(value: number): value is E {
      return valid.some((candidate) => candidate === value);
    },
  };
}

/**
 * Declarative description of one header type.
 *
 * `C` is decode-time configuration that is not part of the wire format
 * (e.g. whether a group carries alpha); headers without any use `void`.
 */
export interface HeaderFields<T extends object, C = void> {
  readonly name: string;

  /** A new instance with every field at its default. */
  create(): T;

  /** The field list, in wire order. */
  visit(visitor: FieldVisitor, header: T, context: C): void;
}

export interface FieldVisitor {
  bool(defaultValue: boolean, value: boolean): boolean;

  u32(dist: U32Distribution, defaultValue: number, value: number): number;

  u64(defaultValue: bigint, value: bigint): bigint;

  enumValue<E extends number>(descriptor: EnumDescriptor<E>, defaultValue: E, value: E): E;

  bytes(encoding: BytesEncoding, value: Uint8Array): Uint8Array;

  /** Apply a child header's field list with this visitor. */
  visitNested<T extends object>(fields: HeaderFields<T>, child: T): void;

  /**
   * Whether guarded fields are present. Guards must be fields visited
   * earlier, so the decoder has them before it needs them.
   */
  conditional(condition: boolean): boolean;

  /**
   * One bit telling whether the whole header equals its defaults.
   * Returns true when the remaining fields must not be visited.
   */
  allDefault<T extends object, C>(fields: HeaderFields<T, C>, header: T, context: C): boolean;

  /**
   * Opens the trailing extension region. `extensions` is a bitmask of the
   * extensions present; fields added later are guarded by its bits.
   */
  beginExtensions(extensions: bigint): bigint;

  /** Closes the region; the decoder skips extension bits it did not visit. */
  endExtensions(): void;

  /**
   * Sizes an array of `entry`-coded values whose length is known from
   * outside this header. The decoder returns `count` zeros, after checking
   * the remaining input can hold that many entries; encoders check the
   * length matches.
   */
  setSizeWhenReading(count: number, values: number[], entry: U32Distribution): number[];
}

/**
 * Distribution of the extension payload length, written after a non-zero
 * extensions mask.
 */
export const EXTENSION_BITS_DIST: U32Distribution = distribution(
  bits(6),
  bits(10, 64),
  bits(16, 1088),
  bits(32)
);
