import type { U32Distribution } from '../core/u32-coder.js';
import type { BytesEncoding, EnumDescriptor, FieldVisitor, HeaderFields } from './visitor.js';

/**
 * Compares every visited field with its default, without reading or writing
 * anything. Fields behind a false guard are not on the wire and not compared.
 */
export class AllDefaultVisitor implements FieldVisitor {
  private allDefaults = true;

  static check<T extends object, C>(fields: HeaderFields<T, C>, header: T, context: C): boolean {
    const visitor = new AllDefaultVisitor();
    fields.visit(visitor, header, context);
    return visitor.allDefaults;
  }

  bool(defaultValue: boolean, value: boolean): boolean {
    if (value !== defaultValue) this.allDefaults = false;
    return value;
  }

  u32(_dist: U32Distribution, defaultValue: number, value: number): number {
    if (value !== defaultValue) this.allDefaults = false;
    return value;
  }

  u64(defaultValue: bigint, value: bigint): bigint {
    if (value !== defaultValue) this.allDefaults = false;
    return value;
  }

  enumValue<E extends number>(_descriptor: EnumDescriptor<E>, defaultValue: E, value: E): E {
    if (value !== defaultValue) this.allDefaults = false;
    return value;
  }

  bytes(_encoding: BytesEncoding, value: Uint8Array): Uint8Array {
    if (value.length !== 0) this.allDefaults = false;
    return value;
  }

  visitNested<T extends object>(fields: HeaderFields<T>, child: T): void {
    fields.visit(this, child);
  }

  conditional(condition: boolean): boolean {
    return condition;
  }

  // Nested headers must be compared field by field, never short-circuited.
  allDefault<T extends object, C>(_fields: HeaderFields<T, C>, _header: T, _context: C): boolean {
    return false;
  }

  beginExtensions(extensions: bigint): bigint {
    if (extensions !== 0n) this.allDefaults = false;
    return extensions;
  }

  endExtensions(): void {}

  setSizeWhenReading(_count: number, values: number[], _entry: U32Distribution): number[] {
    return values;
  }
}
