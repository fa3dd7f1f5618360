import type { BitSink, BitSource } from '../core/bit-stream.js';
import { distribution, val } from '../core/u32-coder.js';
import { HeaderError } from '../errors.js';
import { canEncode, readHeader, writeHeader, type SizeReport } from '../fields/codec.js';
import { BytesEncoding, type HeaderFields } from '../fields/visitor.js';
import { NUM_TILES_PER_GROUP } from './constants.js';
import { TILE_HEADER_FIELDS, createTileHeader, type TileHeader } from './tile-header.js';

/**
 * Losslessly compressed alpha channel of one group.
 */
export interface Alpha {
  bytesPerAlpha: number;
  encoded: Uint8Array;
}

export interface GroupHeader {
  /** Only on the wire if the group's context says it has alpha. */
  alpha: Alpha;
  /** Always NUM_TILES_PER_GROUP entries. */
  tileHeaders: TileHeader[];
  extensions: bigint;
}

/**
 * Not serialized: whether the group carries alpha is known from the pass.
 */
export interface GroupHeaderContext {
  haveAlpha: boolean;
}

export const DEFAULT_GROUP_HEADER_CONTEXT: GroupHeaderContext = { haveAlpha: false };

const BYTES_PER_ALPHA_DIST = distribution(val(0), val(1), val(2), val(4));

export const ALPHA_FIELDS: HeaderFields<Alpha> = {
  name: 'Alpha',

  create() {
    return { bytesPerAlpha: 1, encoded: new Uint8Array(0) };
  },

  visit(visitor, alpha) {
    alpha.bytesPerAlpha = visitor.u32(BYTES_PER_ALPHA_DIST, 1, alpha.bytesPerAlpha);
    alpha.encoded = visitor.bytes(BytesEncoding.Raw, alpha.encoded);
  },
};

export function createGroupHeader(): GroupHeader {
  return {
    alpha: ALPHA_FIELDS.create(),
    tileHeaders: Array.from({ length: NUM_TILES_PER_GROUP }, createTileHeader),
    extensions: 0n,
  };
}

export const GROUP_HEADER_FIELDS: HeaderFields<GroupHeader, GroupHeaderContext> = {
  name: 'GroupHeader',
  create: createGroupHeader,

  visit(visitor, group, context) {
    if (visitor.allDefault(GROUP_HEADER_FIELDS, group, context)) return;

    if (visitor.conditional(context.haveAlpha)) {
      visitor.visitNested(ALPHA_FIELDS, group.alpha);
    }

    if (group.tileHeaders.length !== NUM_TILES_PER_GROUP) {
      throw new HeaderError(
        'FieldCountMismatch',
        `Expected ${NUM_TILES_PER_GROUP} tile headers, got ${group.tileHeaders.length}`
      );
    }
    for (const tile of group.tileHeaders) {
      visitor.visitNested(TILE_HEADER_FIELDS, tile);
    }

    group.extensions = visitor.beginExtensions(group.extensions);
    // Extensions: in the order they were added to the format.
    visitor.endExtensions();
  },
};

export function canEncodeGroupHeader(
  group: GroupHeader,
  context: GroupHeaderContext = DEFAULT_GROUP_HEADER_CONTEXT
): SizeReport {
  return canEncode(GROUP_HEADER_FIELDS, group, context);
}

export function writeGroupHeader(
  group: GroupHeader,
  size: SizeReport,
  sink: BitSink,
  context: GroupHeaderContext = DEFAULT_GROUP_HEADER_CONTEXT
): void {
  writeHeader(GROUP_HEADER_FIELDS, group, size, sink, context);
}

export function readGroupHeader(
  source: BitSource,
  context: GroupHeaderContext = DEFAULT_GROUP_HEADER_CONTEXT
): GroupHeader {
  return readHeader(GROUP_HEADER_FIELDS, source, context);
}
