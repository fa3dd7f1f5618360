import type { BitSink, BitSource } from '../core/bit-stream.js';
import { rawBits } from '../core/u32-coder.js';
import { canEncode, readHeader, writeHeader, type SizeReport } from '../fields/codec.js';
import type { HeaderFields } from '../fields/visitor.js';
import { HeaderError } from '../errors.js';
import { NUM_PROJECTIVE_TRANSFORM_PARAMS } from './constants.js';

export interface ProjectiveTransformParams {
  /** Corner coordinates, 8 bits each. */
  cornerCoords: number[];
}

export interface TileHeader {
  haveProjectiveTransform: boolean;
  /** Only on the wire if haveProjectiveTransform. */
  projectiveTransform: ProjectiveTransformParams;
  extensions: bigint;
}

const CORNER_DIST = rawBits(8);

export const PROJECTIVE_TRANSFORM_FIELDS: HeaderFields<ProjectiveTransformParams> = {
  name: 'ProjectiveTransformParams',

  create() {
    return { cornerCoords: new Array<number>(NUM_PROJECTIVE_TRANSFORM_PARAMS).fill(1) };
  },

  visit(visitor, params) {
    if (params.cornerCoords.length !== NUM_PROJECTIVE_TRANSFORM_PARAMS) {
      throw new HeaderError(
        'FieldCountMismatch',
        `Expected ${NUM_PROJECTIVE_TRANSFORM_PARAMS} corner coordinates, got ${params.cornerCoords.length}`
      );
    }
    for (let i = 0; i < NUM_PROJECTIVE_TRANSFORM_PARAMS; i++) {
      params.cornerCoords[i] = visitor.u32(CORNER_DIST, 1, params.cornerCoords[i]);
    }
  },
};

export function createTileHeader(): TileHeader {
  return {
    haveProjectiveTransform: false,
    projectiveTransform: PROJECTIVE_TRANSFORM_FIELDS.create(),
    extensions: 0n,
  };
}

export const TILE_HEADER_FIELDS: HeaderFields<TileHeader> = {
  name: 'TileHeader',
  create: createTileHeader,

  visit(visitor, tile, context) {
    if (visitor.allDefault(TILE_HEADER_FIELDS, tile, context)) return;

    tile.haveProjectiveTransform = visitor.bool(false, tile.haveProjectiveTransform);
    if (visitor.conditional(tile.haveProjectiveTransform)) {
      visitor.visitNested(PROJECTIVE_TRANSFORM_FIELDS, tile.projectiveTransform);
    }

    tile.extensions = visitor.beginExtensions(tile.extensions);
    // Extensions: in the order they were added to the format.
    visitor.endExtensions();
  },
};

export function canEncodeTileHeader(tile: TileHeader): SizeReport {
  return canEncode(TILE_HEADER_FIELDS, tile, undefined);
}

export function writeTileHeader(tile: TileHeader, size: SizeReport, sink: BitSink): void {
  writeHeader(TILE_HEADER_FIELDS, tile, size, sink, undefined);
}

export function readTileHeader(source: BitSource): TileHeader {
  return readHeader(TILE_HEADER_FIELDS, source, undefined);
}
