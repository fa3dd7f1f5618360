import type { BitSink, BitSource } from '../core/bit-stream.js';
import { bits, distribution, rawBits, val } from '../core/u32-coder.js';
import { HeaderError } from '../errors.js';
import { canEncode, readHeader, writeHeader, type SizeReport } from '../fields/codec.js';
import type { HeaderFields } from '../fields/visitor.js';
import { FILE_SIGNATURE, numGroups } from './constants.js';
import { METADATA_FIELDS, createMetadata, type Metadata } from './metadata.js';

/**
 * Descriptor of an embedded low-resolution preview.
 */
export interface Preview {
  sizeBits: number;
  xsize: number;
  ysize: number;
}

export interface Animation {
  /** 0 repeats forever. */
  numLoops: number;
  /** Seconds per tick, as a fraction. */
  ticksNumerator: number;
  /** At least 1. */
  ticksDenominator: number;
}

/**
 * Top-level header, followed by an unbounded sequence of pass headers and
 * their payloads.
 */
export interface FileHeader {
  signature: number;
  /** Stored minus one: saves bits at 8K and makes a zero size unencodable. */
  xsizeMinus1: number;
  ysizeMinus1: number;
  metadata: Metadata;
  preview: Preview;
  animation: Animation;
  extensions: bigint;
}

const SIGNATURE_DIST = rawBits(32);
// Almost all camera images are below 8K x 8K; the full 32-bit range is kept.
const DIMENSION_DIST = distribution(bits(9), bits(11), bits(13), bits(32));

const PREVIEW_SIZE_DIST = distribution(bits(12), bits(16), bits(20), bits(28));
const PREVIEW_DIMENSION_DIST = distribution(bits(7), bits(9), bits(11), bits(13));

const NUM_LOOPS_DIST = distribution(val(0), bits(3), bits(16), bits(32));
const TICKS_DIST = distribution(val(1), bits(9), bits(20), bits(32));

export const PREVIEW_FIELDS: HeaderFields<Preview> = {
  name: 'Preview',

  create() {
    return { sizeBits: 0, xsize: 0, ysize: 0 };
  },

  visit(visitor, preview, context) {
    if (visitor.allDefault(PREVIEW_FIELDS, preview, context)) return;

    preview.sizeBits = visitor.u32(PREVIEW_SIZE_DIST, 0, preview.sizeBits);
    preview.xsize = visitor.u32(PREVIEW_DIMENSION_DIST, 0, preview.xsize);
    preview.ysize = visitor.u32(PREVIEW_DIMENSION_DIST, 0, preview.ysize);
  },
};

export const ANIMATION_FIELDS: HeaderFields<Animation> = {
  name: 'Animation',

  create() {
    return { numLoops: 0, ticksNumerator: 0, ticksDenominator: 1 };
  },

  visit(visitor, animation, context) {
    if (visitor.allDefault(ANIMATION_FIELDS, animation, context)) return;

    animation.numLoops = visitor.u32(NUM_LOOPS_DIST, 0, animation.numLoops);
    animation.ticksNumerator = visitor.u32(TICKS_DIST, 0, animation.ticksNumerator);
    animation.ticksDenominator = visitor.u32(TICKS_DIST, 1, animation.ticksDenominator);
  },
};

export function createFileHeader(): FileHeader {
  return {
    signature: FILE_SIGNATURE,
    xsizeMinus1: 0,
    ysizeMinus1: 0,
    metadata: createMetadata(),
    preview: PREVIEW_FIELDS.create(),
    animation: ANIMATION_FIELDS.create(),
    extensions: 0n,
  };
}

export const FILE_HEADER_FIELDS: HeaderFields<FileHeader> = {
  name: 'FileHeader',
  create: createFileHeader,

  visit(visitor, file) {
    file.signature = visitor.u32(SIGNATURE_DIST, FILE_SIGNATURE, file.signature);
    if (file.signature !== FILE_SIGNATURE) {
      throw new HeaderError(
        'FormatSignatureMismatch',
        `Signature 0x${file.signature.toString(16).padStart(8, '0')} does not match`
      );
    }

    file.xsizeMinus1 = visitor.u32(DIMENSION_DIST, 0, file.xsizeMinus1);
    file.ysizeMinus1 = visitor.u32(DIMENSION_DIST, 0, file.ysizeMinus1);

    visitor.visitNested(METADATA_FIELDS, file.metadata);
    visitor.visitNested(PREVIEW_FIELDS, file.preview);
    visitor.visitNested(ANIMATION_FIELDS, file.animation);

    file.extensions = visitor.beginExtensions(file.extensions);
    // Extensions: in the order they were added to the format.
    visitor.endExtensions();
  },
};

export function imageWidth(file: FileHeader): number {
  return file.xsizeMinus1 + 1;
}

export function imageHeight(file: FileHeader): number {
  return file.ysizeMinus1 + 1;
}

/**
 * Number of groups, i.e. the table-of-contents length of every pass.
 */
export function fileNumGroups(file: FileHeader): number {
  return numGroups(imageWidth(file), imageHeight(file));
}

/**
 * What an input adapter knows about an image before it is encoded.
 */
export interface ImageDescriptor {
  width: number;
  height: number;
  metadata: Metadata;
}

/**
 * Build the FileHeader for an image; preview and animation stay default.
 */
export function fileHeaderFromImage(image: ImageDescriptor): FileHeader {
  if (!Number.isInteger(image.width) || image.width < 1) {
    throw new RangeError(`Invalid image width ${image.width}`);
  }
  if (!Number.isInteger(image.height) || image.height < 1) {
    throw new RangeError(`Invalid image height ${image.height}`);
  }
  const file = createFileHeader();
  file.xsizeMinus1 = image.width - 1;
  file.ysizeMinus1 = image.height - 1;
  file.metadata = image.metadata;
  return file;
}

export function canEncodeFileHeader(file: FileHeader): SizeReport {
  return canEncode(FILE_HEADER_FIELDS, file, undefined);
}

export function writeFileHeader(file: FileHeader, size: SizeReport, sink: BitSink): void {
  writeHeader(FILE_HEADER_FIELDS, file, size, sink, undefined);
}

/**
 * Throws HeaderError 'FormatSignatureMismatch' when the data is not this
 * format; no other field is read in that case.
 */
export function readFileHeader(source: BitSource): FileHeader {
  return readHeader(FILE_HEADER_FIELDS, source, undefined);
}
