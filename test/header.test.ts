import { describe, it, expect } from 'vitest';
import { BitInputStream, BitOutputStream } from '../src/core/bit-stream.js';
import { HeaderError, isFormatMismatch } from '../src/errors.js';
import { encodeHeader } from '../src/fields/codec.js';
import { TransferFunction } from '../src/format/color-encoding.js';
import { FILE_SIGNATURE, NUM_TILES_PER_GROUP, numGroups } from '../src/format/constants.js';
import {
  FILE_HEADER_FIELDS,
  canEncodeFileHeader,
  createFileHeader,
  fileHeaderFromImage,
  fileNumGroups,
  imageHeight,
  imageWidth,
  readFileHeader,
  writeFileHeader,
} from '../src/format/file-header.js';
import {
  canEncodeGroupHeader,
  createGroupHeader,
  readGroupHeader,
  writeGroupHeader,
} from '../src/format/group-header.js';
import { createMetadata } from '../src/format/metadata.js';
import {
  GaborishStrength,
  ImageEncoding,
  PASS_HEADER_FIELDS,
  PassFlags,
  canEncodePassHeader,
  createPassHeader,
  readPassHeader,
  writePassHeader,
} from '../src/format/pass-header.js';
import {
  canEncodeTileHeader,
  createTileHeader,
  readTileHeader,
  writeTileHeader,
} from '../src/format/tile-header.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

function codeOf(error: unknown): string | undefined {
  return error instanceof HeaderError ? error.code : undefined;
}

describe('TileHeader', () => {
  it('should encode a default tile as one bit', () => {
    const tile = createTileHeader();
    const size = canEncodeTileHeader(tile);
    expect(size.totalBits).toBe(1);

    const out = new BitOutputStream();
    writeTileHeader(tile, size, out);
    out.flush();
    expect(Array.from(out.toUint8Array())).toEqual([0x80]);
  });

  it('should round-trip a projective transform', () => {
    const tile = createTileHeader();
    tile.haveProjectiveTransform = true;
    tile.projectiveTransform.cornerCoords = [0, 10, 20, 30, 40, 50, 60, 255];

    const size = canEncodeTileHeader(tile);
    // 1 + 1 + 8 * 8 + empty extensions
    expect(size.totalBits).toBe(68);

    const out = new BitOutputStream();
    writeTileHeader(tile, size, out);
    writeTileHeader(tile, size, out);
    out.flush();

    const input = new BitInputStream(out.toUint8Array());
    expect(readTileHeader(input)).toEqual(tile);
    expect(readTileHeader(input)).toEqual(tile);
    expect(input.position).toBe(136);
  });

  it('should reject corner coordinates outside 8 bits', () => {
    const tile = createTileHeader();
    tile.haveProjectiveTransform = true;
    tile.projectiveTransform.cornerCoords[3] = 256;

    expect(codeOf(catchError(() => canEncodeTileHeader(tile)))).toBe('UnrepresentableFieldValue');
  });

  it('should require exactly eight corner coordinates', () => {
    const tile = createTileHeader();
    tile.haveProjectiveTransform = true;
    tile.projectiveTransform.cornerCoords = [1, 2, 3];

    expect(codeOf(catchError(() => canEncodeTileHeader(tile)))).toBe('FieldCountMismatch');
  });
});

describe('GroupHeader', () => {
  it('should have one tile header per tile', () => {
    expect(NUM_TILES_PER_GROUP).toBe(64);
    expect(createGroupHeader().tileHeaders.length).toBe(64);
  });

  it('should encode a default group as one bit with or without alpha', () => {
    const group = createGroupHeader();

    expect(canEncodeGroupHeader(group).totalBits).toBe(1);
    expect(canEncodeGroupHeader(group, { haveAlpha: true }).totalBits).toBe(1);
  });

  it('should round-trip a group with one transformed tile', () => {
    const group = createGroupHeader();
    group.tileHeaders[5].haveProjectiveTransform = true;
    group.tileHeaders[5].projectiveTransform.cornerCoords = [9, 8, 7, 6, 5, 4, 3, 2];

    const size = canEncodeGroupHeader(group);
    // 1 + 63 default tiles + 68 + empty extensions
    expect(size.totalBits).toBe(134);

    const out = new BitOutputStream();
    writeGroupHeader(group, size, out);
    out.flush();
    expect(readGroupHeader(new BitInputStream(out.toUint8Array()))).toEqual(group);
  });

  it('should carry alpha only when the context says so', () => {
    const group = createGroupHeader();
    group.alpha = { bytesPerAlpha: 2, encoded: new Uint8Array([0xaa, 0xbb]) };
    const context = { haveAlpha: true };

    const size = canEncodeGroupHeader(group, context);
    // 1 + (2 + 6 + 16) + 64 tiles + 2
    expect(size.totalBits).toBe(91);

    const out = new BitOutputStream();
    writeGroupHeader(group, size, out, context);
    out.flush();
    expect(readGroupHeader(new BitInputStream(out.toUint8Array()), context)).toEqual(group);

    // Without alpha the same group is all default.
    expect(canEncodeGroupHeader(group).totalBits).toBe(1);
  });

  it('should reject a wrong number of tiles', () => {
    const group = createGroupHeader();
    group.tileHeaders.pop();

    const error = catchError(() => canEncodeGroupHeader(group));
    expect(codeOf(error)).toBe('FieldCountMismatch');
    expect(error instanceof HeaderError && error.header).toBe('GroupHeader');
  });
});

describe('PassHeader', () => {
  it('should encode defaults compactly', () => {
    // size 2, hasAlpha 1, isLast 1, frame 1, encoding 2, flags 10,
    // gaborish 2, predictLf/Hf/restoration 3, resampling 2, extensions 2
    expect(canEncodePassHeader(createPassHeader(), { numGroups: 0 }).totalBits).toBe(26);
  });

  it('should round-trip a table of contents', () => {
    const pass = createPassHeader();
    pass.groupSizes = [100, 5000, 20000];
    const context = { numGroups: 3 };

    const size = canEncodePassHeader(pass, context);
    expect(size.totalBits).toBe(26 + 14 + 16 + 17);

    const out = new BitOutputStream();
    writePassHeader(pass, size, out, context);
    out.flush();
    expect(readPassHeader(new BitInputStream(out.toUint8Array()), context)).toEqual(pass);
  });

  it('should take the group count from the table when encoding without context', () => {
    const pass = createPassHeader();
    pass.groupSizes = [1, 2];

    expect(canEncodePassHeader(pass).totalBits).toBe(26 + 14 + 14);
  });

  it('should reject a table of contents of the wrong length', () => {
    const pass = createPassHeader();
    pass.groupSizes = [1, 2];

    expect(codeOf(catchError(() => canEncodePassHeader(pass, { numGroups: 3 })))).toBe(
      'FieldCountMismatch'
    );
  });

  it('should round-trip every optional section', () => {
    const pass = createPassHeader();
    pass.size = 123456n;
    pass.hasAlpha = true;
    pass.frame = { duration: 40, haveTimecode: true, timecode: 0x01020304, isKeyframe: true };
    pass.flags = PassFlags.GradientMap | PassFlags.Noise;
    pass.gaborish = GaborishStrength.Off;
    pass.predictHf = false;
    pass.haveAdaptiveRestoration = true;
    pass.restoration = { enableAdaptive: false, sigma: 30, useSharpening: true };
    pass.resamplingFactor2 = 8;
    pass.groupSizes = [4096];

    const bytes = encodeHeader(PASS_HEADER_FIELDS, pass, { numGroups: 1 });
    expect(readPassHeader(new BitInputStream(bytes), { numGroups: 1 })).toEqual(pass);
  });

  it('should skip the table of contents for progressive passes', () => {
    const pass = createPassHeader();
    pass.isLast = false;
    pass.encoding = ImageEncoding.Progressive;

    const bytes = encodeHeader(PASS_HEADER_FIELDS, pass, { numGroups: 12 });
    const decoded = readPassHeader(new BitInputStream(bytes), { numGroups: 12 });

    expect(decoded.encoding).toBe(ImageEncoding.Progressive);
    expect(decoded.groupSizes).toEqual([]);
    expect(decoded.isLast).toBe(false);
  });

  it('should round-trip lossless options', () => {
    const pass = createPassHeader();
    pass.encoding = ImageEncoding.Lossless;
    pass.groupSizes = [7];
    pass.losslessGrayscale = true;
    pass.lossless16Bits = true;

    const bytes = encodeHeader(PASS_HEADER_FIELDS, pass, { numGroups: 1 });
    expect(readPassHeader(new BitInputStream(bytes), { numGroups: 1 })).toEqual(pass);
  });

  it('should reject unknown encodings', () => {
    // size 00 | hasAlpha 0 | isLast 0 | encoding 11 0010 (5)
    const error = catchError(() =>
      readPassHeader(new BitInputStream(new Uint8Array([0x0c, 0x80])), { numGroups: 0 })
    );

    expect(codeOf(error)).toBe('InvalidEnumValue');
    expect(error instanceof HeaderError && error.header).toBe('PassHeader');
  });

  it('should reject resampling factors without a code', () => {
    const pass = createPassHeader();
    pass.resamplingFactor2 = 5;

    expect(codeOf(catchError(() => canEncodePassHeader(pass)))).toBe('UnrepresentableFieldValue');
  });
});

describe('FileHeader', () => {
  it('should start with the signature', () => {
    const file = createFileHeader();
    expect(canEncodeFileHeader(file).totalBits).toBe(59);

    const bytes = encodeHeader(FILE_HEADER_FIELDS, file, undefined);
    expect(Array.from(bytes)).toEqual([0x0a, 0x4d, 0x4c, 0xd7, 0x00, 0x00, 0x03, 0x80]);
  });

  it('should store dimensions minus one', () => {
    const file = fileHeaderFromImage({ width: 1920, height: 1080, metadata: createMetadata() });

    expect(file.xsizeMinus1).toBe(1919);
    expect(file.ysizeMinus1).toBe(1079);
    expect(imageWidth(file)).toBe(1920);
    expect(imageHeight(file)).toBe(1080);
    expect(fileNumGroups(file)).toBe(12);
    // 32 + 13 + 13 + 3 + 2
    expect(canEncodeFileHeader(file).totalBits).toBe(63);
  });

  it('should reject empty images', () => {
    expect(() =>
      fileHeaderFromImage({ width: 0, height: 10, metadata: createMetadata() })
    ).toThrow(RangeError);
  });

  it('should round-trip metadata, preview and animation', () => {
    const file = fileHeaderFromImage({ width: 4000, height: 3000, metadata: createMetadata() });
    file.metadata.bitsPerSample = 16;
    file.metadata.exif = new Uint8Array([0x45, 0x78, 0x69, 0x66]);
    file.metadata.colorEncoding.transferFunction = TransferFunction.Linear;
    file.preview = { sizeBits: 4096, xsize: 160, ysize: 120 };
    file.animation = { numLoops: 3, ticksNumerator: 1, ticksDenominator: 30 };

    const out = new BitOutputStream();
    writeFileHeader(file, canEncodeFileHeader(file), out);
    out.flush();

    expect(readFileHeader(new BitInputStream(out.toUint8Array()))).toEqual(file);
  });

  it('should report other formats as a signature mismatch', () => {
    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
    const error = catchError(() => readFileHeader(new BitInputStream(png)));

    expect(codeOf(error)).toBe('FormatSignatureMismatch');
    expect(isFormatMismatch(error)).toBe(true);
  });

  it('should report short data as truncated, not as another format', () => {
    const error = catchError(() =>
      readFileHeader(new BitInputStream(new Uint8Array([0x0a, 0x4d, 0x4c])))
    );

    expect(codeOf(error)).toBe('TruncatedStream');
    expect(isFormatMismatch(error)).toBe(false);
  });

  it('should not encode a header with a foreign signature', () => {
    const file = createFileHeader();
    file.signature = FILE_SIGNATURE + 1;

    expect(isFormatMismatch(catchError(() => canEncodeFileHeader(file)))).toBe(true);
  });

  it('should count groups of 512 pixels', () => {
    expect(numGroups(1, 1)).toBe(1);
    expect(numGroups(512, 512)).toBe(1);
    expect(numGroups(513, 512)).toBe(2);
    expect(numGroups(1920, 1080)).toBe(12);
  });
});
