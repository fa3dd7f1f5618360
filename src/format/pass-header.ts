import type { BitSink, BitSource } from '../core/bit-stream.js';
import { bits, distribution, rawBits, val } from '../core/u32-coder.js';
import { canEncode, readHeader, writeHeader, type SizeReport } from '../fields/codec.js';
import { defineEnum, type HeaderFields } from '../fields/visitor.js';

export const ImageEncoding = {
  /** DCT passes. */
  Passes: 0,
  Progressive: 1,
  Lossless: 2,
} as const;
export type ImageEncoding = (typeof ImageEncoding)[keyof typeof ImageEncoding];

export const GaborishStrength = {
  Off: 0,
  Strength500: 1,
  Strength750: 2,
  Strength1000: 3,
} as const;
export type GaborishStrength = (typeof GaborishStrength)[keyof typeof GaborishStrength];

/**
 * Optional postprocessing steps in PassHeader.flags. The flags are the
 * source of truth; overrides set or clear them rather than change meaning.
 */
export const PassFlags = {
  /** Gradient map used to predict smooth areas. */
  GradientMap: 1,
  /**
   * Grayscale optimizations. Only affects parsing; says nothing about the
   * decoded color format.
   */
  GrayscaleOpt: 2,
  /** Inject noise into decoded output. */
  Noise: 4,
} as const;

const SMALL_ENUM_DIST = distribution(val(0), val(1), val(2), bits(4, 3));

const IMAGE_ENCODING = defineEnum('ImageEncoding', ImageEncoding, SMALL_ENUM_DIST);
const GABORISH_STRENGTH = defineEnum('GaborishStrength', GaborishStrength, SMALL_ENUM_DIST);

export interface FrameInfo {
  /** Ticks to wait after rendering; see Animation. */
  duration: number;
  haveTimecode: boolean;
  /** 0xHHMMSSFF */
  timecode: number;
  isKeyframe: boolean;
}

const DURATION_DIST = distribution(val(0), val(1), bits(8), bits(32));
const TIMECODE_DIST = rawBits(32);

export const FRAME_INFO_FIELDS: HeaderFields<FrameInfo> = {
  name: 'FrameInfo',

  create() {
    return { duration: 0, haveTimecode: false, timecode: 0, isKeyframe: false };
  },

  visit(visitor, frame, context) {
    if (visitor.allDefault(FRAME_INFO_FIELDS, frame, context)) return;

    frame.duration = visitor.u32(DURATION_DIST, 0, frame.duration);

    frame.haveTimecode = visitor.bool(false, frame.haveTimecode);
    if (visitor.conditional(frame.haveTimecode)) {
      frame.timecode = visitor.u32(TIMECODE_DIST, 0, frame.timecode);
    }

    frame.isKeyframe = visitor.bool(false, frame.isKeyframe);
  },
};

/**
 * Adaptive restoration (edge-preserving filter) parameters.
 */
export interface RestorationParams {
  /** Derive the filter strength from the image; otherwise use sigma. */
  enableAdaptive: boolean;
  sigma: number;
  useSharpening: boolean;
}

const SIGMA_DIST = distribution(bits(4), bits(6, 16), bits(8, 80), bits(32));

export const RESTORATION_FIELDS: HeaderFields<RestorationParams> = {
  name: 'RestorationParams',

  create() {
    return { enableAdaptive: true, sigma: 0, useSharpening: false };
  },

  visit(visitor, params, context) {
    if (visitor.allDefault(RESTORATION_FIELDS, params, context)) return;

    params.enableAdaptive = visitor.bool(true, params.enableAdaptive);
    if (visitor.conditional(!params.enableAdaptive)) {
      params.sigma = visitor.u32(SIGMA_DIST, 0, params.sigma);
    }
    params.useSharpening = visitor.bool(false, params.useSharpening);
  },
};

/**
 * One pass of an image or frame; the last pass of a frame has isLast set.
 * Starts on a byte boundary "a"; the next pass starts at "a + size".
 */
export interface PassHeader {
  /** Bytes from the start of this header to the start of the next pass. */
  size: bigint;
  hasAlpha: boolean;

  isLast: boolean;
  /** Only if isLast. */
  frame: FrameInfo;

  encoding: ImageEncoding;

  // Only for ImageEncoding.Passes:
  flags: number;
  gaborish: GaborishStrength;
  predictLf: boolean;
  predictHf: boolean;
  haveAdaptiveRestoration: boolean;
  restoration: RestorationParams;

  // Not for ImageEncoding.Progressive:
  resamplingFactor2: number;
  /** Table of contents: encoded size of each group, in bytes. */
  groupSizes: number[];

  // Only for ImageEncoding.Lossless:
  losslessGrayscale: boolean;
  /** 16-bit (true) or 8-bit samples. */
  lossless16Bits: boolean;

  extensions: bigint;
}

/**
 * Not serialized: the group count follows from the FileHeader geometry.
 */
export interface PassHeaderContext {
  numGroups: number;
}

const FLAGS_DIST = distribution(bits(8), bits(16), bits(24), bits(32));
const RESAMPLING_DIST = distribution(val(2), val(3), val(4), val(8));
const GROUP_SIZE_DIST = distribution(bits(12), bits(14), bits(15), bits(21));

export function createPassHeader(): PassHeader {
  return {
    size: 0n,
    hasAlpha: false,
    isLast: true,
    frame: FRAME_INFO_FIELDS.create(),
    encoding: ImageEncoding.Passes,
    flags: 0,
    gaborish: GaborishStrength.Strength750,
    predictLf: true,
    predictHf: true,
    haveAdaptiveRestoration: false,
    restoration: RESTORATION_FIELDS.create(),
    resamplingFactor2: 2,
    groupSizes: [],
    losslessGrayscale: false,
    lossless16Bits: false,
    extensions: 0n,
  };
}

export const PASS_HEADER_FIELDS: HeaderFields<PassHeader, PassHeaderContext> = {
  name: 'PassHeader',
  create: createPassHeader,

  visit(visitor, pass, context) {
    pass.size = visitor.u64(0n, pass.size);

    pass.hasAlpha = visitor.bool(false, pass.hasAlpha);
    pass.isLast = visitor.bool(true, pass.isLast);
    if (visitor.conditional(pass.isLast)) {
      visitor.visitNested(FRAME_INFO_FIELDS, pass.frame);
    }

    pass.encoding = visitor.enumValue(IMAGE_ENCODING, ImageEncoding.Passes, pass.encoding);

    if (visitor.conditional(pass.encoding === ImageEncoding.Passes)) {
      pass.flags = visitor.u32(FLAGS_DIST, 0, pass.flags);
      pass.gaborish = visitor.enumValue(
        GABORISH_STRENGTH,
        GaborishStrength.Strength750,
        pass.gaborish
      );

      pass.predictLf = visitor.bool(true, pass.predictLf);
      pass.predictHf = visitor.bool(true, pass.predictHf);
      pass.haveAdaptiveRestoration = visitor.bool(false, pass.haveAdaptiveRestoration);
      if (visitor.conditional(pass.haveAdaptiveRestoration)) {
        visitor.visitNested(RESTORATION_FIELDS, pass.restoration);
      }
    }

    // No resampling or group table of contents for progressive passes.
    if (visitor.conditional(pass.encoding !== ImageEncoding.Progressive)) {
      pass.resamplingFactor2 = visitor.u32(RESAMPLING_DIST, 2, pass.resamplingFactor2);

      pass.groupSizes = visitor.setSizeWhenReading(
        context.numGroups,
        pass.groupSizes,
        GROUP_SIZE_DIST
      );
      for (let i = 0; i < pass.groupSizes.length; i++) {
        pass.groupSizes[i] = visitor.u32(GROUP_SIZE_DIST, 0, pass.groupSizes[i]);
      }
    }

    if (visitor.conditional(pass.encoding === ImageEncoding.Lossless)) {
      pass.losslessGrayscale = visitor.bool(false, pass.losslessGrayscale);
      pass.lossless16Bits = visitor.bool(false, pass.lossless16Bits);
    }

    pass.extensions = visitor.beginExtensions(pass.extensions);
    // Extensions: in the order they were added to the format.
    visitor.endExtensions();
  },
};

/**
 * Encoders may omit the context; the group count is then taken from the
 * table of contents itself.
 */
function encodeContext(pass: PassHeader, context?: PassHeaderContext): PassHeaderContext {
  return context ?? { numGroups: pass.groupSizes.length };
}

export function canEncodePassHeader(pass: PassHeader, context?: PassHeaderContext): SizeReport {
  return canEncode(PASS_HEADER_FIELDS, pass, encodeContext(pass, context));
}

export function writePassHeader(
  pass: PassHeader,
  size: SizeReport,
  sink: BitSink,
  context?: PassHeaderContext
): void {
  writeHeader(PASS_HEADER_FIELDS, pass, size, sink, encodeContext(pass, context));
}

export function readPassHeader(source: BitSource, context: PassHeaderContext): PassHeader {
  return readHeader(PASS_HEADER_FIELDS, source, context);
}
