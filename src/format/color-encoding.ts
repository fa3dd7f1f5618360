/**
 * Color description carried in the file metadata: either an opaque ICC
 * profile, or enumerated/custom colorimetry. Profile synthesis is left to
 * color management outside this package.
 *
 * Chromaticities and gamma are fixed-point values scaled by 100000, the
 * same units PNG uses in cHRM and gAMA.
 */

import { bits, distribution, val } from '../core/u32-coder.js';
import { BytesEncoding, defineEnum, type HeaderFields } from '../fields/visitor.js';

export const ColorSpace = {
  Rgb: 0,
  Gray: 1,
  Unknown: 2,
} as const;
export type ColorSpace = (typeof ColorSpace)[keyof typeof ColorSpace];

export const WhitePoint = {
  D65: 0,
  Custom: 1,
  E: 2,
  Dci: 3,
} as const;
export type WhitePoint = (typeof WhitePoint)[keyof typeof WhitePoint];

export const Primaries = {
  Srgb: 0,
  Custom: 1,
  Bt2100: 2,
  P3: 3,
} as const;
export type Primaries = (typeof Primaries)[keyof typeof Primaries];

export const TransferFunction = {
  Srgb: 0,
  Linear: 1,
  Pq: 2,
  Gamma: 3,
  Hlg: 4,
} as const;
export type TransferFunction = (typeof TransferFunction)[keyof typeof TransferFunction];

/** Same numbering as ICC and the PNG sRGB chunk. */
export const RenderingIntent = {
  Perceptual: 0,
  Relative: 1,
  Saturation: 2,
  Absolute: 3,
} as const;
export type RenderingIntent = (typeof RenderingIntent)[keyof typeof RenderingIntent];

/** 1 / 2.2, scaled by 100000. */
export const DEFAULT_GAMMA = 45455;

export interface Chromaticity {
  x: number;
  y: number;
}

export interface ColorEncoding {
  wantIcc: boolean;
  /** Only if wantIcc. */
  icc: Uint8Array;

  colorSpace: ColorSpace;

  // The rest only without ICC:
  whitePoint: WhitePoint;
  /** Only if whitePoint is Custom. */
  white: Chromaticity;

  primaries: Primaries;
  /** Only if primaries are Custom. */
  red: Chromaticity;
  green: Chromaticity;
  blue: Chromaticity;

  transferFunction: TransferFunction;
  /** Only if transferFunction is Gamma. */
  gamma: number;

  renderingIntent: RenderingIntent;
}

const SMALL_ENUM_DIST = distribution(val(0), val(1), val(2), bits(4, 3));
const INTENT_DIST = distribution(val(0), val(1), val(2), val(3));
const FIXED_POINT_DIST = distribution(bits(16), bits(17, 65536), bits(20, 196608), bits(32));

const COLOR_SPACE = defineEnum('ColorSpace', ColorSpace, SMALL_ENUM_DIST);
const WHITE_POINT = defineEnum('WhitePoint', WhitePoint, SMALL_ENUM_DIST);
const PRIMARIES = defineEnum('Primaries', Primaries, SMALL_ENUM_DIST);
const TRANSFER_FUNCTION = defineEnum('TransferFunction', TransferFunction, SMALL_ENUM_DIST);
const RENDERING_INTENT = defineEnum('RenderingIntent', RenderingIntent, INTENT_DIST);

/** CIE xy of the enumerated white points (scaled by 100000). */
export const WHITE_POINT_XY: Readonly<Record<Exclude<WhitePoint, 1>, Chromaticity>> = {
  [WhitePoint.D65]: { x: 31270, y: 32900 },
  [WhitePoint.E]: { x: 33333, y: 33333 },
  [WhitePoint.Dci]: { x: 31400, y: 35100 },
};

export interface PrimariesXy {
  red: Chromaticity;
  green: Chromaticity;
  blue: Chromaticity;
}

/** CIE xy of the enumerated primaries (scaled by 100000). */
export const PRIMARIES_XY: Readonly<Record<Exclude<Primaries, 1>, PrimariesXy>> = {
  [Primaries.Srgb]: {
    red: { x: 64000, y: 33000 },
    green: { x: 30000, y: 60000 },
    blue: { x: 15000, y: 6000 },
  },
  [Primaries.Bt2100]: {
    red: { x: 70800, y: 29200 },
    green: { x: 17000, y: 79700 },
    blue: { x: 13100, y: 4600 },
  },
  [Primaries.P3]: {
    red: { x: 68000, y: 32000 },
    green: { x: 26500, y: 69000 },
    blue: { x: 15000, y: 6000 },
  },
};

export function createColorEncoding(): ColorEncoding {
  return {
    wantIcc: false,
    icc: new Uint8Array(0),
    colorSpace: ColorSpace.Rgb,
    whitePoint: WhitePoint.D65,
    white: { x: 0, y: 0 },
    primaries: Primaries.Srgb,
    red: { x: 0, y: 0 },
    green: { x: 0, y: 0 },
    blue: { x: 0, y: 0 },
    transferFunction: TransferFunction.Srgb,
    gamma: DEFAULT_GAMMA,
    renderingIntent: RenderingIntent.Relative,
  };
}

export const CHROMATICITY_FIELDS: HeaderFields<Chromaticity> = {
  name: 'Chromaticity',

  create() {
    return { x: 0, y: 0 };
  },

  visit(visitor, xy) {
    xy.x = visitor.u32(FIXED_POINT_DIST, 0, xy.x);
    xy.y = visitor.u32(FIXED_POINT_DIST, 0, xy.y);
  },
};

export const COLOR_ENCODING_FIELDS: HeaderFields<ColorEncoding> = {
  name: 'ColorEncoding',
  create: createColorEncoding,

  visit(visitor, color, context) {
    if (visitor.allDefault(COLOR_ENCODING_FIELDS, color, context)) return;

    color.wantIcc = visitor.bool(false, color.wantIcc);
    if (visitor.conditional(color.wantIcc)) {
      color.icc = visitor.bytes(BytesEncoding.Raw, color.icc);
    }

    color.colorSpace = visitor.enumValue(COLOR_SPACE, ColorSpace.Rgb, color.colorSpace);

    // The ICC profile already describes everything below.
    if (!visitor.conditional(!color.wantIcc)) return;

    color.whitePoint = visitor.enumValue(WHITE_POINT, WhitePoint.D65, color.whitePoint);
    if (visitor.conditional(color.whitePoint === WhitePoint.Custom)) {
      visitor.visitNested(CHROMATICITY_FIELDS, color.white);
    }

    color.primaries = visitor.enumValue(PRIMARIES, Primaries.Srgb, color.primaries);
    if (visitor.conditional(color.primaries === Primaries.Custom)) {
      visitor.visitNested(CHROMATICITY_FIELDS, color.red);
      visitor.visitNested(CHROMATICITY_FIELDS, color.green);
      visitor.visitNested(CHROMATICITY_FIELDS, color.blue);
    }

    color.transferFunction = visitor.enumValue(
      TRANSFER_FUNCTION,
      TransferFunction.Srgb,
      color.transferFunction
    );
    if (visitor.conditional(color.transferFunction === TransferFunction.Gamma)) {
      color.gamma = visitor.u32(FIXED_POINT_DIST, DEFAULT_GAMMA, color.gamma);
    }

    color.renderingIntent = visitor.enumValue(
      RENDERING_INTENT,
      RenderingIntent.Relative,
      color.renderingIntent
    );
  },
};

/**
 * White point chromaticity, whether enumerated or custom.
 */
export function whitePointXy(color: ColorEncoding): Chromaticity {
  return color.whitePoint === WhitePoint.Custom ? color.white : WHITE_POINT_XY[color.whitePoint];
}

/**
 * Primaries chromaticities, whether enumerated or custom.
 */
export function primariesXy(color: ColorEncoding): PrimariesXy {
  if (color.primaries === Primaries.Custom) {
    return { red: color.red, green: color.green, blue: color.blue };
  }
  return PRIMARIES_XY[color.primaries];
}

export function isSrgb(color: ColorEncoding): boolean {
  return (
    !color.wantIcc &&
    color.colorSpace !== ColorSpace.Unknown &&
    color.whitePoint === WhitePoint.D65 &&
    color.primaries === Primaries.Srgb &&
    color.transferFunction === TransferFunction.Srgb
  );
}
