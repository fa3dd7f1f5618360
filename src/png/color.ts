/**
 * Color chunks (iCCP, sRGB, gAMA, cHRM) to and from ColorEncoding.
 *
 * Reading precedence: the PQ marker profile, then an ICC profile, then
 * sRGB, then gAMA/cHRM. Anything absent falls back to sRGB values.
 */

import { strFromU8, strToU8, zlibSync } from 'fflate';
import { PngError } from '../errors.js';
import {
  ColorSpace,
  DEFAULT_GAMMA,
  PRIMARIES_XY,
  Primaries,
  RenderingIntent,
  TransferFunction,
  WHITE_POINT_XY,
  WhitePoint,
  createColorEncoding,
  isSrgb,
  primariesXy,
  whitePointXy,
  type Chromaticity,
  type ColorEncoding,
  type PrimariesXy,
} from '../format/color-encoding.js';
import { readInt32, writeUint32, type PngChunk, type WarningHandler } from './chunks.js';
import { inflate } from './text.js';

/**
 * iCCP profile name marking BT.2100 PQ content; the profile body is not
 * needed to describe it.
 */
export const PQ_PROFILE_NAME = 'ITUR_2100_PQ_FULL';

const ICC_PROFILE_NAME = 'ICC Profile';

/** gAMA value of a linear transfer function. */
const LINEAR_GAMMA = 100000;

interface ChromaticityChunk {
  white: Chromaticity;
  primaries: PrimariesXy;
}

interface ColorChunks {
  pq: boolean;
  icc: Uint8Array | undefined;
  srgbIntent: RenderingIntent | undefined;
  gamma: number | undefined;
  chromaticity: ChromaticityChunk | undefined;
}

function isRenderingIntent(value: number): value is RenderingIntent {
  return Object.values(RenderingIntent).some((intent) => intent === value);
}

function parseIccp(data: Uint8Array, warn: WarningHandler): { name: string; profile?: Uint8Array } {
  const end = data.indexOf(0);
  if (end < 1 || end > 79) {
    warn('Malformed iCCP chunk; ignoring it');
    return { name: '' };
  }
  const name = strFromU8(data.subarray(0, end), true);
  if (data[end + 1] !== 0) {
    warn(`Unknown iCCP compression method ${data[end + 1]}; ignoring the profile`);
    return { name };
  }
  try {
    return { name, profile: inflate(data.subarray(end + 2), 'iCCP profile') };
  } catch (error) {
    if (!(error instanceof PngError)) throw error;
    warn(`${error.message}; ignoring the profile`);
    return { name };
  }
}

function collect(chunks: readonly PngChunk[], warn: WarningHandler): ColorChunks {
  const found: ColorChunks = {
    pq: false,
    icc: undefined,
    srgbIntent: undefined,
    gamma: undefined,
    chromaticity: undefined,
  };

  for (const { type, data } of chunks) {
    switch (type) {
      case 'iCCP': {
        const { name, profile } = parseIccp(data, warn);
        if (name === PQ_PROFILE_NAME) {
          found.pq = true;
        } else if (profile !== undefined && profile.length > 0) {
          found.icc = profile;
        }
        break;
      }

      case 'sRGB': {
        const intent = data[0];
        if (data.length !== 1 || !isRenderingIntent(intent)) {
          warn('Malformed sRGB chunk; ignoring it');
        } else {
          found.srgbIntent = intent;
        }
        break;
      }

      case 'gAMA':
        if (data.length !== 4) {
          warn('Malformed gAMA chunk; ignoring it');
        } else {
          found.gamma = readInt32(data, 0);
        }
        break;

      case 'cHRM': {
        if (data.length !== 32) {
          warn('Malformed cHRM chunk; ignoring it');
          break;
        }
        const xy = (index: number): Chromaticity => ({
          x: readInt32(data, index * 8),
          y: readInt32(data, index * 8 + 4),
        });
        if ([0, 1, 2, 3].some((index) => xy(index).x < 0 || xy(index).y < 0)) {
          warn('Negative value in cHRM chunk; ignoring it');
          break;
        }
        found.chromaticity = {
          white: xy(0),
          primaries: { red: xy(1), green: xy(2), blue: xy(3) },
        };
        break;
      }
    }
  }

  return found;
}

function sameXy(a: Chromaticity, b: Chromaticity): boolean {
  return a.x === b.x && a.y === b.y;
}

function samePrimaries(a: PrimariesXy, b: PrimariesXy): boolean {
  return sameXy(a.red, b.red) && sameXy(a.green, b.green) && sameXy(a.blue, b.blue);
}

function applyWhitePoint(color: ColorEncoding, white: Chromaticity): void {
  for (const point of [WhitePoint.D65, WhitePoint.E, WhitePoint.Dci] as const) {
    if (sameXy(WHITE_POINT_XY[point], white)) {
      color.whitePoint = point;
      return;
    }
  }
  color.whitePoint = WhitePoint.Custom;
  color.white = { ...white };
}

function applyPrimaries(color: ColorEncoding, primaries: PrimariesXy): void {
  for (const known of [Primaries.Srgb, Primaries.Bt2100, Primaries.P3] as const) {
    if (samePrimaries(PRIMARIES_XY[known], primaries)) {
      color.primaries = known;
      return;
    }
  }
  color.primaries = Primaries.Custom;
  color.red = { ...primaries.red };
  color.green = { ...primaries.green };
  color.blue = { ...primaries.blue };
}

/**
 * Color space an ICC profile declares in its header ('GRAY' or 'RGB '), or
 * undefined for anything else.
 */
export function iccColorSpace(profile: Uint8Array): ColorSpace | undefined {
  if (profile.length < 20) return undefined;
  const signature = strFromU8(profile.subarray(16, 20), true);
  if (signature === 'GRAY') return ColorSpace.Gray;
  if (signature === 'RGB ') return ColorSpace.Rgb;
  return undefined;
}

/**
 * Derive the color encoding from a PNG's chunks. Throws PngError
 * 'ColorMismatch' when an ICC profile contradicts the pixel layout.
 */
export function readColorEncoding(
  chunks: readonly PngChunk[],
  isGray: boolean,
  warn: WarningHandler
): ColorEncoding {
  const found = collect(chunks, warn);
  const color = createColorEncoding();
  color.colorSpace = isGray ? ColorSpace.Gray : ColorSpace.Rgb;

  if (found.pq) {
    color.whitePoint = WhitePoint.D65;
    color.primaries = Primaries.Bt2100;
    color.transferFunction = TransferFunction.Pq;
    color.renderingIntent = RenderingIntent.Relative;
    return color;
  }

  if (found.icc !== undefined) {
    if (found.srgbIntent !== undefined) {
      warn('PNG has both sRGB and an ICC profile; ignoring sRGB');
    }
    const declared = iccColorSpace(found.icc);
    if (declared !== undefined && declared !== color.colorSpace) {
      throw new PngError(
        'ColorMismatch',
        `ICC profile is ${declared === ColorSpace.Gray ? 'gray' : 'RGB'} but pixels are ${
          isGray ? 'gray' : 'RGB'
        }`
      );
    }
    color.wantIcc = true;
    color.icc = found.icc;
    return color;
  }

  if (found.srgbIntent !== undefined) {
    color.renderingIntent = found.srgbIntent;
    return color;
  }

  color.renderingIntent = RenderingIntent.Perceptual;
  if (found.chromaticity !== undefined) {
    applyWhitePoint(color, found.chromaticity.white);
    applyPrimaries(color, found.chromaticity.primaries);
  }

  const gamma = found.gamma;
  if (gamma === undefined || gamma <= 0 || gamma > LINEAR_GAMMA) {
    color.transferFunction = TransferFunction.Srgb;
  } else if (gamma === LINEAR_GAMMA) {
    color.transferFunction = TransferFunction.Linear;
  } else {
    color.transferFunction = TransferFunction.Gamma;
    color.gamma = gamma;
  }

  return color;
}

function int32Chunk(type: string, values: readonly number[]): PngChunk {
  const data = new Uint8Array(values.length * 4);
  values.forEach((value, i) => writeUint32(data, i * 4, value >>> 0));
  return { type, data };
}

function gammaOf(color: ColorEncoding): number | undefined {
  switch (color.transferFunction) {
    case TransferFunction.Srgb:
      // sRGB is approximated by 1/2.2 in gAMA.
      return DEFAULT_GAMMA;
    case TransferFunction.Linear:
      return LINEAR_GAMMA;
    case TransferFunction.Gamma:
      return color.gamma;
    default:
      return undefined;
  }
}

function iccpChunk(name: string, profile: Uint8Array): PngChunk {
  const nameBytes = strToU8(name, true);
  const compressed = zlibSync(profile);
  const data = new Uint8Array(nameBytes.length + 2 + compressed.length);
  data.set(nameBytes, 0);
  // The NUL terminator and compression method 0 stay zero.
  data.set(compressed, nameBytes.length + 2);
  return { type: 'iCCP', data };
}

/**
 * Chunks describing `color`, to be placed before IDAT.
 */
export function colorChunks(color: ColorEncoding): PngChunk[] {
  if (color.wantIcc) {
    return color.icc.length > 0 ? [iccpChunk(ICC_PROFILE_NAME, color.icc)] : [];
  }

  if (color.transferFunction === TransferFunction.Pq && color.primaries === Primaries.Bt2100) {
    return [iccpChunk(PQ_PROFILE_NAME, new Uint8Array(0))];
  }

  const chunks: PngChunk[] = [];
  if (isSrgb(color)) {
    chunks.push({ type: 'sRGB', data: new Uint8Array([color.renderingIntent]) });
  }

  const gamma = gammaOf(color);
  if (gamma !== undefined) {
    chunks.push(int32Chunk('gAMA', [gamma]));
  }

  const white = whitePointXy(color);
  const { red, green, blue } = primariesXy(color);
  chunks.push(
    int32Chunk('cHRM', [white.x, white.y, red.x, red.y, green.x, green.y, blue.x, blue.y])
  );

  return chunks;
}
