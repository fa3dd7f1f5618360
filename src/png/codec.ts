/**
 * PNG bridge: image properties and metadata in, PNG out.
 *
 * Usage:
 * ```typescript
 * const info = inspectPng(bytes);
 * if (info) {
 *   const file = fileHeaderFromImage(info);
 * }
 * ```
 */

import { zlibSync } from 'fflate';
import { PngError } from '../errors.js';
import { createMetadata, type Metadata } from '../format/metadata.js';
import {
  findChunk,
  isPng,
  readChunks,
  readUint32,
  writeChunks,
  writeUint32,
  type PngChunk,
  type WarningHandler,
} from './chunks.js';
import { colorChunks, readColorEncoding } from './color.js';
import { metadataChunks, readMetadataBlobs } from './metadata.js';
import { inflate } from './text.js';

export const PngColorType = {
  Gray: 0,
  Rgb: 2,
  Palette: 3,
  GrayAlpha: 4,
  Rgba: 6,
} as const;
export type PngColorType = (typeof PngColorType)[keyof typeof PngColorType];

/** Valid bit depths per color type. */
const BIT_DEPTHS: Readonly<Record<PngColorType, readonly number[]>> = {
  [PngColorType.Gray]: [1, 2, 4, 8, 16],
  [PngColorType.Rgb]: [8, 16],
  [PngColorType.Palette]: [1, 2, 4, 8],
  [PngColorType.GrayAlpha]: [8, 16],
  [PngColorType.Rgba]: [8, 16],
};

/** Samples per pixel as stored in IDAT. */
const CHANNELS: Readonly<Record<PngColorType, number>> = {
  [PngColorType.Gray]: 1,
  [PngColorType.Rgb]: 3,
  [PngColorType.Palette]: 1,
  [PngColorType.GrayAlpha]: 2,
  [PngColorType.Rgba]: 4,
};

/**
 * A decoded image: interleaved gray or RGB samples, then alpha if present.
 * 16-bit samples are big-endian, as in PNG.
 */
export interface PngImage {
  width: number;
  height: number;
  isGray: boolean;
  hasAlpha: boolean;
  bitsPerSample: 8 | 16;
  samples: Uint8Array;
  metadata: Metadata;
}

/**
 * Everything a PNG says about itself without decoding pixels.
 */
export interface PngInfo extends Omit<PngImage, 'samples'> {
  colorType: PngColorType;
  /** Bit depth as stored; bitsPerSample is this rounded up to 8. */
  bitDepth: number;
  interlaced: boolean;
}

export interface PngReadOptions {
  /** Receives non-fatal problems (default: console.warn) */
  onWarning?: WarningHandler;
}

export interface PngEncodeOptions {
  /** Deflate EXIF/IPTC text chunks (default: true) */
  compressText: boolean;

  /** Receives non-fatal problems (default: console.warn) */
  onWarning?: WarningHandler;
}

export const DEFAULT_PNG_ENCODE_OPTIONS: PngEncodeOptions = {
  compressText: true,
};

const defaultWarning: WarningHandler = (message) => {
  console.warn(`PNG: ${message}`);
};

function isColorType(value: number): value is PngColorType {
  return Object.values(PngColorType).some((type) => type === value);
}

interface Ihdr {
  width: number;
  height: number;
  bitDepth: number;
  colorType: PngColorType;
  interlaced: boolean;
}

function parseIhdr(chunk: PngChunk | undefined): Ihdr {
  if (chunk === undefined || chunk.type !== 'IHDR' || chunk.data.length !== 13) {
    throw new PngError('InvalidHeader', 'PNG does not start with a valid IHDR chunk');
  }
  const { data } = chunk;
  const width = readUint32(data, 0);
  const height = readUint32(data, 4);
  const bitDepth = data[8];
  const colorType = data[9];
  const [compression, filter, interlace] = [data[10], data[11], data[12]];

  if (width === 0 || height === 0 || width > 0x7fffffff || height > 0x7fffffff) {
    throw new PngError('InvalidHeader', `Invalid PNG dimensions ${width}x${height}`);
  }
  if (!isColorType(colorType)) {
    throw new PngError('UnsupportedColorType', `Unknown PNG color type ${colorType}`);
  }
  if (!BIT_DEPTHS[colorType].includes(bitDepth)) {
    throw new PngError(
      'UnsupportedBitDepth',
      `Bit depth ${bitDepth} is not valid for color type ${colorType}`
    );
  }
  if (compression !== 0 || filter !== 0 || interlace > 1) {
    throw new PngError(
      'InvalidHeader',
      `Unknown PNG compression/filter/interlace ${compression}/${filter}/${interlace}`
    );
  }

  return { width, height, bitDepth, colorType, interlaced: interlace === 1 };
}

function paletteIsGray(palette: Uint8Array): boolean {
  for (let i = 0; i + 2 < palette.length; i += 3) {
    if (palette[i] !== palette[i + 1] || palette[i] !== palette[i + 2]) return false;
  }
  return true;
}

function paletteHasAlpha(palette: Uint8Array, transparency: Uint8Array | undefined): boolean {
  if (transparency === undefined) return false;
  const entries = Math.min(transparency.length, palette.length / 3);
  for (let i = 0; i < entries; i++) {
    if (transparency[i] !== 255) return true;
  }
  return false;
}

interface Layout {
  isGray: boolean;
  hasAlpha: boolean;
}

function layoutOf(ihdr: Ihdr, chunks: readonly PngChunk[]): Layout {
  const transparency = findChunk(chunks, 'tRNS')?.data;
  switch (ihdr.colorType) {
    case PngColorType.Gray:
      return { isGray: true, hasAlpha: transparency !== undefined };
    case PngColorType.Rgb:
      return { isGray: false, hasAlpha: transparency !== undefined };
    case PngColorType.GrayAlpha:
      return { isGray: true, hasAlpha: true };
    case PngColorType.Rgba:
      return { isGray: false, hasAlpha: true };
    case PngColorType.Palette: {
      const palette = findChunk(chunks, 'PLTE')?.data;
      if (palette === undefined || palette.length === 0 || palette.length % 3 !== 0) {
        throw new PngError('InvalidHeader', 'Palette PNG without a valid PLTE chunk');
      }
      return {
        isGray: paletteIsGray(palette),
        hasAlpha: paletteHasAlpha(palette, transparency),
      };
    }
  }
}

function inspectChunks(chunks: readonly PngChunk[], warn: WarningHandler): PngInfo {
  const ihdr = parseIhdr(chunks[0]);
  const { isGray, hasAlpha } = layoutOf(ihdr, chunks);
  const bitsPerSample = ihdr.bitDepth === 16 ? 16 : 8;

  const metadata = createMetadata();
  metadata.bitsPerSample = bitsPerSample;
  readMetadataBlobs(chunks, metadata, warn);
  metadata.colorEncoding = readColorEncoding(chunks, isGray, warn);

  return {
    width: ihdr.width,
    height: ihdr.height,
    isGray,
    hasAlpha,
    bitsPerSample,
    colorType: ihdr.colorType,
    bitDepth: ihdr.bitDepth,
    interlaced: ihdr.interlaced,
    metadata,
  };
}

/**
 * Read dimensions, layout, color encoding and metadata blobs.
 *
 * Returns null if `bytes` is not a PNG at all. Throws PngError when the PNG
 * is damaged in a way that leaves its layout or color undetermined; other
 * damage is reported through `onWarning`.
 */
export function inspectPng(bytes: Uint8Array, options: PngReadOptions = {}): PngInfo | null {
  if (!isPng(bytes)) return null;
  const warn = options.onWarning ?? defaultWarning;
  return inspectChunks(readChunks(bytes, warn), warn);
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/**
 * Undo per-row filters. `raw` holds a filter byte before every row.
 */
function unfilter(raw: Uint8Array, height: number, stride: number, bpp: number): Uint8Array {
  const out = new Uint8Array(height * stride);
  for (let y = 0; y < height; y++) {
    const filter = raw[y * (stride + 1)];
    const src = y * (stride + 1) + 1;
    const row = y * stride;
    const prev = row - stride;

    for (let x = 0; x < stride; x++) {
      const a = x >= bpp ? out[row + x - bpp] : 0;
      const b = y > 0 ? out[prev + x] : 0;
      const c = x >= bpp && y > 0 ? out[prev + x - bpp] : 0;
      let predicted: number;
      switch (filter) {
        case 0:
          predicted = 0;
          break;
        case 1:
          predicted = a;
          break;
        case 2:
          predicted = b;
          break;
        case 3:
          predicted = (a + b) >> 1;
          break;
        case 4:
          predicted = paeth(a, b, c);
          break;
        default:
          throw new PngError('InvalidImage', `Unknown filter type ${filter} in row ${y}`);
      }
      out[row + x] = (raw[src + x] + predicted) & 0xff;
    }
  }
  return out;
}

/**
 * Append an alpha channel from a tRNS color key: 0 where a pixel equals the
 * key, opaque elsewhere.
 */
function applyColorKey(
  samples: Uint8Array,
  key: Uint8Array,
  channels: number,
  bytesPerSample: number
): Uint8Array {
  const pixelBytes = channels * bytesPerSample;
  const pixels = samples.length / pixelBytes;
  const out = new Uint8Array(pixels * (pixelBytes + bytesPerSample));

  // tRNS stores every key sample as 16 bits; 8-bit images use the low byte.
  const keyBytes = new Uint8Array(pixelBytes);
  for (let ch = 0; ch < channels; ch++) {
    if (bytesPerSample === 2) {
      keyBytes[ch * 2] = key[ch * 2];
      keyBytes[ch * 2 + 1] = key[ch * 2 + 1];
    } else {
      keyBytes[ch] = key[ch * 2 + 1];
    }
  }

  for (let i = 0; i < pixels; i++) {
    const src = i * pixelBytes;
    const dst = i * (pixelBytes + bytesPerSample);
    let matches = true;
    for (let j = 0; j < pixelBytes; j++) {
      out[dst + j] = samples[src + j];
      if (samples[src + j] !== keyBytes[j]) matches = false;
    }
    out.fill(matches ? 0 : 0xff, dst + pixelBytes, dst + pixelBytes + bytesPerSample);
  }
  return out;
}

/**
 * Decode a non-interlaced PNG with 8 or 16 bits per sample.
 *
 * Returns null if `bytes` is not a PNG. Palette, sub-byte and interlaced
 * images fail with PngError 'UnsupportedLayout'.
 */
export function decodePng(bytes: Uint8Array, options: PngReadOptions = {}): PngImage | null {
  if (!isPng(bytes)) return null;
  const warn = options.onWarning ?? defaultWarning;
  const chunks = readChunks(bytes, warn);
  const info = inspectChunks(chunks, warn);

  if (info.interlaced || info.colorType === PngColorType.Palette || info.bitDepth < 8) {
    throw new PngError(
      'UnsupportedLayout',
      `Cannot decode pixels of color type ${info.colorType}, bit depth ${info.bitDepth}` +
        (info.interlaced ? ', interlaced' : '')
    );
  }

  const idat = chunks.filter((chunk) => chunk.type === 'IDAT');
  if (idat.length === 0) {
    throw new PngError('InvalidImage', 'PNG has no IDAT chunk');
  }

  const compressed = new Uint8Array(idat.reduce((sum, chunk) => sum + chunk.data.length, 0));
  let offset = 0;
  for (const chunk of idat) {
    compressed.set(chunk.data, offset);
    offset += chunk.data.length;
  }

  const raw = inflate(compressed, 'IDAT');
  const channels = CHANNELS[info.colorType];
  const bytesPerSample = info.bitDepth / 8;
  const bpp = channels * bytesPerSample;
  const stride = info.width * bpp;
  const expected = info.height * (stride + 1);
  if (raw.length < expected) {
    throw new PngError('InvalidImage', `IDAT holds ${raw.length} bytes, expected ${expected}`);
  }
  if (raw.length > expected) {
    warn(`Ignoring ${raw.length - expected} extra bytes after the image data`);
  }

  let samples = unfilter(raw, info.height, stride, bpp);

  const key = findChunk(chunks, 'tRNS')?.data;
  const keyed = info.colorType === PngColorType.Gray || info.colorType === PngColorType.Rgb;
  if (key !== undefined && keyed) {
    if (key.length !== channels * 2) {
      throw new PngError('InvalidImage', `tRNS holds ${key.length} bytes, expected ${channels * 2}`);
    }
    samples = applyColorKey(samples, key, channels, bytesPerSample);
  }

  return {
    width: info.width,
    height: info.height,
    isGray: info.isGray,
    hasAlpha: info.hasAlpha,
    bitsPerSample: info.bitsPerSample,
    samples,
    metadata: info.metadata,
  };
}

/**
 * Encode an image as PNG, with its color encoding and metadata blobs.
 */
export function encodePng(
  image: PngImage,
  options: PngEncodeOptions = DEFAULT_PNG_ENCODE_OPTIONS
): Uint8Array {
  const { width, height, isGray, hasAlpha, bitsPerSample, samples, metadata } = image;
  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new PngError('InvalidImage', `Invalid image dimensions ${width}x${height}`);
  }

  const channels = (isGray ? 1 : 3) + (hasAlpha ? 1 : 0);
  const bytesPerSample = bitsPerSample / 8;
  const stride = width * channels * bytesPerSample;
  if (samples.length !== height * stride) {
    throw new PngError(
      'InvalidImage',
      `Expected ${height * stride} sample bytes for ${width}x${height}, got ${samples.length}`
    );
  }

  const colorType = isGray
    ? hasAlpha
      ? PngColorType.GrayAlpha
      : PngColorType.Gray
    : hasAlpha
      ? PngColorType.Rgba
      : PngColorType.Rgb;

  const ihdr = new Uint8Array(13);
  writeUint32(ihdr, 0, width);
  writeUint32(ihdr, 4, height);
  ihdr[8] = bitsPerSample;
  ihdr[9] = colorType;

  // Filter type 0 on every row.
  const raw = new Uint8Array(height * (stride + 1));
  for (let y = 0; y < height; y++) {
    raw.set(samples.subarray(y * stride, (y + 1) * stride), y * (stride + 1) + 1);
  }

  if (metadata.bitsPerSample !== bitsPerSample) {
    (options.onWarning ?? defaultWarning)(
      `Metadata says ${metadata.bitsPerSample} bits per sample, writing ${bitsPerSample}`
    );
  }

  return writeChunks([
    { type: 'IHDR', data: ihdr },
    ...colorChunks(metadata.colorEncoding),
    ...metadataChunks(metadata, options.compressText),
    { type: 'IDAT', data: zlibSync(raw) },
    { type: 'IEND', data: new Uint8Array(0) },
  ]);
}
