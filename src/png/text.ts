/**
 * PNG text chunks (tEXt, zTXt, iTXt).
 */

import { strFromU8, strToU8, unzlibSync, zlibSync } from 'fflate';
import { PngError } from '../errors.js';
import type { PngChunk } from './chunks.js';

export type TextChunkType = 'tEXt' | 'zTXt' | 'iTXt';

export interface TextEntry {
  type: TextChunkType;
  keyword: string;
  /** Decompressed text bytes: Latin-1 for tEXt/zTXt, UTF-8 for iTXt. */
  text: Uint8Array;
}

const MAX_KEYWORD_LENGTH = 79;

export function isTextChunk(type: string): type is TextChunkType {
  return type === 'tEXt' || type === 'zTXt' || type === 'iTXt';
}

export function inflate(data: Uint8Array, what: string): Uint8Array {
  try {
    return unzlibSync(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PngError('InvalidImage', `Cannot decompress ${what}: ${reason}`);
  }
}

/**
 * Index of the NUL ending a keyword-like field that starts at `start`.
 */
function terminator(data: Uint8Array, start: number, what: string): number {
  const end = data.indexOf(0, start);
  if (end < 0) {
    throw new PngError('InvalidImage', `Unterminated ${what}`);
  }
  return end;
}

function readKeyword(data: Uint8Array, type: string): { keyword: string; end: number } {
  const end = terminator(data, 0, `${type} keyword`);
  if (end === 0 || end > MAX_KEYWORD_LENGTH) {
    throw new PngError('InvalidImage', `${type} keyword must have 1 to ${MAX_KEYWORD_LENGTH} bytes`);
  }
  return { keyword: strFromU8(data.subarray(0, end), true), end };
}

/**
 * Parse a text chunk. Throws PngError 'InvalidImage' on a malformed body.
 */
export function parseTextChunk(type: TextChunkType, data: Uint8Array): TextEntry {
  const { keyword, end } = readKeyword(data, type);

  switch (type) {
    case 'tEXt':
      return { type, keyword, text: data.slice(end + 1) };

    case 'zTXt': {
      if (data[end + 1] !== 0) {
        throw new PngError('InvalidImage', `Unknown zTXt compression method ${data[end + 1]}`);
      }
      return { type, keyword, text: inflate(data.subarray(end + 2), `zTXt "${keyword}"`) };
    }

    case 'iTXt': {
      const compressed = data[end + 1];
      const method = data[end + 2];
      const languageEnd = terminator(data, end + 3, 'iTXt language tag');
      const translatedEnd = terminator(data, languageEnd + 1, 'iTXt translated keyword');
      const body = data.subarray(translatedEnd + 1);

      if (compressed === 0) {
        return { type, keyword, text: body.slice() };
      }
      if (compressed !== 1 || method !== 0) {
        throw new PngError('InvalidImage', `Unknown iTXt compression ${compressed}/${method}`);
      }
      return { type, keyword, text: inflate(body, `iTXt "${keyword}"`) };
    }
  }
}

/**
 * Text of an entry as a string, in the encoding its chunk type implies.
 */
export function textString(entry: TextEntry): string {
  return strFromU8(entry.text, entry.type !== 'iTXt');
}

/**
 * Build a text chunk; `compress` turns tEXt into zTXt and sets the iTXt
 * compression flag.
 */
export function buildTextChunk(
  keyword: string,
  text: Uint8Array,
  type: 'tEXt' | 'iTXt',
  compress: boolean
): PngChunk {
  const keywordBytes = strToU8(keyword, true);
  if (keywordBytes.length === 0 || keywordBytes.length > MAX_KEYWORD_LENGTH) {
    throw new RangeError(`Invalid text keyword "${keyword}"`);
  }
  const body = compress ? zlibSync(text) : text;

  // Keyword NUL [compression fields] body
  const header =
    type === 'iTXt'
      ? // flag, method, empty language tag NUL, empty translated keyword NUL
        [0, compress ? 1 : 0, 0, 0, 0]
      : compress
        ? [0, 0]
        : [0];

  const data = new Uint8Array(keywordBytes.length + header.length + body.length);
  data.set(keywordBytes, 0);
  data.set(header, keywordBytes.length);
  data.set(body, keywordBytes.length + header.length);

  const chunkType = type === 'iTXt' ? 'iTXt' : compress ? 'zTXt' : 'tEXt';
  return { type: chunkType, data };
}
