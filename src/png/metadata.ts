/**
 * EXIF, IPTC and XMP blobs carried in PNG chunks.
 *
 * Recognized on read:
 * - eXIf (when repeated, the largest wins)
 * - iTXt whose keyword contains "XML:com.adobe.xmp"
 * - tEXt/zTXt/iTXt "Raw profile type exif|iptc|xmp"
 *
 * Written as raw profiles for EXIF and IPTC, and as an XMP iTXt.
 */

import { strToU8 } from 'fflate';
import { PngError } from '../errors.js';
import type { Metadata } from '../format/metadata.js';
import type { PngChunk, WarningHandler } from './chunks.js';
import { decodeRawProfile, encodeRawProfile, rawProfileKeyword } from './raw-profile.js';
import { buildTextChunk, isTextChunk, parseTextChunk, textString, type TextEntry } from './text.js';

export const XMP_KEYWORD = 'XML:com.adobe.xmp';

type BlobKind = 'exif' | 'iptc' | 'xmp';

function isBlobKind(kind: string): kind is BlobKind {
  return kind === 'exif' || kind === 'iptc' || kind === 'xmp';
}

function storeBlob(metadata: Metadata, kind: BlobKind, bytes: Uint8Array, warn: WarningHandler): void {
  if (metadata[kind].length > 0) {
    warn(`Multiple ${kind} blocks in PNG; keeping the last one`);
  }
  metadata[kind] = bytes;
}

function readTextEntries(chunks: readonly PngChunk[], warn: WarningHandler): TextEntry[] {
  const entries: TextEntry[] = [];
  for (const { type, data } of chunks) {
    if (!isTextChunk(type)) continue;
    try {
      entries.push(parseTextChunk(type, data));
    } catch (error) {
      if (!(error instanceof PngError)) throw error;
      warn(`${error.message}; skipping ${type} chunk`);
    }
  }
  return entries;
}

/**
 * Fill the blobs of `metadata` from a PNG's chunks. Malformed entries are
 * reported through `warn` and skipped.
 */
export function readMetadataBlobs(
  chunks: readonly PngChunk[],
  metadata: Metadata,
  warn: WarningHandler
): void {
  for (const entry of readTextEntries(chunks, warn)) {
    if (entry.type === 'iTXt' && entry.keyword.includes(XMP_KEYWORD)) {
      storeBlob(metadata, 'xmp', entry.text, warn);
      continue;
    }

    const profile = decodeRawProfile(entry.keyword, textString(entry));
    if (profile === null) continue;

    if (!profile.ok) {
      warn(`PNG metadata may be incomplete: ${profile.reason}`);
    } else if (isBlobKind(profile.kind)) {
      storeBlob(metadata, profile.kind, profile.bytes, warn);
    } else {
      warn(`Unknown raw profile kind "${profile.kind}"; ignoring it`);
    }
  }

  // eXIf is preferred over a raw EXIF profile unless it is smaller.
  for (const { type, data } of chunks) {
    if (type === 'eXIf' && data.length >= metadata.exif.length) {
      metadata.exif = data.slice();
    }
  }
}

/**
 * Text chunks carrying the non-empty blobs of `metadata`.
 */
export function metadataChunks(metadata: Metadata, compressText: boolean): PngChunk[] {
  const chunks: PngChunk[] = [];
  for (const kind of ['exif', 'iptc'] as const) {
    const bytes = metadata[kind];
    if (bytes.length === 0) continue;
    const text = strToU8(encodeRawProfile(kind, bytes), true);
    chunks.push(buildTextChunk(rawProfileKeyword(kind), text, 'tEXt', compressText));
  }
  if (metadata.xmp.length > 0) {
    chunks.push(buildTextChunk(XMP_KEYWORD, metadata.xmp, 'iTXt', false));
  }
  return chunks;
}
