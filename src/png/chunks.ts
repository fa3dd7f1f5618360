/**
 * PNG chunk framing: [length: 4][type: 4][data: length][crc: 4], big-endian.
 */

import { crc32 } from './crc32.js';

export const PNG_SIGNATURE = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export interface PngChunk {
  type: string;
  data: Uint8Array;
}

export type WarningHandler = (message: string) => void;

export function readUint32(bytes: Uint8Array, offset: number): number {
  return (
    ((bytes[offset] << 24) |
      (bytes[offset + 1] << 16) |
      (bytes[offset + 2] << 8) |
      bytes[offset + 3]) >>>
    0
  );
}

export function writeUint32(bytes: Uint8Array, offset: number, value: number): void {
  bytes[offset] = (value >>> 24) & 0xff;
  bytes[offset + 1] = (value >>> 16) & 0xff;
  bytes[offset + 2] = (value >>> 8) & 0xff;
  bytes[offset + 3] = value & 0xff;
}

/** PNG stores chromaticities and gamma as signed 32-bit. */
export function readInt32(bytes: Uint8Array, offset: number): number {
  return readUint32(bytes, offset) | 0;
}

export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

function typeOf(bytes: Uint8Array, offset: number): string {
  return String.fromCharCode(bytes[offset], bytes[offset + 1], bytes[offset + 2], bytes[offset + 3]);
}

/**
 * Split a PNG into chunks. Damaged chunks are reported and dropped; a
 * truncated chunk ends the list.
 */
export function readChunks(bytes: Uint8Array, warn: WarningHandler): PngChunk[] {
  const chunks: PngChunk[] = [];
  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= bytes.length) {
    const length = readUint32(bytes, offset);
    const type = typeOf(bytes, offset + 4);
    const dataStart = offset + 8;
    const dataEnd = dataStart + length;

    if (dataEnd + 4 > bytes.length) {
      warn(`Truncated ${type} chunk at byte ${offset}`);
      break;
    }

    const expected = readUint32(bytes, dataEnd);
    if (crc32(bytes.subarray(offset + 4, dataEnd)) !== expected) {
      warn(`CRC mismatch in ${type} chunk at byte ${offset}; ignoring it`);
    } else {
      chunks.push({ type, data: bytes.subarray(dataStart, dataEnd) });
    }

    offset = dataEnd + 4;
    if (type === 'IEND') break;
  }

  return chunks;
}

/**
 * Serialize chunks after the PNG signature, computing lengths and CRCs.
 */
export function writeChunks(chunks: readonly PngChunk[]): Uint8Array {
  let total = PNG_SIGNATURE.length;
  for (const chunk of chunks) {
    total += 12 + chunk.data.length;
  }

  const out = new Uint8Array(total);
  out.set(PNG_SIGNATURE, 0);
  let offset = PNG_SIGNATURE.length;

  for (const chunk of chunks) {
    writeUint32(out, offset, chunk.data.length);
    const typeStart = offset + 4;
    for (let i = 0; i < 4; i++) {
      out[typeStart + i] = chunk.type.charCodeAt(i);
    }
    out.set(chunk.data, offset + 8);
    const dataEnd = offset + 8 + chunk.data.length;
    writeUint32(out, dataEnd, crc32(out.subarray(typeStart, dataEnd)));
    offset = dataEnd + 4;
  }

  return out;
}

export function findChunk(chunks: readonly PngChunk[], type: string): PngChunk | undefined {
  return chunks.find((chunk) => chunk.type === type);
}
