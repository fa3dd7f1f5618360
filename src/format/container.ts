/**
 * Container layout:
 *
 * [FileHeader][pad to byte]
 * [PassHeader][pad to byte][payload]   repeated; each starts on a byte
 *
 * PassHeader.size is the byte distance from the start of that pass header
 * to the start of the next one. A size of 0 means the pass runs to the end
 * of the data.
 */

import { BitInputStream, BitOutputStream } from '../core/bit-stream.js';
import { HeaderError } from '../errors.js';
import {
  canEncodeFileHeader,
  fileNumGroups,
  readFileHeader,
  writeFileHeader,
  type FileHeader,
} from './file-header.js';
import {
  canEncodePassHeader,
  readPassHeader,
  writePassHeader,
  type PassHeader,
} from './pass-header.js';

export interface Pass {
  header: PassHeader;
  payload: Uint8Array;
}

export interface Container {
  file: FileHeader;
  passes: Pass[];
}

/**
 * Upper bound on size iterations; the U64 cost only grows in a few steps.
 */
const MAX_SIZE_ITERATIONS = 16;

/**
 * Find the self-consistent `size` of a pass: header bytes + payload bytes,
 * where the header bytes depend on how `size` itself is encoded.
 */
function sizedPassHeader(pass: Pass, numGroups: number): PassHeader {
  let header: PassHeader = { ...pass.header, size: BigInt(pass.payload.length) };
  for (let i = 0; i < MAX_SIZE_ITERATIONS; i++) {
    const headerBytes = Math.ceil(canEncodePassHeader(header, { numGroups }).totalBits / 8);
    const size = BigInt(headerBytes + pass.payload.length);
    if (size === header.size) return header;
    header = { ...header, size };
  }
  throw new Error('PassHeader size did not converge');
}

/**
 * Serialize a whole container. The caller's headers are not modified; each
 * pass's `size` is computed here.
 */
export function encodeContainer(container: Container): Uint8Array {
  const out = new BitOutputStream();
  const { file, passes } = container;
  const numGroups = fileNumGroups(file);

  writeFileHeader(file, canEncodeFileHeader(file), out);
  out.flush();

  for (const pass of passes) {
    const header = sizedPassHeader(pass, numGroups);
    writePassHeader(header, canEncodePassHeader(header, { numGroups }), out, { numGroups });
    out.flush();
    out.writeBytes(pass.payload);
  }

  return out.toUint8Array();
}

/**
 * Parse a container: the FileHeader, then every pass until the data ends.
 */
export function decodeContainer(data: Uint8Array): Container {
  const reader = new BitInputStream(data);
  const file = readFileHeader(reader);
  const numGroups = fileNumGroups(file);

  const passes: Pass[] = [];
  let start = reader.byteOffset;
  while (start < data.length) {
    const passReader = new BitInputStream(data.subarray(start));
    const header = readPassHeader(passReader, { numGroups });
    const headerEnd = start + passReader.byteOffset;

    let end: number;
    if (header.size === 0n) {
      end = data.length;
    } else {
      const size = header.size;
      if (size > BigInt(data.length - start)) {
        throw new HeaderError(
          'InvalidPassSize',
          `Pass at byte ${start} has size ${size}, only ${data.length - start} bytes left`,
          'PassHeader'
        );
      }
      end = start + Number(size);
      if (end < headerEnd) {
        throw new HeaderError(
          'InvalidPassSize',
          `Pass at byte ${start} has size ${size}, smaller than its ${headerEnd - start}-byte header`,
          'PassHeader'
        );
      }
    }

    passes.push({ header, payload: data.slice(headerEnd, end) });
    start = end;
  }

  return { file, passes };
}

/**
 * Byte range of a group inside a pass payload.
 */
export interface GroupRange {
  start: number;
  end: number;
}

/**
 * Non-overlapping byte ranges of every group, from the pass's table of
 * contents. Each range can be decoded independently.
 */
export function groupRanges(pass: PassHeader): GroupRange[] {
  const ranges: GroupRange[] = [];
  let offset = 0;
  for (const size of pass.groupSizes) {
    ranges.push({ start: offset, end: offset + size });
    offset += size;
  }
  return ranges;
}

/**
 * Slice a pass payload into per-group views.
 */
export function splitGroups(pass: PassHeader, payload: Uint8Array): Uint8Array[] {
  const ranges = groupRanges(pass);
  const total = ranges.length > 0 ? ranges[ranges.length - 1].end : 0;
  if (total > payload.length) {
    throw new HeaderError(
      'TruncatedStream',
      `Groups need ${total} bytes, payload has ${payload.length}`,
      'PassHeader'
    );
  }
  return ranges.map((range) => payload.subarray(range.start, range.end));
}
