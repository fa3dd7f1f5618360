import { describe, it, expect } from 'vitest';
import { BitOutputStream } from '../src/core/bit-stream.js';
import { HeaderError } from '../src/errors.js';
import {
  decodeContainer,
  encodeContainer,
  groupRanges,
  splitGroups,
  type Container,
} from '../src/format/container.js';
import {
  canEncodeFileHeader,
  createFileHeader,
  writeFileHeader,
  type FileHeader,
} from '../src/format/file-header.js';
import {
  canEncodePassHeader,
  createPassHeader,
  writePassHeader,
  type PassHeader,
} from '../src/format/pass-header.js';

function passWithGroups(groupSizes: number[]): PassHeader {
  const header = createPassHeader();
  header.groupSizes = groupSizes;
  return header;
}

/** File header plus one pass whose size field is given verbatim. */
function rawContainer(file: FileHeader, header: PassHeader, payload: number[]): Uint8Array {
  const out = new BitOutputStream();
  writeFileHeader(file, canEncodeFileHeader(file), out);
  out.flush();
  writePassHeader(header, canEncodePassHeader(header), out);
  out.flush();
  out.writeBytes(new Uint8Array(payload));
  return out.toUint8Array();
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('encodeContainer / decodeContainer', () => {
  it('should compute each pass size including its own header', () => {
    const container: Container = {
      file: createFileHeader(),
      passes: [{ header: passWithGroups([3]), payload: new Uint8Array([1, 2, 3]) }],
    };
    const data = encodeContainer(container);

    // 8-byte file header, 6-byte pass header, 3-byte payload
    expect(data.length).toBe(17);

    const decoded = decodeContainer(data);
    expect(decoded.passes.length).toBe(1);
    expect(decoded.passes[0].header.size).toBe(9n);
    expect(Array.from(decoded.passes[0].payload)).toEqual([1, 2, 3]);
    expect(container.passes[0].header.size).toBe(0n);
  });

  it('should settle sizes whose encoding grows with the size', () => {
    const payload = new Uint8Array(300).fill(7);
    const data = encodeContainer({
      file: createFileHeader(),
      passes: [{ header: passWithGroups([300]), payload }],
    });

    const [pass] = decodeContainer(data).passes;
    // 300 bytes + 7-byte header (size itself takes 15 bits)
    expect(pass.header.size).toBe(307n);
    expect(pass.payload).toEqual(payload);
  });

  it('should decode consecutive passes', () => {
    const first = passWithGroups([2]);
    first.isLast = false;
    const data = encodeContainer({
      file: createFileHeader(),
      passes: [
        { header: first, payload: new Uint8Array([1, 2]) },
        { header: passWithGroups([1]), payload: new Uint8Array([9]) },
      ],
    });

    const { passes } = decodeContainer(data);
    expect(passes.map((pass) => Array.from(pass.payload))).toEqual([[1, 2], [9]]);
    expect(passes.map((pass) => pass.header.isLast)).toEqual([false, true]);
  });

  it('should decode a file without passes', () => {
    const file = createFileHeader();
    file.xsizeMinus1 = 99;

    const decoded = decodeContainer(encodeContainer({ file, passes: [] }));
    expect(decoded.file).toEqual(file);
    expect(decoded.passes).toEqual([]);
  });

  it('should treat size 0 as running to the end', () => {
    const data = rawContainer(createFileHeader(), passWithGroups([4]), [5, 6, 7, 8]);
    const [pass] = decodeContainer(data).passes;

    expect(pass.header.size).toBe(0n);
    expect(Array.from(pass.payload)).toEqual([5, 6, 7, 8]);
  });

  it('should reject sizes past the end of the data', () => {
    const header = passWithGroups([4]);
    header.size = 1000n;
    const data = rawContainer(createFileHeader(), header, [5, 6, 7, 8]);
    const error = catchError(() => decodeContainer(data));

    expect(error instanceof HeaderError && error.code).toBe('InvalidPassSize');
  });

  it('should reject a group count the input cannot hold', () => {
    const file = createFileHeader();
    file.xsizeMinus1 = 0xffffffff;
    file.ysizeMinus1 = 0xffffffff;
    const out = new BitOutputStream();
    writeFileHeader(file, canEncodeFileHeader(file), out);
    out.flush();
    out.writeBytes(new Uint8Array(4));

    const error = catchError(() => decodeContainer(out.toUint8Array()));

    expect(error instanceof HeaderError && error.code).toBe('TruncatedStream');
    expect(error instanceof HeaderError && error.header).toBe('PassHeader');
  });

  it('should reject sizes smaller than the pass header', () => {
    const header = passWithGroups([4]);
    header.size = 2n;
    const data = rawContainer(createFileHeader(), header, [5, 6, 7, 8]);
    const error = catchError(() => decodeContainer(data));

    expect(error instanceof HeaderError && error.code).toBe('InvalidPassSize');
  });
});

describe('groupRanges / splitGroups', () => {
  it('should lay groups out back to back', () => {
    expect(groupRanges(passWithGroups([3, 0, 5]))).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 3 },
      { start: 3, end: 8 },
    ]);
  });

  it('should slice the payload per group', () => {
    const groups = splitGroups(passWithGroups([1, 2]), new Uint8Array([10, 20, 30, 40]));
    expect(groups.map((group) => Array.from(group))).toEqual([[10], [20, 30]]);
  });

  it('should reject tables larger than the payload', () => {
    const error = catchError(() => splitGroups(passWithGroups([10]), new Uint8Array(5)));
    expect(error instanceof HeaderError && error.code).toBe('TruncatedStream');
  });
});
