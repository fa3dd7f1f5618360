/**
 * "Raw profile type <kind>" text chunks, the way ImageMagick stores EXIF,
 * IPTC and XMP in PNG:
 *
 *   \n<kind>\n<byte count, %8u>\n<hex, 36 bytes per line>\n
 */

export const RAW_PROFILE_PREFIX = 'Raw profile type ';

const BYTES_PER_LINE = 36;
const MAX_KIND_LENGTH = 20;

const HEADER_PATTERN = /^\n[^\n]*\n *(\d+)/;
const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export type RawProfile =
  | { ok: true; kind: string; bytes: Uint8Array }
  | { ok: false; kind: string; reason: string };

export function rawProfileKeyword(kind: string): string {
  return RAW_PROFILE_PREFIX + kind;
}

export function encodeRawProfile(kind: string, bytes: Uint8Array): string {
  const parts = [`\n${kind}\n${String(bytes.length).padStart(8, ' ')}`];
  // High nibble first, as ImageMagick writes it; some writers swap the nibbles.
  for (let i = 0; i < bytes.length; i++) {
    if (i % BYTES_PER_LINE === 0) parts.push('\n');
    parts.push(bytes[i].toString(16).padStart(2, '0'));
  }
  parts.push('\n');
  return parts.join('');
}

/**
 * Decode a raw profile. Returns null when the keyword is not a raw profile
 * at all.
 */
export function decodeRawProfile(keyword: string, text: string): RawProfile | null {
  if (!keyword.startsWith(RAW_PROFILE_PREFIX)) return null;

  const kind = keyword.slice(RAW_PROFILE_PREFIX.length);
  const fail = (reason: string): RawProfile => ({ ok: false, kind, reason });

  if (kind.length === 0 || kind.length > MAX_KIND_LENGTH) {
    return fail(`Invalid raw profile kind "${kind}"`);
  }

  const header = HEADER_PATTERN.exec(text);
  if (header === null) {
    return fail(`Malformed header in raw profile "${kind}"`);
  }

  const count = Number(header[1]);
  const hex = text.slice(header[0].length).replace(/\s+/g, '');
  if (hex.length !== count * 2) {
    return fail(`Raw profile "${kind}" declares ${count} bytes but holds ${hex.length / 2}`);
  }
  if (!HEX_PATTERN.test(hex)) {
    return fail(`Invalid hex digit in raw profile "${kind}"`);
  }

  const bytes = new Uint8Array(count);
  for (let i = 0; i < count; i++) {
    bytes[i] = parseInt(hex.slice(2 * i, 2 * i + 2), 16);
  }
  return { ok: true, kind, bytes };
}
