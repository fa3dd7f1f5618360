import { bits, distribution, val } from '../core/u32-coder.js';
import { BytesEncoding, type HeaderFields } from '../fields/visitor.js';
import {
  COLOR_ENCODING_FIELDS,
  createColorEncoding,
  type ColorEncoding,
} from './color-encoding.js';

/**
 * Image metadata: sample depth and color of the original, plus opaque
 * EXIF/IPTC/XMP blobs passed through from (and back to) other formats.
 */
export interface Metadata {
  /** Bits per sample of the original image. */
  bitsPerSample: number;
  colorEncoding: ColorEncoding;
  exif: Uint8Array;
  iptc: Uint8Array;
  xmp: Uint8Array;
}

const BITS_PER_SAMPLE_DIST = distribution(val(8), val(16), val(32), bits(5, 1));

export function createMetadata(): Metadata {
  return {
    bitsPerSample: 8,
    colorEncoding: createColorEncoding(),
    exif: new Uint8Array(0),
    iptc: new Uint8Array(0),
    xmp: new Uint8Array(0),
  };
}

export const METADATA_FIELDS: HeaderFields<Metadata> = {
  name: 'Metadata',
  create: createMetadata,

  visit(visitor, metadata, context) {
    if (visitor.allDefault(METADATA_FIELDS, metadata, context)) return;

    metadata.bitsPerSample = visitor.u32(BITS_PER_SAMPLE_DIST, 8, metadata.bitsPerSample);
    visitor.visitNested(COLOR_ENCODING_FIELDS, metadata.colorEncoding);

    metadata.exif = visitor.bytes(BytesEncoding.Raw, metadata.exif);
    metadata.iptc = visitor.bytes(BytesEncoding.Raw, metadata.iptc);
    metadata.xmp = visitor.bytes(BytesEncoding.Raw, metadata.xmp);
  },
};
