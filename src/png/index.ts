export {
  PNG_SIGNATURE,
  type PngChunk,
  type WarningHandler,
  isPng,
  readChunks,
  writeChunks,
  findChunk,
} from './chunks.js';
export { crc32 } from './crc32.js';
export {
  type TextChunkType,
  type TextEntry,
  isTextChunk,
  parseTextChunk,
  textString,
  buildTextChunk,
} from './text.js';
export {
  RAW_PROFILE_PREFIX,
  type RawProfile,
  rawProfileKeyword,
  encodeRawProfile,
  decodeRawProfile,
} from './raw-profile.js';
export { PQ_PROFILE_NAME, iccColorSpace, readColorEncoding, colorChunks } from './color.js';
export { XMP_KEYWORD, readMetadataBlobs, metadataChunks } from './metadata.js';
export {
  PngColorType,
  type PngImage,
  type PngInfo,
  type PngReadOptions,
  type PngEncodeOptions,
  DEFAULT_PNG_ENCODE_OPTIONS,
  inspectPng,
  decodePng,
  encodePng,
} from './codec.js';
