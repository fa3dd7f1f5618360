export {
  FILE_SIGNATURE,
  BLOCK_DIM,
  TILE_DIM,
  GROUP_DIM,
  TILE_DIM_IN_BLOCKS,
  GROUP_DIM_IN_BLOCKS,
  NUM_TILES_PER_GROUP,
  NUM_PROJECTIVE_TRANSFORM_PARAMS,
  numGroups,
} from './constants.js';

export {
  type ProjectiveTransformParams,
  type TileHeader,
  PROJECTIVE_TRANSFORM_FIELDS,
  TILE_HEADER_FIELDS,
  createTileHeader,
  canEncodeTileHeader,
  writeTileHeader,
  readTileHeader,
} from './tile-header.js';

export {
  type Alpha,
  type GroupHeader,
  type GroupHeaderContext,
  DEFAULT_GROUP_HEADER_CONTEXT,
  ALPHA_FIELDS,
  GROUP_HEADER_FIELDS,
  createGroupHeader,
  canEncodeGroupHeader,
  writeGroupHeader,
  readGroupHeader,
} from './group-header.js';

export {
  ImageEncoding,
  GaborishStrength,
  PassFlags,
  type FrameInfo,
  type RestorationParams,
  type PassHeader,
  type PassHeaderContext,
  FRAME_INFO_FIELDS,
  RESTORATION_FIELDS,
  PASS_HEADER_FIELDS,
  createPassHeader,
  canEncodePassHeader,
  writePassHeader,
  readPassHeader,
} from './pass-header.js';

export {
  ColorSpace,
  WhitePoint,
  Primaries,
  TransferFunction,
  RenderingIntent,
  DEFAULT_GAMMA,
  WHITE_POINT_XY,
  PRIMARIES_XY,
  type Chromaticity,
  type PrimariesXy,
  type ColorEncoding,
  CHROMATICITY_FIELDS,
  COLOR_ENCODING_FIELDS,
  createColorEncoding,
  whitePointXy,
  primariesXy,
  isSrgb,
} from './color-encoding.js';

export { type Metadata, METADATA_FIELDS, createMetadata } from './metadata.js';

export {
  type Preview,
  type Animation,
  type FileHeader,
  type ImageDescriptor,
  PREVIEW_FIELDS,
  ANIMATION_FIELDS,
  FILE_HEADER_FIELDS,
  createFileHeader,
  imageWidth,
  imageHeight,
  fileNumGroups,
  fileHeaderFromImage,
  canEncodeFileHeader,
  writeFileHeader,
  readFileHeader,
} from './file-header.js';

export {
  type Pass,
  type Container,
  type GroupRange,
  encodeContainer,
  decodeContainer,
  groupRanges,
  splitGroups,
} from './container.js';
