/**
 * Format constants shared by the header types.
 */

/**
 * First 32 bits of every file. The newline makes text-mode transfers
 * detectable and 0xD7 does the same for 7-bit transports.
 */
export const FILE_SIGNATURE = 0x0a4d4cd7;

/** Block size in pixels. */
export const BLOCK_DIM = 8;

/** Tile edge in pixels. */
export const TILE_DIM = 64;

/** Group edge in pixels. */
export const GROUP_DIM = 512;

export const TILE_DIM_IN_BLOCKS = TILE_DIM / BLOCK_DIM;
export const GROUP_DIM_IN_BLOCKS = GROUP_DIM / BLOCK_DIM;

/** Every GroupHeader carries exactly this many TileHeaders. */
export const NUM_TILES_PER_GROUP =
  (GROUP_DIM_IN_BLOCKS / TILE_DIM_IN_BLOCKS) * (GROUP_DIM_IN_BLOCKS / TILE_DIM_IN_BLOCKS);

/** Number of projective-transform corner coordinates in a TileHeader. */
export const NUM_PROJECTIVE_TRANSFORM_PARAMS = 8;

/**
 * Number of groups covering an image; this is the length of each pass's
 * table of contents.
 */
export function numGroups(xsize: number, ysize: number): number {
  return Math.ceil(xsize / GROUP_DIM) * Math.ceil(ysize / GROUP_DIM);
}
