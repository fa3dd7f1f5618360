/**
 * xlm-container
 *
 * Self-describing bit-packed headers for a tiled image container, and a PNG
 * bridge for metadata and pixels.
 *
 * @example
 * ```typescript
 * import { inspectPng, fileHeaderFromImage, encodeContainer } from 'xlm-container';
 *
 * const info = inspectPng(pngBytes);
 * if (info) {
 *   const file = fileHeaderFromImage(info);
 *   const data = encodeContainer({ file, passes: [] });
 * }
 * ```
 */

// Errors
export {
  HeaderError,
  PngError,
  isFormatMismatch,
  type HeaderErrorCode,
  type PngErrorCode,
} from './errors.js';

// Bit streams and integer coders
export * from './core/index.js';

// Field visitors (for defining new headers)
export * from './fields/index.js';

// Headers and container layout
export * from './format/index.js';

// PNG bridge
export * from './png/index.js';
