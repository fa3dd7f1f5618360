/**
 * Example: Wrap a PNG's pixels and metadata in a container, then read it
 * back and write the PNG again.
 *
 * Usage:
 *   npx tsx examples/png-to-container.ts input.png [output.png]
 *
 * The payload here is the raw PNG pixel buffer in a single group; a real
 * encoder would split it into 512x512 groups.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ImageEncoding,
  createPassHeader,
  decodeContainer,
  decodePng,
  encodeContainer,
  encodePng,
  fileHeaderFromImage,
  fileNumGroups,
  imageHeight,
  imageWidth,
  splitGroups,
  type PngImage,
} from '../src/index.js';

interface Options {
  input: string;
  output: string;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  if (args.length < 1) {
    console.error('Usage: png-to-container.ts input.png [output.png]');
    process.exit(1);
  }
  const input = args[0];
  const output = args[1] ?? path.join(path.dirname(input), `${path.basename(input, '.png')}.roundtrip.png`);
  return { input, output };
}

function main() {
  const options = parseArgs();
  const image = decodePng(fs.readFileSync(options.input));
  if (image === null) {
    console.error(`${options.input} is not a PNG`);
    process.exit(1);
  }

  console.log('📷 Input:');
  console.log(`  Size: ${image.width}x${image.height}`);
  console.log(`  Layout: ${image.isGray ? 'gray' : 'RGB'}${image.hasAlpha ? ' + alpha' : ''}, ${image.bitsPerSample}-bit`);
  console.log(`  EXIF: ${image.metadata.exif.length} bytes`);
  console.log(`  IPTC: ${image.metadata.iptc.length} bytes`);
  console.log(`  XMP:  ${image.metadata.xmp.length} bytes`);
  console.log();

  const file = fileHeaderFromImage(image);
  if (fileNumGroups(file) !== 1) {
    console.log(`⚠️  ${fileNumGroups(file)} groups; storing all pixels in the first one`);
  }

  const header = createPassHeader();
  header.encoding = ImageEncoding.Lossless;
  header.lossless16Bits = image.bitsPerSample === 16;
  header.losslessGrayscale = image.isGray;
  header.hasAlpha = image.hasAlpha;
  header.groupSizes = new Array<number>(fileNumGroups(file)).fill(0);
  header.groupSizes[0] = image.samples.length;

  let data: Uint8Array;
  try {
    data = encodeContainer({ file, passes: [{ header, payload: image.samples }] });
  } catch (error) {
    // Group sizes are limited to 21 bits.
    console.error(`❌ Cannot encode: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
  console.log(`🗜️  Container: ${data.length} bytes`);

  const decoded = decodeContainer(data);
  const [pass] = decoded.passes;
  const [pixels] = splitGroups(pass.header, pass.payload);

  const restored: PngImage = {
    width: imageWidth(decoded.file),
    height: imageHeight(decoded.file),
    isGray: pass.header.losslessGrayscale,
    hasAlpha: pass.header.hasAlpha,
    bitsPerSample: pass.header.lossless16Bits ? 16 : 8,
    samples: pixels,
    metadata: decoded.file.metadata,
  };
  fs.writeFileSync(options.output, encodePng(restored));
  console.log(`✅ Wrote ${options.output}`);
}

main();
