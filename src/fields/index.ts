export {
  type FieldVisitor,
  type HeaderFields,
  type EnumDescriptor,
  BytesEncoding,
  EXTENSION_BITS_DIST,
  defineEnum,
} from './visitor.js';
export { AllDefaultVisitor } from './all-default-visitor.js';
export { EncodingVisitor, MeasuringVisitor, WritingVisitor } from './encoding-visitor.js';
export { ReadingVisitor } from './reading-visitor.js';
export {
  type SizeReport,
  canEncode,
  writeHeader,
  readHeader,
  encodeHeader,
} from './codec.js';
