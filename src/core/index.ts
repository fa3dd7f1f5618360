export {
  BitOutputStream,
  BitInputStream,
  BitCounter,
  type BitSink,
  type BitSource,
} from './bit-stream.js';
export {
  type U32Alternative,
  type U32Distribution,
  type U32Choice,
  U32_MAX,
  SELECTOR_BITS,
  val,
  bits,
  distribution,
  rawBits,
  chooseU32,
  u32Cost,
  minU32Cost,
  writeU32Choice,
  readU32,
} from './u32-coder.js';
export { U64_MAX, isU64, u64Cost, writeU64, readU64 } from './u64-coder.js';
