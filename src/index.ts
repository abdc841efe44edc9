// ─── Node ─────────────────────────────────────────────────────────────────────
export { Node, NodeType, isNode } from './node.js';
export type { NodeDecoder, NodePair } from './node.js';

// ─── Results and errors ───────────────────────────────────────────────────────
export { success, failure } from './result.js';
export type { ConversionFailure, DecodeResult, FailureKind } from './result.js';
export { NodeError, NodeDecodeError, NodeEncodeError, NodeTypeError } from './errors.js';

// ─── Converters ───────────────────────────────────────────────────────────────
export type {
  Category,
  ContainerCategory,
  ContainerConverter,
  Converter,
  DecodableCategory,
  Encoder,
  HostType,
} from './types.js';

export {
  parseBoolean,
  parseInteger,
  parseFloatText,
  formatFloat,
} from './scalars.js';
export type { FloatWidth } from './scalars.js';

export { binary, defaultBase64Codec } from './binary.js';
export type { Base64Codec, BinaryOptions } from './binary.js';

export { sequence, fixedArray, pair, map, record } from './containers.js';

// ─── Registry ─────────────────────────────────────────────────────────────────
export { CATEGORIES, t, isDecodable, encode, decode, decodeInto, as, asOr } from './registry.js';
export type { CategoryInfo } from './registry.js';

// ─── Plain values ─────────────────────────────────────────────────────────────
export { fromPlain, toPlain } from './plain.js';
export type { PlainValue, PlainObject, PlainTree, PlainTreeObject, PlainOptions } from './plain.js';
