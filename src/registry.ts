/**
 * The closed set of conversion categories and the converters built on them.
 *
 * Every converter names one category; the table below is typed over the
 * whole `Category` union, so a category that is missing, repeated or
 * inconsistent about decoding fails to compile.
 */

import { binary } from './binary.js';
import { fixedArray, map, pair, record, sequence } from './containers.js';
import { Node, NodeType, type NodeDecoder } from './node.js';
import { failure, type DecodeResult } from './result.js';
import {
  bool,
  char,
  float32,
  float64,
  int16,
  int32,
  int64,
  int8,
  literal,
  node,
  nullValue,
  string,
  uint16,
  uint32,
  uint64,
  uint8,
} from './scalars.js';
import type { Category, ContainerConverter, Converter, DecodableCategory, Encoder } from './types.js';

export interface CategoryInfo<C extends Category> {
  /** Node tag the category decodes from; `any` for the node itself, `none` when it cannot decode. */
  readonly reads: NodeType | 'any' | 'none';
  readonly decodable: C extends DecodableCategory ? true : false;
}

export const CATEGORIES = {
  'boolean': { reads: NodeType.Scalar, decodable: true },
  'signed-integer': { reads: NodeType.Scalar, decodable: true },
  'unsigned-integer': { reads: NodeType.Scalar, decodable: true },
  'floating-point': { reads: NodeType.Scalar, decodable: true },
  'character-unit': { reads: NodeType.Scalar, decodable: true },
  'string': { reads: NodeType.Scalar, decodable: true },
  'null': { reads: NodeType.Null, decodable: true },
  'node': { reads: 'any', decodable: true },
  'sequence': { reads: NodeType.Sequence, decodable: true },
  'fixed-array': { reads: NodeType.Sequence, decodable: true },
  'pair': { reads: NodeType.Sequence, decodable: true },
  'map': { reads: NodeType.Map, decodable: true },
  'binary': { reads: NodeType.Scalar, decodable: true },
  'encode-only-text': { reads: 'none', decodable: false },
} as const satisfies { readonly [C in Category]: CategoryInfo<C> };

/** Converters, created once. */
export const t = Object.freeze({
  bool,
  int8,
  int16,
  int32,
  int64,
  uint8,
  uint16,
  uint32,
  uint64,
  float32,
  float64,
  char,
  string,
  null: nullValue,
  node,
  binary: binary(),
  literal,
  sequence,
  fixedArray,
  pair,
  map,
  record,
});

/** True when the encoder's category supports decoding. */
export function isDecodable<T>(encoder: Encoder<T>): encoder is Converter<T> {
  return CATEGORIES[encoder.category].decodable && 'decode' in encoder;
}

export function encode<T>(encoder: Encoder<T>, value: T): Node {
  return encoder.encode(value);
}

/** Reject a node whose tag the converter's category does not read. */
function checkReads(converter: Converter<unknown>, source: Node): DecodeResult<never> | undefined {
  const reads = CATEGORIES[converter.category].reads;
  if (reads === 'any' || reads === source.type) return undefined;
  return failure('type-mismatch', `${converter.name} requires a ${reads} node, got ${source.type}`);
}

/** Decode after checking the node's tag against the converter's category. */
export function decode<T>(converter: Converter<T>, source: Node): DecodeResult<T> {
  return checkReads(converter, source) ?? converter.decode(source);
}

/** Decode into `dest` in place; on failure `dest` may be partly written. */
export function decodeInto<T>(converter: ContainerConverter<T>, source: Node, dest: T): DecodeResult<T> {
  return checkReads(converter, source) ?? converter.decodeInto(source, dest);
}

/** Decode or throw NodeDecodeError. */
export function as<T>(source: Node, decoder: NodeDecoder<T>): T {
  return source.as(decoder);
}

/** Decode or return `fallback`. */
export function asOr<T, F = T>(source: Node, decoder: NodeDecoder<T>, fallback: F): T | F {
  return source.asOr(decoder, fallback);
}
