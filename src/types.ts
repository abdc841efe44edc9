/**
 * Converter contracts. A converter stands for one host type and belongs to
 * exactly one category; the category decides which node tag it reads.
 */

import type { Node, NodeDecoder } from './node.js';
import type { DecodeResult } from './result.js';

export type Category =
  | 'boolean'
  | 'signed-integer'
  | 'unsigned-integer'
  | 'floating-point'
  | 'character-unit'
  | 'string'
  | 'null'
  | 'node'
  | 'sequence'
  | 'fixed-array'
  | 'pair'
  | 'map'
  | 'binary'
  | 'encode-only-text';

export type DecodableCategory = Exclude<Category, 'encode-only-text'>;

export type ContainerCategory = Extract<Category, 'sequence' | 'fixed-array' | 'pair' | 'map'>;

export interface Encoder<T, C extends Category = Category> {
  readonly category: C;
  /** Type name used in error messages, e.g. "int32" or "sequence<string>". */
  readonly name: string;
  /** Total over the host type's domain. */
  encode(value: T): Node;
}

export interface Converter<T, C extends DecodableCategory = DecodableCategory>
  extends Encoder<T, C>,
    NodeDecoder<T> {}

/**
 * Container converters can also decode into a caller-owned destination.
 * On failure part of `dest` may already be overwritten; `decode` stages
 * into a fresh destination instead.
 */
export interface ContainerConverter<T, C extends ContainerCategory = ContainerCategory>
  extends Converter<T, C> {
  decodeInto(node: Node, dest: T): DecodeResult<T>;
}

/** Host type a converter stands for. */
export type HostType<E> = E extends Encoder<infer T> ? T : never;
