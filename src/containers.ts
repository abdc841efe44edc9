/**
 * Sequences, fixed-size arrays, pairs and keyed mappings. Elements, keys and
 * values go through their own converters.
 *
 * `decodeInto` writes into the caller's destination as it goes: if an element
 * fails half way, whatever was already written stays written. `decode` runs
 * the same steps against a fresh destination and only returns it on success.
 */

import { NodeEncodeError } from './errors.js';
import { Node, NodeType } from './node.js';
import { failure, success, type DecodeResult } from './result.js';
import { string } from './scalars.js';
import type { ContainerConverter, Converter } from './types.js';

function requireTag(node: Node, type: NodeType, name: string): DecodeResult<Node> {
  if (node.type !== type) {
    return failure('type-mismatch', `${name} requires a ${type} node, got ${node.type}`);
  }
  return success(node);
}

/**
 * Own enumerable data property. Plain assignment would treat `__proto__` as
 * the prototype setter and drop the entry.
 */
export function defineEntry<V>(obj: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(obj, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Variable-length sequence of `of`. */
export function sequence<T>(of: Converter<T>): ContainerConverter<T[], 'sequence'> {
  const name = `sequence<${of.name}>`;

  function decodeInto(node: Node, dest: T[]): DecodeResult<T[]> {
    const checked = requireTag(node, NodeType.Sequence, name);
    if (!checked.ok) return checked;
    dest.length = 0;
    for (const item of node) {
      const result = of.decode(item);
      if (!result.ok) return result;
      dest.push(result.value);
    }
    return success(dest);
  }

  return {
    category: 'sequence',
    name,
    encode(value) {
      const out = Node.of(NodeType.Sequence);
      for (const item of value) out.pushBack(of.encode(item));
      return out;
    },
    decodeInto,
    decode: (node) => decodeInto(node, []),
  };
}

/**
 * Array of exactly `size` elements. The length is checked before any slot
 * is written.
 */
export function fixedArray<T>(of: Converter<T>, size: number): ContainerConverter<T[], 'fixed-array'> {
  const name = `array<${of.name}, ${size}>`;

  function decodeInto(node: Node, dest: T[]): DecodeResult<T[]> {
    const checked = requireTag(node, NodeType.Sequence, name);
    if (!checked.ok) return checked;
    if (node.size !== size) {
      return failure('shape-mismatch', `${name} requires ${size} elements, got ${node.size}`);
    }
    for (let i = 0; i < size; i++) {
      const result = of.decode(node.at(i));
      if (!result.ok) return result;
      dest[i] = result.value;
    }
    return success(dest);
  }

  return {
    category: 'fixed-array',
    name,
    encode(value) {
      if (value.length !== size) {
        throw new NodeEncodeError(`${name} requires ${size} elements, got ${value.length}`);
      }
      const out = Node.of(NodeType.Sequence);
      for (const item of value) out.pushBack(of.encode(item));
      return out;
    },
    decodeInto,
    decode: (node) => decodeInto(node, []),
  };
}

/** Two-element sequence `[first, second]`. */
export function pair<A, B>(first: Converter<A>, second: Converter<B>): ContainerConverter<[A, B], 'pair'> {
  const name = `pair<${first.name}, ${second.name}>`;

  function checkShape(node: Node): DecodeResult<Node> {
    const checked = requireTag(node, NodeType.Sequence, name);
    if (!checked.ok) return checked;
    if (node.size !== 2) {
      return failure('shape-mismatch', `${name} requires 2 elements, got ${node.size}`);
    }
    return checked;
  }

  return {
    category: 'pair',
    name,
    encode: ([a, b]) => Node.sequence([first.encode(a), second.encode(b)]),
    decodeInto(node, dest) {
      const checked = checkShape(node);
      if (!checked.ok) return checked;
      const a = first.decode(node.at(0));
      if (!a.ok) return a;
      dest[0] = a.value;
      const b = second.decode(node.at(1));
      if (!b.ok) return b;
      dest[1] = b.value;
      return success(dest);
    },
    decode(node) {
      const checked = checkShape(node);
      if (!checked.ok) return checked;
      const a = first.decode(node.at(0));
      if (!a.ok) return a;
      const b = second.decode(node.at(1));
      if (!b.ok) return b;
      return success<[A, B]>([a.value, b.value]);
    },
  };
}

/**
 * Keyed mapping. Duplicate keys in the node: the last one wins. Keys are
 * duplicates when their nodes are equal, so a repeated sequence or binary key
 * lands on the same `Map` entry even though each decode builds a new object.
 */
export function map<K, V>(key: Converter<K>, value: Converter<V>): ContainerConverter<Map<K, V>, 'map'> {
  const name = `map<${key.name}, ${value.name}>`;

  function decodeInto(node: Node, dest: Map<K, V>): DecodeResult<Map<K, V>> {
    const checked = requireTag(node, NodeType.Map, name);
    if (!checked.ok) return checked;
    dest.clear();
    const seen: Array<[Node, K]> = [];
    for (const [k, v] of node.entries()) {
      let hostKey: K;
      const earlier = seen.find(([prev]) => prev.equals(k));
      if (earlier) {
        hostKey = earlier[1];
      } else {
        const decodedKey = key.decode(k);
        if (!decodedKey.ok) return decodedKey;
        hostKey = decodedKey.value;
        if (typeof hostKey === 'object' && hostKey !== null) seen.push([k, hostKey]);
      }
      const decodedValue = value.decode(v);
      if (!decodedValue.ok) return decodedValue;
      dest.set(hostKey, decodedValue.value);
    }
    return success(dest);
  }

  return {
    category: 'map',
    name,
    encode(entries) {
      const out = Node.of(NodeType.Map);
      for (const [k, v] of entries) out.forceInsert(key.encode(k), value.encode(v));
      return out;
    },
    decodeInto,
    decode: (node) => decodeInto(node, new Map()),
  };
}

/** String-keyed mapping as a plain object. */
export function record<V>(value: Converter<V>): ContainerConverter<Record<string, V>, 'map'> {
  const name = `record<${value.name}>`;

  function decodeInto(node: Node, dest: Record<string, V>): DecodeResult<Record<string, V>> {
    const checked = requireTag(node, NodeType.Map, name);
    if (!checked.ok) return checked;
    for (const k of Object.keys(dest)) delete dest[k];
    for (const [k, v] of node.entries()) {
      const decodedKey = string.decode(k);
      if (!decodedKey.ok) return decodedKey;
      const decodedValue = value.decode(v);
      if (!decodedValue.ok) return decodedValue;
      defineEntry(dest, decodedKey.value, decodedValue.value);
    }
    return success(dest);
  }

  return {
    category: 'map',
    name,
    encode(obj) {
      const out = Node.of(NodeType.Map);
      for (const k of Object.keys(obj)) out.forceInsert(string.encode(k), value.encode(obj[k]!));
      return out;
    },
    decodeInto,
    decode: (node) => decodeInto(node, {}),
  };
}
