/**
 * Plain JS values to node trees and back. Numbers and booleans are written
 * with the scalar formatting the converters use; reading back does not
 * interpret scalar text.
 */

import { binary } from './binary.js';
import { defineEntry } from './containers.js';
import { NodeDecodeError, NodeEncodeError } from './errors.js';
import { isNode, Node, NodeType } from './node.js';
import { bool, formatFloat } from './scalars.js';

/** Input accepted by fromPlain. */
export type PlainValue =
  | PlainObject
  | PlainValue[]
  | Map<PlainValue, PlainValue>
  | Node
  | Uint8Array
  | string
  | number
  | bigint
  | boolean
  | null;

export interface PlainObject {
  [key: string]: PlainValue;
}

/** Output of toPlain: every scalar stays text. */
export type PlainTree = PlainTreeObject | PlainTree[] | string | null;

export interface PlainTreeObject {
  [key: string]: PlainTree;
}

export interface PlainOptions {
  /** Max nesting depth (default 256) */
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 256;

const bytes = binary();

type Path = (string | number)[];

function isPlainObject(v: object): boolean {
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/**
 * Build a node tree from a plain value. Existing nodes are shared, not
 * copied.
 */
export function fromPlain(value: PlainValue, options: PlainOptions = {}): Node {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  function build(v: PlainValue, depth: number, path: Path): Node {
    if (depth > maxDepth) {
      throw new NodeEncodeError('Maximum nesting depth exceeded', { path });
    }
    if (v === null) return Node.null();
    if (typeof v === 'boolean') return bool.encode(v);
    if (typeof v === 'string') return Node.scalar(v);
    if (typeof v === 'bigint') return Node.scalar(v.toString());
    if (typeof v === 'number') {
      return Node.scalar(Number.isSafeInteger(v) && !Object.is(v, -0) ? String(v) : formatFloat(v));
    }
    if (isNode(v)) return v;
    if (v instanceof Uint8Array) return bytes.encode(v);
    if (Array.isArray(v)) {
      const out = Node.of(NodeType.Sequence);
      v.forEach((item, i) => out.pushBack(build(item, depth + 1, [...path, i])));
      return out;
    }
    if (v instanceof Map) {
      const out = Node.of(NodeType.Map);
      let i = 0;
      for (const [k, item] of v) {
        out.forceInsert(build(k, depth + 1, [...path, i]), build(item, depth + 1, [...path, i]));
        i++;
      }
      return out;
    }
    if (!isPlainObject(v)) {
      throw new NodeEncodeError(`Unsupported value: ${Object.prototype.toString.call(v)}`, { path });
    }
    const out = Node.of(NodeType.Map);
    for (const key of Object.keys(v)) {
      out.forceInsert(Node.scalar(key), build(v[key]!, depth + 1, [...path, key]));
    }
    return out;
  }

  return build(value, 0, []);
}

/**
 * Turn a node tree into nested arrays, objects, strings and nulls. Map keys
 * must be scalars; a repeated key keeps its last value.
 */
export function toPlain(root: Node, options: PlainOptions = {}): PlainTree {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  function walk(n: Node, depth: number, path: Path): PlainTree {
    if (depth > maxDepth) {
      throw new NodeDecodeError('Maximum nesting depth exceeded', { path });
    }
    switch (n.type) {
      case NodeType.Null:
        return null;
      case NodeType.Scalar:
        return n.scalar;
      case NodeType.Sequence:
        return [...n].map((item, i) => walk(item, depth + 1, [...path, i]));
      case NodeType.Map: {
        const obj: PlainTreeObject = {};
        for (const [k, v] of n.entries()) {
          if (!k.isScalar()) {
            throw new NodeDecodeError(`Map key must be a Scalar, got ${k.type}`, {
              path,
              failure: { kind: 'type-mismatch', message: `key is ${k.type}` },
            });
          }
          defineEntry(obj, k.scalar, walk(v, depth + 1, [...path, k.scalar]));
        }
        return obj;
      }
    }
  }

  return walk(root, 0, []);
}
