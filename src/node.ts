/**
 * Document node: null, scalar text, ordered sequence or key-ordered mapping.
 * Nodes are built by the parser or by encoders; decoders only read them.
 */

import { NodeDecodeError, NodeTypeError } from './errors.js';
import type { DecodeResult } from './result.js';

export enum NodeType {
  Null = 'Null',
  Scalar = 'Scalar',
  Sequence = 'Sequence',
  Map = 'Map',
}

/** Anything that can turn a node into a T. Converters satisfy this. */
export interface NodeDecoder<T> {
  readonly name: string;
  decode(node: Node): DecodeResult<T>;
}

export type NodePair = readonly [key: Node, value: Node];

type Content =
  | { type: NodeType.Null }
  | { type: NodeType.Scalar; text: string }
  | { type: NodeType.Sequence; items: Node[] }
  | { type: NodeType.Map; pairs: [Node, Node][] };

export class Node {
  private readonly content: Content;

  private constructor(content: Content) {
    this.content = content;
  }

  static null(): Node {
    return new Node({ type: NodeType.Null });
  }

  static scalar(text: string): Node {
    return new Node({ type: NodeType.Scalar, text });
  }

  /** Empty node of the given tag. `Node.of(NodeType.Scalar)` holds "". */
  static of(type: NodeType): Node {
    switch (type) {
      case NodeType.Null:
        return Node.null();
      case NodeType.Scalar:
        return Node.scalar('');
      case NodeType.Sequence:
        return new Node({ type: NodeType.Sequence, items: [] });
      case NodeType.Map:
        return new Node({ type: NodeType.Map, pairs: [] });
    }
  }

  static sequence(items: Iterable<Node> = []): Node {
    return new Node({ type: NodeType.Sequence, items: [...items] });
  }

  static map(pairs: Iterable<NodePair> = []): Node {
    const node = Node.of(NodeType.Map);
    for (const [k, v] of pairs) node.forceInsert(k, v);
    return node;
  }

  get type(): NodeType {
    return this.content.type;
  }

  isNull(): boolean {
    return this.content.type === NodeType.Null;
  }

  isScalar(): boolean {
    return this.content.type === NodeType.Scalar;
  }

  isSequence(): boolean {
    return this.content.type === NodeType.Sequence;
  }

  isMap(): boolean {
    return this.content.type === NodeType.Map;
  }

  /** Scalar text. Throws on any other tag. */
  get scalar(): string {
    if (this.content.type !== NodeType.Scalar) {
      throw new NodeTypeError(`Expected Scalar, got ${this.content.type}`);
    }
    return this.content.text;
  }

  /** Number of children: sequence items or map pairs; 0 for null and scalars. */
  get size(): number {
    switch (this.content.type) {
      case NodeType.Sequence:
        return this.content.items.length;
      case NodeType.Map:
        return this.content.pairs.length;
      default:
        return 0;
    }
  }

  /** Sequence element by index. */
  at(index: number): Node {
    if (this.content.type !== NodeType.Sequence) {
      throw new NodeTypeError(`Expected Sequence, got ${this.content.type}`);
    }
    const item = this.content.items[index];
    if (item === undefined) {
      throw new NodeTypeError(`Index ${index} out of bounds (size ${this.content.items.length})`);
    }
    return item;
  }

  /** Map value whose key is the scalar `key`, if any. */
  get(key: string): Node | undefined {
    if (this.content.type !== NodeType.Map) {
      throw new NodeTypeError(`Expected Map, got ${this.content.type}`);
    }
    for (const [k, v] of this.content.pairs) {
      if (k.isScalar() && k.scalar === key) return v;
    }
    return undefined;
  }

  *[Symbol.iterator](): IterableIterator<Node> {
    if (this.content.type !== NodeType.Sequence) {
      throw new NodeTypeError(`Expected Sequence, got ${this.content.type}`);
    }
    yield* this.content.items;
  }

  /** Map pairs in stored order. */
  *entries(): IterableIterator<NodePair> {
    if (this.content.type !== NodeType.Map) {
      throw new NodeTypeError(`Expected Map, got ${this.content.type}`);
    }
    yield* this.content.pairs;
  }

  pushBack(child: Node): this {
    if (this.content.type !== NodeType.Sequence) {
      throw new NodeTypeError(`Cannot push onto ${this.content.type}`);
    }
    this.content.items.push(child);
    return this;
  }

  /** Replace the value of an equal key, or append the pair. */
  insert(key: Node, value: Node): this {
    if (this.content.type !== NodeType.Map) {
      throw new NodeTypeError(`Cannot insert into ${this.content.type}`);
    }
    const existing = this.content.pairs.find(([k]) => k.equals(key));
    if (existing) {
      existing[1] = value;
      return this;
    }
    this.content.pairs.push([key, value]);
    return this;
  }

  /** Append the pair even if an equal key is present. */
  forceInsert(key: Node, value: Node): this {
    if (this.content.type !== NodeType.Map) {
      throw new NodeTypeError(`Cannot insert into ${this.content.type}`);
    }
    this.content.pairs.push([key, value]);
    return this;
  }

  /** Structural equality; map pairs compare in order. */
  equals(other: Node): boolean {
    if (this === other) return true;
    const a = this.content;
    const b = other.content;
    switch (a.type) {
      case NodeType.Null:
        return b.type === NodeType.Null;
      case NodeType.Scalar:
        return b.type === NodeType.Scalar && a.text === b.text;
      case NodeType.Sequence:
        return (
          b.type === NodeType.Sequence &&
          a.items.length === b.items.length &&
          a.items.every((item, i) => item.equals(b.items[i]!))
        );
      case NodeType.Map:
        return (
          b.type === NodeType.Map &&
          a.pairs.length === b.pairs.length &&
          a.pairs.every(([k, v], i) => k.equals(b.pairs[i]![0]) && v.equals(b.pairs[i]![1]))
        );
    }
  }

  /** Decode this node, throwing NodeDecodeError on failure. */
  as<T>(decoder: NodeDecoder<T>): T {
    const result = decoder.decode(this);
    if (!result.ok) {
      throw new NodeDecodeError(`Cannot decode ${decoder.name} from ${this.type}: ${result.failure.message}`, {
        failure: result.failure,
      });
    }
    return result.value;
  }

  /** Decode this node, or return `fallback` on failure. */
  asOr<T, F = T>(decoder: NodeDecoder<T>, fallback: F): T | F {
    const result = decoder.decode(this);
    return result.ok ? result.value : fallback;
  }
}

export function isNode(v: unknown): v is Node {
  return v instanceof Node;
}
