import { describe, it, expect } from 'vitest';
import { Node, NodeDecodeError, NodeEncodeError, NodeType, fromPlain, toPlain, t } from '../src/index.js';
import type { PlainValue } from '../src/index.js';

function nest(depth: number): PlainValue {
  let v: PlainValue = 'leaf';
  for (let i = 0; i < depth; i++) v = [v];
  return v;
}

describe('fromPlain', () => {
  it('formats scalars the way the converters do', () => {
    const node = fromPlain([null, true, 42, 1.5, 3e21, 12n, 'text']);
    expect(toPlain(node)).toEqual([null, 'true', '42', '1.5', '3e+21', '12', 'text']);
  });

  it('writes unsafe whole numbers as floats', () => {
    expect(fromPlain(2 ** 60).scalar).toBe('1152921504606847000.');
    expect(fromPlain(2 ** 60).as(t.float64)).toBe(2 ** 60);
    expect(fromPlain(NaN).scalar).toBe('.nan');
  });

  it('keeps the sign of negative zero', () => {
    expect(fromPlain(-0).scalar).toBe('-0.');
    expect(Object.is(fromPlain(-0).as(t.float64), -0)).toBe(true);
    expect(fromPlain(0).scalar).toBe('0');
  });

  it('builds maps from objects and Map instances in order', () => {
    const fromObject = fromPlain({ b: 1, a: [true] });
    expect(fromObject.type).toBe(NodeType.Map);
    expect([...fromObject.entries()].map(([k]) => k.scalar)).toEqual(['b', 'a']);

    const fromMap = fromPlain(new Map<PlainValue, PlainValue>([[1, 'one'], [[2], 'two']]));
    const keys = [...fromMap.entries()].map(([k]) => k.type);
    expect(keys).toEqual([NodeType.Scalar, NodeType.Sequence]);
  });

  it('stores bytes as base64', () => {
    expect(fromPlain(new Uint8Array([0x68, 0x69])).as(t.binary)).toEqual(new Uint8Array([0x68, 0x69]));
  });

  it('shares existing nodes', () => {
    const inner = Node.scalar('x');
    const outer = fromPlain([inner]);
    expect(outer.at(0)).toBe(inner);
  });

  it('rejects class instances', () => {
    const value: PlainValue = { when: Object.create(Date.prototype) };
    expect(() => fromPlain(value)).toThrow('Unsupported value: [object Object]');
  });

  it('enforces maxDepth', () => {
    expect(() => fromPlain(nest(3), { maxDepth: 2 })).toThrow(NodeEncodeError);
    expect(fromPlain(nest(2), { maxDepth: 2 }).isSequence()).toBe(true);
  });
});

describe('toPlain', () => {
  it('keeps the last value of a repeated key', () => {
    const node = Node.map([
      [Node.scalar('k'), Node.scalar('1')],
      [Node.scalar('k'), Node.scalar('2')],
    ]);
    expect(toPlain(node)).toEqual({ k: '2' });
  });

  it('writes a __proto__ key as an own property', () => {
    const out = toPlain(Node.map([[Node.scalar('__proto__'), Node.scalar('x')]]));
    expect(Object.entries(out ?? {})).toEqual([['__proto__', 'x']]);
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
  });

  it('rejects non-scalar keys with their location', () => {
    const node = fromPlain({ outer: new Map<PlainValue, PlainValue>([[['x'], 'v']]) });
    let caught: unknown;
    try {
      toPlain(node);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NodeDecodeError);
    if (caught instanceof NodeDecodeError) {
      expect(caught.kind).toBe('type-mismatch');
      expect(caught.location).toBe('.outer');
    }
  });

  it('enforces maxDepth', () => {
    expect(() => toPlain(fromPlain(nest(5)), { maxDepth: 4 })).toThrow('Maximum nesting depth exceeded');
  });
});
