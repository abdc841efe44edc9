import { describe, it, expect } from 'vitest';
import { Node, NodeType, NodeDecodeError, NodeTypeError, t } from '../src/index.js';

describe('Node', () => {
  it('reports its tag', () => {
    expect(Node.null().type).toBe(NodeType.Null);
    expect(Node.scalar('x').type).toBe(NodeType.Scalar);
    expect(Node.of(NodeType.Sequence).isSequence()).toBe(true);
    expect(Node.of(NodeType.Map).isMap()).toBe(true);
    expect(Node.of(NodeType.Scalar).scalar).toBe('');
    expect(Node.of(NodeType.Null).isNull()).toBe(true);
  });

  it('grows sequences with pushBack', () => {
    const seq = Node.of(NodeType.Sequence).pushBack(Node.scalar('a')).pushBack(Node.scalar('b'));
    expect(seq.size).toBe(2);
    expect(seq.at(1).scalar).toBe('b');
    expect([...seq].map((n) => n.scalar)).toEqual(['a', 'b']);
  });

  it('replaces equal keys on insert but not on forceInsert', () => {
    const map = Node.of(NodeType.Map);
    map.insert(Node.scalar('k'), Node.scalar('1'));
    map.insert(Node.scalar('k'), Node.scalar('2'));
    expect(map.size).toBe(1);
    expect(map.get('k')?.scalar).toBe('2');
    map.forceInsert(Node.scalar('k'), Node.scalar('3'));
    expect(map.size).toBe(2);
    expect([...map.entries()].map(([, v]) => v.scalar)).toEqual(['2', '3']);
  });

  it('returns undefined for a missing key', () => {
    expect(Node.map().get('nope')).toBeUndefined();
  });

  it('compares structurally', () => {
    const a = Node.sequence([Node.scalar('1'), Node.map([[Node.scalar('k'), Node.null()]])]);
    const b = Node.sequence([Node.scalar('1'), Node.map([[Node.scalar('k'), Node.null()]])]);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(Node.sequence([Node.scalar('1')]))).toBe(false);
    expect(Node.scalar('').equals(Node.null())).toBe(false);
  });

  it('throws NodeTypeError for accessors on the wrong tag', () => {
    expect(() => Node.map().scalar).toThrow(NodeTypeError);
    expect(() => Node.scalar('x').at(0)).toThrow('Expected Sequence, got Scalar');
    expect(() => Node.sequence().at(0)).toThrow('Index 0 out of bounds (size 0)');
    expect(() => Node.null().pushBack(Node.null())).toThrow('Cannot push onto Null');
    expect(() => Node.sequence().insert(Node.null(), Node.null())).toThrow('Cannot insert into Sequence');
    expect(() => [...Node.map()]).toThrow(NodeTypeError);
  });

  it('has a zero size for scalars and nulls', () => {
    expect(Node.scalar('abc').size).toBe(0);
    expect(Node.null().size).toBe(0);
  });
});

describe('Node#as', () => {
  it('returns the decoded value', () => {
    expect(Node.scalar('12').as(t.uint8)).toBe(12);
  });

  it('throws NodeDecodeError carrying the failure', () => {
    let caught: unknown;
    try {
      Node.map().as(t.int32);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NodeDecodeError);
    if (caught instanceof NodeDecodeError) {
      expect(caught.kind).toBe('type-mismatch');
      expect(caught.message).toBe('Cannot decode int32 from Map: int32 requires a Scalar node, got Map');
      expect(caught.toString()).toBe(
        'NodeDecodeError: Cannot decode int32 from Map: int32 requires a Scalar node, got Map',
      );
    }
  });

  it('asOr returns the fallback instead of throwing', () => {
    expect(Node.scalar('yes').asOr(t.bool, false)).toBe(false);
    expect(Node.scalar('TRUE').asOr(t.bool, false)).toBe(true);
    expect(Node.null().asOr(t.string, undefined)).toBeUndefined();
  });
});
