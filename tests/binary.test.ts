import { describe, it, expect } from 'vitest';
import { Node, t, binary, decode, encode, defaultBase64Codec } from '../src/index.js';
import type { Base64Codec } from '../src/index.js';

const bytes = (...values: number[]) => new Uint8Array(values);

describe('binary', () => {
  it('encodes bytes as base64 text', () => {
    expect(encode(t.binary, bytes(0x68, 0x69)).scalar).toBe('aGk=');
    expect(encode(t.binary, bytes(0, 255, 16)).scalar).toBe('AP8Q');
  });

  it('encodes an empty buffer as an empty scalar', () => {
    const node = encode(t.binary, bytes());
    expect(node.isScalar()).toBe(true);
    expect(node.scalar).toBe('');
  });

  it('decodes base64 text', () => {
    expect(Node.scalar('aGk=').as(t.binary)).toEqual(bytes(0x68, 0x69));
    expect(Node.scalar('aGk').as(t.binary)).toEqual(bytes(0x68, 0x69));
    expect(Node.scalar('AP8Q\n').as(t.binary)).toEqual(bytes(0, 255, 16));
  });

  it('decodes empty text to an empty buffer', () => {
    expect(decode(t.binary, Node.scalar(''))).toEqual({ ok: true, value: bytes() });
  });

  it('treats non-empty text that yields no bytes as corrupt', () => {
    for (const text of ['!!!!', 'a', 'aG=k', '====']) {
      expect(decode(t.binary, Node.scalar(text))).toEqual({
        ok: false,
        failure: { kind: 'lexical-mismatch', message: 'scalar is not valid base64' },
      });
    }
  });

  it('requires a scalar node', () => {
    const result = decode(t.binary, Node.sequence());
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.failure.kind).toBe('type-mismatch');
  });

  it('round-trips every byte value', () => {
    const all = new Uint8Array(256).map((_, i) => i);
    expect(encode(t.binary, all).as(t.binary)).toEqual(all);
  });

  it('delegates to a supplied codec', () => {
    const calls: string[] = [];
    const codec: Base64Codec = {
      encodeBase64(input) {
        calls.push(`encode:${input.length}`);
        return defaultBase64Codec.encodeBase64(input);
      },
      decodeBase64(text) {
        calls.push(`decode:${text}`);
        return defaultBase64Codec.decodeBase64(text);
      },
    };
    const conv = binary({ codec });
    const node = encode(conv, bytes(1, 2, 3));
    expect(node.as(conv)).toEqual(bytes(1, 2, 3));
    expect(calls).toEqual(['encode:3', 'decode:AQID']);
  });
});
