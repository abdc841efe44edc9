/**
 * Raw byte buffers as base64 scalar text.
 */

import { Node, NodeType } from './node.js';
import { failure, success } from './result.js';
import type { Converter } from './types.js';

export interface Base64Codec {
  encodeBase64(bytes: Uint8Array): string;
  /** Malformed input yields an empty buffer. */
  decodeBase64(text: string): Uint8Array;
}

const RE_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export const defaultBase64Codec: Base64Codec = {
  encodeBase64(bytes) {
    let binary = '';
    for (let i = 0; i < bytes.byteLength; i++) {
      binary += String.fromCharCode(bytes[i]!);
    }
    return btoa(binary);
  },
  decodeBase64(text) {
    const compact = text.replace(/\s+/g, '');
    const padded = compact.endsWith('=');
    if (!RE_BASE64.test(compact) || compact.length % 4 === 1 || (padded && compact.length % 4 !== 0)) {
      return new Uint8Array(0);
    }
    const b = atob(compact);
    const bytes = new Uint8Array(b.length);
    for (let i = 0; i < b.length; i++) {
      bytes[i] = b.charCodeAt(i);
    }
    return bytes;
  },
};

export interface BinaryOptions {
  /** Base64 implementation (default: platform btoa/atob) */
  codec?: Base64Codec;
}

export function binary(options: BinaryOptions = {}): Converter<Uint8Array, 'binary'> {
  const codec = options.codec ?? defaultBase64Codec;
  return {
    category: 'binary',
    name: 'binary',
    encode: (value) => Node.scalar(codec.encodeBase64(value)),
    decode(node) {
      if (node.type !== NodeType.Scalar) {
        return failure('type-mismatch', `binary requires a Scalar node, got ${node.type}`);
      }
      const text = node.scalar;
      const bytes = codec.decodeBase64(text);
      // Empty output from non-empty text means the codec rejected it
      if (bytes.length === 0 && text.length > 0) {
        return failure('lexical-mismatch', 'scalar is not valid base64');
      }
      return success(bytes);
    },
  };
}
