/**
 * Scalar recognition and formatting: booleans, integers, floats, character
 * units, strings, null and the node itself.
 *
 * Integers accept decimal, `0o` octal and `0x` hex; floats accept a decimal
 * grammar plus `.inf`/`.nan` spellings. Whole-number floats are written with
 * a trailing `.` so they do not read back as integers.
 */

import { NodeEncodeError } from './errors.js';
import { Node, NodeType } from './node.js';
import { failure, success, type DecodeResult } from './result.js';
import type { Converter, Encoder } from './types.js';

const RE_TRUE = /^(?:true|True|TRUE)$/;
const RE_FALSE = /^(?:false|False|FALSE)$/;
const RE_DECIMAL = /^[-+]?[0-9]+$/;
const RE_OCTAL = /^0o[0-7]+$/;
const RE_HEX = /^0x[0-9a-fA-F]+$/;
const RE_FLOAT = /^[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?$/;
const RE_INF = /^[-+]?(?:\.inf|\.Inf|\.INF)$/;
const RE_NAN = /^(?:\.nan|\.NaN|\.NAN)$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

/** Scalar text of `node`, or a type-mismatch failure. */
function scalarText(node: Node, target: string): DecodeResult<string> {
  if (node.type !== NodeType.Scalar) {
    return failure('type-mismatch', `${target} requires a Scalar node, got ${node.type}`);
  }
  return success(node.scalar);
}

// ─── Boolean ──────────────────────────────────────────────────────────────────

export function parseBoolean(text: string): DecodeResult<boolean> {
  if (RE_TRUE.test(text)) return success(true);
  if (RE_FALSE.test(text)) return success(false);
  return failure('lexical-mismatch', `${JSON.stringify(text)} is not a boolean`);
}

export const bool: Converter<boolean, 'boolean'> = {
  category: 'boolean',
  name: 'bool',
  encode: (value) => Node.scalar(value ? 'true' : 'false'),
  decode(node) {
    const text = scalarText(node, 'bool');
    return text.ok ? parseBoolean(text.value) : text;
  },
};

// ─── Integers ─────────────────────────────────────────────────────────────────

/**
 * Parse integer text into a 64-bit intermediate of the given signedness.
 * Range checks against narrower targets happen in the caller.
 */
export function parseInteger(text: string, signed: boolean): DecodeResult<bigint> {
  let raw: bigint;
  if (RE_DECIMAL.test(text)) {
    const sign = text[0];
    const digits = sign === '-' || sign === '+' ? text.slice(1) : text;
    raw = sign === '-' ? -BigInt(digits) : BigInt(digits);
  } else if (RE_OCTAL.test(text) || RE_HEX.test(text)) {
    raw = BigInt(text);
  } else {
    return failure('lexical-mismatch', `${JSON.stringify(text)} is not an integer`);
  }
  const min = signed ? INT64_MIN : 0n;
  const max = signed ? INT64_MAX : UINT64_MAX;
  if (raw < min || raw > max) {
    return failure('range-overflow', `${text} does not fit a 64-bit ${signed ? 'signed' : 'unsigned'} integer`);
  }
  return success(raw);
}

type IntegerCategory = 'signed-integer' | 'unsigned-integer';

function integerBounds(bits: number, signed: boolean): [min: bigint, max: bigint] {
  const width = BigInt(bits);
  return signed ? [-(2n ** (width - 1n)), 2n ** (width - 1n) - 1n] : [0n, 2n ** width - 1n];
}

function decodeInRange(node: Node, name: string, bits: number, signed: boolean): DecodeResult<bigint> {
  const text = scalarText(node, name);
  if (!text.ok) return text;
  const parsed = parseInteger(text.value, signed);
  if (!parsed.ok) return parsed;
  const [min, max] = integerBounds(bits, signed);
  if (parsed.value < min || parsed.value > max) {
    return failure('range-overflow', `${text.value} is out of range for ${name} (${min}..${max})`);
  }
  return parsed;
}

/** Integer converter whose host type is `number` (widths up to 32 bits). */
function smallInteger<C extends IntegerCategory>(category: C, name: string, bits: 8 | 16 | 32): Converter<number, C> {
  const signed = category === 'signed-integer';
  const [min, max] = integerBounds(bits, signed);
  return {
    category,
    name,
    encode(value) {
      if (!Number.isInteger(value) || value < Number(min) || value > Number(max)) {
        throw new NodeEncodeError(`${value} is not a valid ${name}`);
      }
      return Node.scalar(String(value));
    },
    decode(node) {
      const result = decodeInRange(node, name, bits, signed);
      return result.ok ? success(Number(result.value)) : result;
    },
  };
}

/** 64-bit integer converter; the host type is `bigint`. */
function wideInteger<C extends IntegerCategory>(category: C, name: string): Converter<bigint, C> {
  const signed = category === 'signed-integer';
  const [min, max] = integerBounds(64, signed);
  return {
    category,
    name,
    encode(value) {
      if (value < min || value > max) {
        throw new NodeEncodeError(`${value} is not a valid ${name}`);
      }
      return Node.scalar(value.toString());
    },
    decode: (node) => decodeInRange(node, name, 64, signed),
  };
}

export const int8 = smallInteger('signed-integer', 'int8', 8);
export const int16 = smallInteger('signed-integer', 'int16', 16);
export const int32 = smallInteger('signed-integer', 'int32', 32);
export const int64 = wideInteger('signed-integer', 'int64');
export const uint8 = smallInteger('unsigned-integer', 'uint8', 8);
export const uint16 = smallInteger('unsigned-integer', 'uint16', 16);
export const uint32 = smallInteger('unsigned-integer', 'uint32', 32);
export const uint64 = wideInteger('unsigned-integer', 'uint64');

// ─── Floating point ───────────────────────────────────────────────────────────

export type FloatWidth = 32 | 64;

export function parseFloatText(text: string, width: FloatWidth = 64): DecodeResult<number> {
  if (RE_FLOAT.test(text)) {
    const value = Number(text);
    const mantissa = text.split(/[eE]/)[0] ?? '';
    if (!Number.isFinite(value) || (value === 0 && /[1-9]/.test(mantissa))) {
      return failure('range-overflow', `${text} is out of range for a double`);
    }
    if (width === 32) {
      const narrowed = Math.fround(value);
      if (!Number.isFinite(narrowed)) {
        return failure('range-overflow', `${text} is out of range for float32`);
      }
      return success(narrowed);
    }
    return success(value);
  }
  if (RE_INF.test(text)) return success(text[0] === '-' ? -Infinity : Infinity);
  if (RE_NAN.test(text)) return success(NaN);
  return failure('lexical-mismatch', `${JSON.stringify(text)} is not a float`);
}

/** Shortest decimal that reads back as the same float32. */
function shortestFloat32(value: number): string {
  for (let precision = 1; precision < 9; precision++) {
    const text = String(Number(value.toPrecision(precision)));
    if (Math.fround(Number(text)) === value) return text;
  }
  return String(Number(value.toPrecision(9)));
}

export function formatFloat(value: number, width: FloatWidth = 64): string {
  const v = width === 32 ? Math.fround(value) : value;
  if (Number.isNaN(v)) return '.nan';
  if (v === Infinity) return '.inf';
  if (v === -Infinity) return '-.inf';
  let text: string;
  if (Object.is(v, -0)) text = '-0';
  else text = width === 32 ? shortestFloat32(v) : String(v);
  // Disambiguate from an integer scalar
  return RE_DECIMAL.test(text) ? `${text}.` : text;
}

function floating(name: string, width: FloatWidth): Converter<number, 'floating-point'> {
  return {
    category: 'floating-point',
    name,
    encode: (value) => Node.scalar(formatFloat(value, width)),
    decode(node) {
      const text = scalarText(node, name);
      return text.ok ? parseFloatText(text.value, width) : text;
    },
  };
}

export const float32 = floating('float32', 32);
export const float64 = floating('float64', 64);

// ─── Text ─────────────────────────────────────────────────────────────────────

/** A single UTF-16 code unit. */
export const char: Converter<string, 'character-unit'> = {
  category: 'character-unit',
  name: 'char',
  encode(value) {
    if (value.length !== 1) {
      throw new NodeEncodeError(`char must be one code unit, got length ${value.length}`);
    }
    return Node.scalar(value);
  },
  decode(node) {
    const text = scalarText(node, 'char');
    if (!text.ok) return text;
    if (text.value.length !== 1) {
      return failure('lexical-mismatch', `char requires exactly one code unit, got ${text.value.length}`);
    }
    return text;
  },
};

export const string: Converter<string, 'string'> = {
  category: 'string',
  name: 'string',
  encode: (value) => Node.scalar(value),
  decode(node) {
    return scalarText(node, 'string');
  },
};

/** Fixed text that can be written but never read back as its own type. */
export function literal<S extends string>(text: S): Encoder<S, 'encode-only-text'> {
  return {
    category: 'encode-only-text',
    name: `literal<${JSON.stringify(text)}>`,
    encode: () => Node.scalar(text),
  };
}

// ─── Null and Node ────────────────────────────────────────────────────────────

export const nullValue: Converter<null, 'null'> = {
  category: 'null',
  name: 'null',
  encode: () => Node.null(),
  decode: (node) =>
    node.isNull() ? success(null) : failure('type-mismatch', `null requires a Null node, got ${node.type}`),
};

/** Identity. Decoding hands back the same node, not a copy. */
export const node: Converter<Node, 'node'> = {
  category: 'node',
  name: 'node',
  encode: (value) => value,
  decode: (value) => success(value),
};
