/**
 * Decode outcomes. Failures are values, never exceptions.
 */

export type FailureKind =
  /** The node's tag is not one the target accepts (e.g. an integer from a map). */
  | 'type-mismatch'
  /** Scalar text matches no grammar of the target type. */
  | 'lexical-mismatch'
  /** A parsed number does not fit the target type. */
  | 'range-overflow'
  /** Container length is wrong for a pair or fixed array. */
  | 'shape-mismatch';

export interface ConversionFailure {
  readonly kind: FailureKind;
  readonly message: string;
}

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: ConversionFailure };

export function success<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(kind: FailureKind, message: string): DecodeResult<T> {
  return { ok: false, failure: { kind, message } };
}
