/**
 * Errors for the exception-style layer. The decode contract itself never
 * throws; these surface through `as`, out-of-domain encodes and misuse of
 * Node accessors.
 */

import type { ConversionFailure, FailureKind } from './result.js';

type ConstructorOptions = { path?: readonly (string | number)[]; cause?: unknown };

export class NodeError extends Error {
  override readonly name: string = 'NodeError';
  /** Location inside a document tree, outermost first, when known. */
  readonly path?: readonly (string | number)[];

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.path = options?.path;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, NodeError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.path && this.path.length > 0) {
      return this.path.map((p) => (typeof p === 'number' ? `[${p}]` : `.${p}`)).join('');
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (at ${loc})` : `${this.name}: ${this.message}`;
  }
}

export class NodeDecodeError extends NodeError {
  override readonly name = 'NodeDecodeError';
  readonly failure?: ConversionFailure;

  constructor(message: string, options?: ConstructorOptions & { failure?: ConversionFailure }) {
    super(message, options);
    this.failure = options?.failure;
    Object.setPrototypeOf(this, NodeDecodeError.prototype);
  }

  get kind(): FailureKind | undefined {
    return this.failure?.kind;
  }
}

export class NodeEncodeError extends NodeError {
  override readonly name = 'NodeEncodeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NodeEncodeError.prototype);
  }
}

/** A Node accessor was used on a node of the wrong tag. */
export class NodeTypeError extends NodeError {
  override readonly name = 'NodeTypeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, NodeTypeError.prototype);
  }
}
