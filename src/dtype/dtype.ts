import { DTypeError } from '../error.js';

/**
 * Indexable storage for the elements of a matrix.
 *
 * Typed arrays satisfy this interface, so numeric dtypes store their
 * elements in a `Float64Array`, `Int32Array` or `BigInt64Array`.
 */
export interface ElementBuffer<T> {
  readonly length: number;
  [index: number]: T;
}

/**
 * Element type descriptor.
 *
 * A dtype carries everything the expression engine needs to know about an
 * element type: its arithmetic, how to validate and normalize a value, how
 * to allocate storage, and how to print a value.
 *
 * @example
 * ```ts
 * const A = fromRows([[1, 2], [3, 4]], int32);
 * const B = A.mul(A).evaluateAs(float64);
 * ```
 */
export interface DType<T> {
  /** Name used in messages and logs */
  readonly name: string;
  /** Additive identity, the start value of every dot product */
  readonly zero: T;
  /** Multiplicative identity */
  readonly one: T;

  /** Check if a value is an element of this type */
  isScalar(value: unknown): value is T;
  /** Normalize a value into the representable range */
  coerce(value: T): T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  equals(a: T, b: T): boolean;
  format(value: T): string;

  /**
   * Total ordering used by `max()` and `min()`.
   * Absent for unordered types such as complex numbers.
   */
  readonly compare?: (a: T, b: T) => number;

  fromNumber(value: number): T;
  toNumber(value: T): number;

  /**
   * Exact integer conversion. Integer dtypes provide both, so converting
   * between them wraps like a C cast instead of rounding through a double.
   */
  readonly fromBigInt?: (value: bigint) => T;
  readonly toBigInt?: (value: T) => bigint;

  /** Allocate zero-filled storage for `length` elements */
  alloc(length: number): ElementBuffer<T>;
}

/**
 * Convert a value between dtypes.
 * Values of the same dtype pass through unchanged.
 */
export function convert<S, U>(value: S, from: DType<S>, to: DType<U>): U {
  if (to.isScalar(value) && from.name === to.name) {
    return value;
  }
  if (from.toBigInt && to.fromBigInt) {
    return to.fromBigInt(from.toBigInt(value));
  }
  return to.fromNumber(from.toNumber(value));
}

/**
 * Validate a scalar against a dtype and normalize it.
 */
export function toScalar<T>(value: unknown, dtype: DType<T>): T {
  if (!dtype.isScalar(value)) {
    throw new DTypeError(`Value ${String(value)} is not a valid ${dtype.name} element`);
  }
  return dtype.coerce(value);
}

/** Check that two operands share one element type */
export function checkSameDType<T>(left: DType<T>, right: DType<T>, operation: string): void {
  if (left.name !== right.name) {
    throw new DTypeError(`Cannot ${operation} ${left.name} and ${right.name} operands`);
  }
}
