import { Matrix } from './matrix.js';
import { DType, float64 } from '../dtype/index.js';

/**
 * Create a matrix from dimensions and row-major data.
 *
 * @example
 * ```ts
 * const A = matrix(2, 3, [1, 2, 3, 4, 5, 6]);
 * const B = matrix(2, 2, [1n, 2n, 3n, 4n], int64);
 * ```
 */
export function matrix(rows: number, cols: number, data: ArrayLike<number>): Matrix<number>;
export function matrix<T>(rows: number, cols: number, data: ArrayLike<T>, dtype: DType<T>): Matrix<T>;
export function matrix<T>(
  rows: number,
  cols: number,
  data: ArrayLike<T>,
  dtype?: DType<T>
): Matrix<T> | Matrix<number> {
  return dtype === undefined
    ? Matrix.fromFlat(rows, cols, data, float64)
    : Matrix.fromFlat(rows, cols, data, dtype);
}

/**
 * Create a matrix from nested rows. Rows and columns are inferred.
 *
 * @example
 * ```ts
 * const A = fromRows([[1, 2, 3], [4, 5, 6]]);   // (2, 3)
 * ```
 */
export function fromRows(values: readonly (readonly number[])[]): Matrix<number>;
export function fromRows<T>(values: readonly (readonly T[])[], dtype: DType<T>): Matrix<T>;
export function fromRows<T>(
  values: readonly (readonly T[])[],
  dtype?: DType<T>
): Matrix<T> | Matrix<number> {
  return dtype === undefined ? Matrix.fromRows(values, float64) : Matrix.fromRows(values, dtype);
}

/**
 * Create a 0x0 matrix.
 */
export function empty(): Matrix<number>;
export function empty<T>(dtype: DType<T>): Matrix<T>;
export function empty<T>(dtype?: DType<T>): Matrix<T> | Matrix<number> {
  return dtype === undefined ? Matrix.fromFlat(0, 0, [], float64) : Matrix.fromFlat(0, 0, [], dtype);
}

/**
 * Create a matrix of zeros.
 */
export function zeros(rows: number, cols: number): Matrix<number>;
export function zeros<T>(rows: number, cols: number, dtype: DType<T>): Matrix<T>;
export function zeros<T>(rows: number, cols: number, dtype?: DType<T>): Matrix<T> | Matrix<number> {
  return dtype === undefined
    ? Matrix.filled(rows, cols, float64.zero, float64)
    : Matrix.filled(rows, cols, dtype.zero, dtype);
}

/**
 * Create a matrix of ones.
 */
export function ones(rows: number, cols: number): Matrix<number>;
export function ones<T>(rows: number, cols: number, dtype: DType<T>): Matrix<T>;
export function ones<T>(rows: number, cols: number, dtype?: DType<T>): Matrix<T> | Matrix<number> {
  return dtype === undefined
    ? Matrix.filled(rows, cols, float64.one, float64)
    : Matrix.filled(rows, cols, dtype.one, dtype);
}

/**
 * Create an n×n identity matrix.
 *
 * @example
 * ```ts
 * const I = eye(3);
 * A.mul(I).evaluate().equals(A);  // true
 * ```
 */
export function eye(n: number): Matrix<number>;
export function eye<T>(n: number, dtype: DType<T>): Matrix<T>;
export function eye<T>(n: number, dtype?: DType<T>): Matrix<T> | Matrix<number> {
  return dtype === undefined ? identity(n, float64) : identity(n, dtype);
}

function identity<T>(n: number, dtype: DType<T>): Matrix<T> {
  const result = Matrix.filled(n, n, dtype.zero, dtype);
  for (let i = 0; i < n; i++) {
    result.set(i, i, dtype.one);
  }
  return result;
}
