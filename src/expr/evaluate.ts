import { ExprData, MatrixLike } from './expression.js';
import { Matrix } from '../matrix/matrix.js';
import { DType } from '../dtype/index.js';
import { EvaluateSettings } from '../settings.js';

/**
 * Compute one element of an expression.
 *
 * Nothing is cached: each call recomputes the element from the leaves, so a
 * matrix product costs one dot product over the shared dimension per call.
 * The caller is responsible for the bounds of `(row, col)`.
 */
export function valueAt<T>(expr: ExprData<T>, row: number, col: number): T {
  switch (expr.kind) {
    case 'leaf':
      return expr.source.valueAt(row, col);

    case 'sum':
      return expr.dtype.add(valueAt(expr.left, row, col), valueAt(expr.right, row, col));

    case 'difference':
      return expr.dtype.sub(valueAt(expr.left, row, col), valueAt(expr.right, row, col));

    case 'product':
      switch (expr.variant) {
        case 'matrix-matrix':
          return dotProduct(expr.dtype, expr.left, expr.right, row, col);
        case 'scalar-matrix':
        case 'matrix-scalar':
          // Scalar first in both cases; all built-in dtypes commute
          return expr.dtype.mul(expr.scalar, valueAt(expr.operand, row, col));
      }
  }
}

function dotProduct<T>(
  dtype: DType<T>,
  left: ExprData<T>,
  right: ExprData<T>,
  row: number,
  col: number
): T {
  const shared = left.shape.dims[1];
  let acc = dtype.zero;
  for (let k = 0; k < shared; k++) {
    acc = dtype.add(acc, dtype.mul(valueAt(left, row, k), valueAt(right, k, col)));
  }
  return acc;
}

/**
 * Evaluate an expression into a new matrix.
 *
 * @example
 * ```ts
 * const C = evaluate(mul(A, B));
 * ```
 */
export function evaluate<T>(expr: MatrixLike<T>, settings?: EvaluateSettings): Matrix<T> {
  return Matrix.fromExpr(expr, settings);
}
