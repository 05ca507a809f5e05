import { ExprData, MatrixLike, leaf } from '../expr/expression.js';
import { Expr } from '../expr/expr.js';
import { Matrix } from '../matrix/matrix.js';
import { shape, shapeEquals, shapeToString, rows, cols } from '../expr/shape.js';
import { checkSameDType, toScalar } from '../dtype/index.js';
import { MatrixError, ShapeError } from '../error.js';

/**
 * An operand of `mul`, tagged once at the call site.
 */
export type Operand<T> =
  | { readonly kind: 'scalar'; readonly value: T }
  | { readonly kind: 'expr'; readonly data: ExprData<T> };

/**
 * Check if a value has the expression capability.
 *
 * A 1x1 matrix is matrix-like, never a scalar.
 */
export function isMatrixLike<T>(value: MatrixLike<T> | T): value is MatrixLike<T> {
  if (value instanceof Matrix || value instanceof Expr) {
    return true;
  }
  const candidate: unknown = value;
  return (
    typeof candidate === 'object' &&
    candidate !== null &&
    'dtype' in candidate &&
    'rows' in candidate &&
    'cols' in candidate &&
    'valueAt' in candidate &&
    typeof candidate.rows === 'function' &&
    typeof candidate.cols === 'function' &&
    typeof candidate.valueAt === 'function'
  );
}

/**
 * Convert a matrix-like value to expression data.
 * An `Expr` contributes its tree; anything else becomes a leaf.
 */
export function toExprData<T>(value: MatrixLike<T>): ExprData<T> {
  if (value instanceof Expr) {
    return value.data;
  }
  return leaf(value);
}

/** Tag an operand as scalar or expression */
export function toOperand<T>(value: MatrixLike<T> | T): Operand<T> {
  if (isMatrixLike(value)) {
    return { kind: 'expr', data: toExprData(value) };
  }
  return { kind: 'scalar', value };
}

function checkElementwise<T>(l: ExprData<T>, r: ExprData<T>, operation: string): void {
  checkSameDType(l.dtype, r.dtype, operation);
  if (!shapeEquals(l.shape, r.shape)) {
    throw new ShapeError(
      `Cannot ${operation} expressions with incompatible shapes`,
      shapeToString(l.shape),
      shapeToString(r.shape)
    );
  }
}

/**
 * Elementwise sum of two expressions of the same shape.
 *
 * @example
 * ```ts
 * const C = add(A, B).evaluate();
 * ```
 */
export function add<T>(left: MatrixLike<T>, right: MatrixLike<T>): Expr<T> {
  const l = toExprData(left);
  const r = toExprData(right);
  checkElementwise(l, r, 'add');

  return new Expr({ kind: 'sum', shape: l.shape, dtype: l.dtype, left: l, right: r });
}

/**
 * Elementwise difference of two expressions of the same shape.
 *
 * @example
 * ```ts
 * const C = sub(A, B).evaluate();  // A - B
 * ```
 */
export function sub<T>(left: MatrixLike<T>, right: MatrixLike<T>): Expr<T> {
  const l = toExprData(left);
  const r = toExprData(right);
  checkElementwise(l, r, 'subtract');

  return new Expr({ kind: 'difference', shape: l.shape, dtype: l.dtype, left: l, right: r });
}

/**
 * Multiply two operands.
 *
 * Exactly one of three products is built, depending on which operands are
 * scalars:
 * - matrix × matrix: the matrix product; `left.cols()` must equal `right.rows()`
 * - scalar × matrix and matrix × scalar: every element scaled
 *
 * Each element of a matrix product is a dot product over the shared
 * dimension, accumulated in the operands' dtype.
 *
 * @example
 * ```ts
 * mul(A, B)    // A * B, A is (m, k) and B is (k, n)
 * mul(10, A)   // 10 * A
 * mul(A, 10)   // A * 10
 * ```
 */
export function mul<T>(left: MatrixLike<T>, right: MatrixLike<T> | T): Expr<T>;
export function mul<T>(left: T, right: MatrixLike<T>): Expr<T>;
export function mul<T>(left: MatrixLike<T> | T, right: MatrixLike<T> | T): Expr<T> {
  const l = toOperand(left);
  const r = toOperand(right);

  if (l.kind === 'expr' && r.kind === 'expr') {
    return matmul(l.data, r.data);
  }
  if (l.kind === 'scalar' && r.kind === 'expr') {
    return scale('scalar-matrix', l.value, r.data);
  }
  if (l.kind === 'expr' && r.kind === 'scalar') {
    return scale('matrix-scalar', r.value, l.data);
  }
  throw new MatrixError('Cannot multiply two scalars: at least one operand must be matrix-like');
}

function matmul<T>(l: ExprData<T>, r: ExprData<T>): Expr<T> {
  checkSameDType(l.dtype, r.dtype, 'multiply');

  const lCols = cols(l.shape);
  const rRows = rows(r.shape);
  if (lCols !== rRows) {
    throw new ShapeError(
      'Incompatible dimensions for matrix multiplication',
      `inner dimension ${lCols}`,
      `${rRows}`
    );
  }

  return new Expr({
    kind: 'product',
    variant: 'matrix-matrix',
    shape: shape(rows(l.shape), cols(r.shape)),
    dtype: l.dtype,
    left: l,
    right: r,
  });
}

function scale<T>(
  variant: 'scalar-matrix' | 'matrix-scalar',
  value: T,
  operand: ExprData<T>
): Expr<T> {
  return new Expr({
    kind: 'product',
    variant,
    shape: operand.shape,
    dtype: operand.dtype,
    scalar: toScalar(value, operand.dtype),
    operand,
  });
}
