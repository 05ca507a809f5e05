import { ExprData, ExprKind, MatrixLike } from './expression.js';
import { Shape, checkIndex } from './shape.js';
import { valueAt as valueAtFn } from './evaluate.js';
import { DType } from '../dtype/index.js';
import { Matrix } from '../matrix/matrix.js';
import { add as addFn, sub as subFn, mul as mulFn } from '../ops/arithmetic.js';
import { formatMatrix } from '../format.js';
import { EvaluateSettings } from '../settings.js';

/**
 * Expression wrapper class providing fluent method chaining.
 *
 * An `Expr` describes a computation over its operands; it holds references
 * to them, never a buffer of its own. Reading an element with `valueAt`
 * computes it on demand; `evaluate` materializes every element once into a
 * new `Matrix`.
 *
 * @example
 * ```ts
 * const A = fromRows([[1, 2], [3, 4]]);
 * const B = fromRows([[5, 6], [7, 8]]);
 *
 * const expr = A.add(B).mul(2);   // no arithmetic yet
 * const C = expr.evaluate();      // [[12, 16], [20, 24]]
 * ```
 */
export class Expr<T> implements MatrixLike<T> {
  /**
   * The underlying expression data (discriminated union).
   */
  public readonly data: ExprData<T>;

  constructor(data: ExprData<T>) {
    this.data = data;
  }

  // ==================== Properties ====================

  /**
   * Get the shape of this expression.
   */
  get shape(): Shape {
    return this.data.shape;
  }

  /**
   * Get the element type of this expression.
   */
  get dtype(): DType<T> {
    return this.data.dtype;
  }

  /**
   * Get the kind of this expression.
   */
  get kind(): ExprKind {
    return this.data.kind;
  }

  rows(): number {
    return this.data.shape.dims[0];
  }

  cols(): number {
    return this.data.shape.dims[1];
  }

  /**
   * Compute the element at `(row, col)`. Recomputed on every call.
   */
  valueAt(row: number, col: number): T {
    checkIndex(this.data.shape, row, col);
    return valueAtFn(this.data, row, col);
  }

  // ==================== Arithmetic Operations ====================

  /**
   * Add another expression to this one.
   *
   * @example
   * ```ts
   * A.mul(B).add(C)    // A * B + C
   * ```
   */
  add(other: MatrixLike<T>): Expr<T> {
    return addFn(this, other);
  }

  /**
   * Subtract another expression from this one.
   */
  sub(other: MatrixLike<T>): Expr<T> {
    return subFn(this, other);
  }

  /**
   * Multiply by a matrix expression or a scalar.
   *
   * @example
   * ```ts
   * A.add(B).mul(C)    // (A + B) * C
   * A.add(B).mul(3)    // (A + B) * 3
   * ```
   */
  mul(other: MatrixLike<T> | T): Expr<T> {
    return mulFn(this, other);
  }

  // ==================== Evaluation ====================

  /**
   * Materialize this expression into a new matrix.
   */
  evaluate(settings?: EvaluateSettings): Matrix<T> {
    return Matrix.fromExpr(this, settings);
  }

  /**
   * Materialize this expression into a new matrix of another dtype.
   *
   * @example
   * ```ts
   * fromRows([[1.5, 2.5]]).mul(2).evaluateAs(int32)  // [[3, 5]]
   * ```
   */
  evaluateAs<U>(dtype: DType<U>, settings?: EvaluateSettings): Matrix<U> {
    return Matrix.castFrom(this, dtype, settings);
  }

  toString(): string {
    return formatMatrix(this);
  }
}

/**
 * Check if a value is an Expr instance.
 */
export function isExpr(value: unknown): value is Expr<unknown> {
  return value instanceof Expr;
}
