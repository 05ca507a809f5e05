import { DType, ElementBuffer, convert, toScalar } from '../dtype/index.js';
import { Shape, shape, size, checkIndex, shapeToString } from '../expr/shape.js';
import { MatrixLike } from '../expr/expression.js';
import { Expr, isExpr } from '../expr/expr.js';
import { add, sub, mul } from '../ops/arithmetic.js';
import { formatMatrix } from '../format.js';
import { EvaluateSettings, resolveSettings } from '../settings.js';
import { DTypeError, EmptyMatrixError, ShapeError } from '../error.js';

/**
 * Dense matrix with row-major storage.
 *
 * The only type in the library that owns element storage. Element `(r, c)`
 * lives at index `r * cols + c`. The shape never changes after construction;
 * elements change only through `set`.
 *
 * @example
 * ```ts
 * const A = fromRows([[1, 2], [3, 4]]);
 * const B = fromRows([[5, 6], [7, 8]]);
 *
 * // Nothing is computed until the expression is evaluated
 * const C = A.mul(B).add(A).evaluate();
 * C.at(0, 0); // 20
 * ```
 */
export class Matrix<T> implements MatrixLike<T> {
  readonly shape: Shape;
  readonly dtype: DType<T>;
  private readonly _data: ElementBuffer<T>;

  private constructor(s: Shape, dtype: DType<T>, data: ElementBuffer<T>) {
    this.shape = s;
    this.dtype = dtype;
    this._data = data;
  }

  // ==================== Construction ====================

  /**
   * Create a matrix from explicit dimensions and row-major data.
   * Every element is checked against the dtype.
   */
  static fromFlat<T>(rows: number, cols: number, data: ArrayLike<unknown>, dtype: DType<T>): Matrix<T> {
    const s = shape(rows, cols);
    const n = size(s);
    if (data.length !== n) {
      throw new ShapeError(
        `Data length does not match shape ${shapeToString(s)}`,
        `${n} elements`,
        `${data.length}`
      );
    }

    const buffer = dtype.alloc(n);
    for (let i = 0; i < n; i++) {
      buffer[i] = toScalar(data[i], dtype);
    }
    return new Matrix(s, dtype, buffer);
  }

  /**
   * Create a matrix from a list of rows. All rows must have the same length.
   */
  static fromRows<T>(values: readonly (readonly unknown[])[], dtype: DType<T>): Matrix<T> {
    const nrows = values.length;
    const ncols = values[0]?.length ?? 0;

    const buffer = dtype.alloc(nrows * ncols);
    for (let i = 0; i < nrows; i++) {
      const row = values[i]!;
      if (row.length !== ncols) {
        throw new ShapeError(`Inconsistent length of row ${i}`, `${ncols} elements`, `${row.length}`);
      }
      for (let j = 0; j < ncols; j++) {
        buffer[i * ncols + j] = toScalar(row[j], dtype);
      }
    }
    return new Matrix(shape(nrows, ncols), dtype, buffer);
  }

  /** Create a matrix with every element set to `value` */
  static filled<T>(rows: number, cols: number, value: T, dtype: DType<T>): Matrix<T> {
    const s = shape(rows, cols);
    const element = toScalar(value, dtype);
    const buffer = dtype.alloc(size(s));
    for (let i = 0; i < buffer.length; i++) {
      buffer[i] = element;
    }
    return new Matrix(s, dtype, buffer);
  }

  /**
   * Evaluate an expression into a new matrix of the same dtype.
   */
  static fromExpr<T>(expr: MatrixLike<T>, settings?: EvaluateSettings): Matrix<T> {
    return Matrix.castFrom(expr, expr.dtype, settings);
  }

  /**
   * Evaluate an expression into a new matrix, converting each element to
   * `dtype`.
   *
   * This is where a lazy expression becomes a value. The result buffer is
   * allocated once and every cell is queried exactly once, in row-major
   * order.
   */
  static castFrom<S, T>(expr: MatrixLike<S>, dtype: DType<T>, settings?: EvaluateSettings): Matrix<T> {
    const { verbose, logger } = resolveSettings(settings);
    const start = verbose ? performance.now() : 0;

    const nrows = expr.rows();
    const ncols = expr.cols();
    const s = shape(nrows, ncols);
    const buffer = dtype.alloc(size(s));

    for (let i = 0; i < nrows; i++) {
      for (let j = 0; j < ncols; j++) {
        buffer[i * ncols + j] = dtype.coerce(convert(expr.valueAt(i, j), expr.dtype, dtype));
      }
    }

    if (verbose) {
      const kind = isExpr(expr) ? expr.kind : 'leaf';
      const elapsed = (performance.now() - start).toFixed(3);
      logger(`materialized ${kind} ${shapeToString(s)} as ${dtype.name} in ${elapsed} ms`);
    }

    return new Matrix(s, dtype, buffer);
  }

  // ==================== Access ====================

  rows(): number {
    return this.shape.dims[0];
  }

  cols(): number {
    return this.shape.dims[1];
  }

  /**
   * Read the element at `(row, col)`.
   * Throws `IndexError` outside the matrix.
   */
  at(row: number, col: number): T {
    checkIndex(this.shape, row, col);
    return this._data[row * this.cols() + col]!;
  }

  /**
   * Overwrite the element at `(row, col)`.
   *
   * Expressions built over this matrix read the new value when they are
   * evaluated afterwards.
   */
  set(row: number, col: number, value: T): void {
    checkIndex(this.shape, row, col);
    this._data[row * this.cols() + col] = toScalar(value, this.dtype);
  }

  valueAt(row: number, col: number): T {
    return this.at(row, col);
  }

  /** Largest element. Requires an ordered dtype and at least one element. */
  max(): T {
    return this.reduceOrdered('max', (order) => order > 0);
  }

  /** Smallest element. Requires an ordered dtype and at least one element. */
  min(): T {
    return this.reduceOrdered('min', (order) => order < 0);
  }

  private reduceOrdered(operation: string, prefer: (order: number) => boolean): T {
    const compare = this.dtype.compare;
    if (!compare) {
      throw new DTypeError(`Cannot compute ${operation}: ${this.dtype.name} elements are unordered`);
    }
    if (this._data.length === 0) {
      throw new EmptyMatrixError(operation);
    }

    let best = this._data[0]!;
    for (let i = 1; i < this._data.length; i++) {
      const value = this._data[i]!;
      if (prefer(compare(value, best))) {
        best = value;
      }
    }
    return best;
  }

  /** Copy the elements into nested rows */
  toArray(): T[][] {
    const result: T[][] = [];
    for (let i = 0; i < this.rows(); i++) {
      const row: T[] = [];
      for (let j = 0; j < this.cols(); j++) {
        row.push(this._data[i * this.cols() + j]!);
      }
      result.push(row);
    }
    return result;
  }

  /** Copy the elements in row-major order */
  toFlat(): T[] {
    return Array.from({ length: this._data.length }, (_, i) => this._data[i]!);
  }

  /**
   * Check if another matrix or expression has the same shape and elements.
   * Expressions are evaluated cell by cell without being materialized.
   */
  equals(other: MatrixLike<T>): boolean {
    if (other.rows() !== this.rows() || other.cols() !== this.cols()) {
      return false;
    }
    for (let i = 0; i < this.rows(); i++) {
      for (let j = 0; j < this.cols(); j++) {
        if (!this.dtype.equals(this.at(i, j), other.valueAt(i, j))) {
          return false;
        }
      }
    }
    return true;
  }

  // ==================== Arithmetic ====================

  /** Elementwise sum, evaluated lazily */
  add(other: MatrixLike<T>): Expr<T> {
    return add(this, other);
  }

  /** Elementwise difference, evaluated lazily */
  sub(other: MatrixLike<T>): Expr<T> {
    return sub(this, other);
  }

  /**
   * Matrix product, or scaling when `other` is a scalar.
   * Evaluated lazily.
   */
  mul(other: MatrixLike<T> | T): Expr<T> {
    return mul(this, other);
  }

  toString(): string {
    return formatMatrix(this);
  }
}
