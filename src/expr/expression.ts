import { DType } from '../dtype/index.js';
import { Shape, shape } from './shape.js';

/**
 * The expression capability.
 *
 * Anything with a dtype, a shape and an element accessor can take part in
 * arithmetic. `Matrix` and `Expr` implement it; so can user types, which then
 * enter expression trees as leaves.
 */
export interface MatrixLike<T> {
  readonly dtype: DType<T>;
  rows(): number;
  cols(): number;
  valueAt(row: number, col: number): T;
}

/**
 * How a product combines its operands. Chosen once, when the product is built.
 */
export type ProductVariant = 'matrix-matrix' | 'scalar-matrix' | 'matrix-scalar';

/**
 * Core expression data type using discriminated union.
 *
 * Nodes are immutable and reference their operands; they never own a buffer.
 * The shape of every node is computed when it is built. Subtrees may be
 * shared, so trees are DAGs.
 *
 * This is the internal data structure. Users should work with the `Expr`
 * class which wraps this type and provides a fluent API.
 */
export type ExprData<T> =
  // === Leaf ===
  | {
      readonly kind: 'leaf';
      readonly shape: Shape;
      readonly dtype: DType<T>;
      readonly source: MatrixLike<T>;
    }

  // === Elementwise ===
  | {
      readonly kind: 'sum';
      readonly shape: Shape;
      readonly dtype: DType<T>;
      readonly left: ExprData<T>;
      readonly right: ExprData<T>;
    }
  | {
      readonly kind: 'difference';
      readonly shape: Shape;
      readonly dtype: DType<T>;
      readonly left: ExprData<T>;
      readonly right: ExprData<T>;
    }

  // === Products ===
  | {
      readonly kind: 'product';
      readonly variant: 'matrix-matrix';
      readonly shape: Shape;
      readonly dtype: DType<T>;
      readonly left: ExprData<T>;
      readonly right: ExprData<T>;
    }
  | {
      readonly kind: 'product';
      readonly variant: 'scalar-matrix' | 'matrix-scalar';
      readonly shape: Shape;
      readonly dtype: DType<T>;
      readonly scalar: T;
      readonly operand: ExprData<T>;
    };

/** Kinds of expression node */
export type ExprKind = ExprData<unknown>['kind'];

/**
 * Wrap any matrix-like value as a leaf node.
 */
export function leaf<T>(source: MatrixLike<T>): ExprData<T> {
  return {
    kind: 'leaf',
    shape: shape(source.rows(), source.cols()),
    dtype: source.dtype,
    source,
  };
}

