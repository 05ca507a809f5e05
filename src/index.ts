/**
 * matexpr - lazy matrix expressions in TypeScript
 *
 * @example
 * ```ts
 * import { fromRows, mul } from 'matexpr';
 *
 * const A = fromRows([[1, 2], [3, 4]]);
 * const B = fromRows([[5, 6], [7, 8]]);
 *
 * // Build an expression tree; nothing is computed yet
 * const expr = A.mul(B).add(mul(10, A));
 *
 * // Materialize it once
 * const C = expr.evaluate();
 * console.log(C.toString());
 * // 29 42
 * // 73 90
 * ```
 *
 * @packageDocumentation
 */

// === Element Types ===
export type { DType, ElementBuffer, Complex } from './dtype/index.js';
export { float64, int32, int64, complex128, complex, convert } from './dtype/index.js';

// === Shape Utilities ===
export type { Shape } from './expr/index.js';
export { shape, rows, cols, size, isEmpty, shapeEquals, shapeToString } from './expr/index.js';

// === Expressions ===
export type { MatrixLike, ExprData, ExprKind, ProductVariant } from './expr/index.js';
export { Expr, isExpr, evaluate } from './expr/index.js';

// === Matrices ===
export { Matrix, matrix, fromRows, empty, zeros, ones, eye } from './matrix/index.js';

// === Arithmetic ===
export { add, sub, mul, isMatrixLike } from './ops/index.js';

// === Formatting ===
export type { TextSink } from './format.js';
export { formatMatrix, writeMatrix } from './format.js';

// === Settings ===
export type { EvaluateSettings } from './settings.js';

// === Errors ===
export { MatrixError, ShapeError, IndexError, DTypeError, EmptyMatrixError } from './error.js';
