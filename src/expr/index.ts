// Shape utilities
export type { Shape } from './shape.js';
export {
  shape,
  rows,
  cols,
  size,
  isEmpty,
  shapeEquals,
  shapeToString,
  checkIndex,
} from './shape.js';

// Core expression types
export type { MatrixLike, ExprData, ExprKind, ProductVariant } from './expression.js';
export { leaf } from './expression.js';

// Element-wise evaluation
export { valueAt, evaluate } from './evaluate.js';

// Expression wrapper class
export { Expr, isExpr } from './expr.js';
