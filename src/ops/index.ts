export type { Operand } from './arithmetic.js';
export { add, sub, mul, isMatrixLike, toExprData, toOperand } from './arithmetic.js';
