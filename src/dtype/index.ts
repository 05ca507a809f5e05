export type { DType, ElementBuffer } from './dtype.js';
export { convert, toScalar, checkSameDType } from './dtype.js';
export { float64, int32, int64 } from './real.js';
export type { Complex } from './complex.js';
export { complex, complex128 } from './complex.js';
