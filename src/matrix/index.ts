export { Matrix } from './matrix.js';
export { matrix, fromRows, empty, zeros, ones, eye } from './create.js';
