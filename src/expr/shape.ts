import { IndexError, ShapeError } from '../error.js';

/**
 * Shape of a matrix expression.
 *
 * Shapes are immutable. Both dimensions may be zero: the default matrix is
 * 0x0, and a literal with one empty row is 1x0.
 */
export interface Shape {
  readonly dims: readonly [rows: number, cols: number];
}

function checkDim(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ShapeError(`Invalid ${label} count`, 'a non-negative integer', String(value));
  }
}

/** Create a shape */
export function shape(rows: number, cols: number): Shape {
  checkDim(rows, 'row');
  checkDim(cols, 'column');
  return { dims: [rows, cols] };
}

/** Number of rows */
export function rows(s: Shape): number {
  return s.dims[0];
}

/** Number of columns */
export function cols(s: Shape): number {
  return s.dims[1];
}

/** Total number of elements in the shape */
export function size(s: Shape): number {
  return s.dims[0] * s.dims[1];
}

/** Check if the shape holds no elements */
export function isEmpty(s: Shape): boolean {
  return size(s) === 0;
}

/** Check if two shapes are equal */
export function shapeEquals(a: Shape, b: Shape): boolean {
  return a.dims[0] === b.dims[0] && a.dims[1] === b.dims[1];
}

/** Format shape as string for messages */
export function shapeToString(s: Shape): string {
  return `(${s.dims[0]}, ${s.dims[1]})`;
}

/**
 * Check that `(row, col)` addresses an element of the shape.
 * Throws `IndexError` otherwise.
 */
export function checkIndex(s: Shape, row: number, col: number): void {
  if (
    !Number.isInteger(row) ||
    !Number.isInteger(col) ||
    row < 0 ||
    col < 0 ||
    row >= s.dims[0] ||
    col >= s.dims[1]
  ) {
    throw new IndexError(row, col, shapeToString(s));
  }
}
