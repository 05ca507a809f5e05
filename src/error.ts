/**
 * Base error class for matexpr.
 */
export class MatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MatrixError';
  }
}

/**
 * Error thrown when shapes are incompatible.
 */
export class ShapeError extends MatrixError {
  readonly expected: string;
  readonly got: string;

  constructor(message: string, expected: string, got: string) {
    super(`${message}: expected ${expected}, got ${got}`);
    this.name = 'ShapeError';
    this.expected = expected;
    this.got = got;
  }
}

/**
 * Error thrown when an element is addressed outside the matrix.
 */
export class IndexError extends MatrixError {
  readonly row: number;
  readonly col: number;
  readonly shape: string;

  constructor(row: number, col: number, shape: string) {
    super(`Index (${row}, ${col}) is out of bounds for shape ${shape}`);
    this.name = 'IndexError';
    this.row = row;
    this.col = col;
    this.shape = shape;
  }
}

/**
 * Error thrown when element types are mixed or a value does not fit its dtype.
 */
export class DTypeError extends MatrixError {
  constructor(message: string) {
    super(message);
    this.name = 'DTypeError';
  }
}

/**
 * Error thrown when a reduction needs at least one element.
 */
export class EmptyMatrixError extends MatrixError {
  constructor(operation: string) {
    super(`Cannot compute ${operation} of an empty matrix`);
    this.name = 'EmptyMatrixError';
  }
}
