import { MatrixLike } from './expr/expression.js';

/**
 * Anything that accepts text, such as `process.stdout`.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

function formatRow<T>(expr: MatrixLike<T>, row: number): string {
  let line = '';
  for (let j = 0; j < expr.cols(); j++) {
    line += `${expr.dtype.format(expr.valueAt(row, j))} `;
  }
  return `${line}\n`;
}

/**
 * Render a matrix or expression as text.
 *
 * One line per row; each element is followed by a single space. A matrix
 * without rows renders as the empty string.
 *
 * @example
 * ```ts
 * formatMatrix(fromRows([[1, 2], [3, 4]]))  // '1 2 \n3 4 \n'
 * ```
 */
export function formatMatrix<T>(expr: MatrixLike<T>): string {
  let text = '';
  for (let i = 0; i < expr.rows(); i++) {
    text += formatRow(expr, i);
  }
  return text;
}

/**
 * Write a matrix or expression to a sink, one `write` per row.
 */
export function writeMatrix<T>(expr: MatrixLike<T>, sink: TextSink): void {
  for (let i = 0; i < expr.rows(); i++) {
    sink.write(formatRow(expr, i));
  }
}
