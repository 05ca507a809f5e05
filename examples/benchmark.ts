/**
 * Arithmetic Timing Example
 *
 * Builds two 20x20 int32 matrices, prints them, and times the
 * materialization of each arithmetic expression.
 */

import { Expr, Matrix, int32, writeMatrix } from '../src/index.js';

const SIZE = 20;
const SCALAR = 123;

function timed(label: string, build: () => Expr<number>): Matrix<number> {
  console.log(`\n${label}`);
  const start = performance.now();
  const result = build().evaluate();
  const seconds = (performance.now() - start) / 1000;
  console.log(`time taken: ${seconds.toFixed(6)} seconds`);
  return result;
}

function benchmark() {
  console.log('=== matexpr Arithmetic Timing ===');

  // Each element steps from the previous one, continuing across matrices
  let n = SIZE;
  const va = Array.from({ length: SIZE * SIZE }, () => (n -= 3));
  const vb = Array.from({ length: SIZE * SIZE }, () => (n += 11));

  const a = Matrix.fromFlat(SIZE, SIZE, va, int32);
  const b = Matrix.fromFlat(SIZE, SIZE, vb, int32);

  console.log('A');
  writeMatrix(a, process.stdout);
  console.log('B');
  writeMatrix(b, process.stdout);

  timed('adding A and B', () => a.add(b));
  timed('subtracting B from A', () => a.sub(b));
  timed('multiplying A by scalar', () => a.mul(SCALAR));
  const c = timed('multiplying A and B', () => a.mul(b));

  console.log(`\nlargest element of A * B: ${c.max()}`);
  console.log('\n=== Done ===\n');
}

benchmark();
