import { describe, it, expect } from 'vitest';
import { add, sub, mul, isMatrixLike, toOperand } from '../../src/ops/index.js';
import { fromRows, matrix, zeros } from '../../src/matrix/index.js';
import { Expr } from '../../src/expr/index.js';
import type { MatrixLike } from '../../src/expr/index.js';
import { float64, int32, int64, complex128, complex } from '../../src/dtype/index.js';
import { DTypeError, ShapeError } from '../../src/error.js';

const A = fromRows([
  [1, 2],
  [3, 4],
]);
const B = fromRows([
  [5, 6],
  [7, 8],
]);

describe('add', () => {
  it('builds a sum node without computing', () => {
    const expr = add(A, B);
    expect(expr).toBeInstanceOf(Expr);
    expect(expr.kind).toBe('sum');
    expect(expr.shape.dims).toEqual([2, 2]);
  });

  it('adds elementwise', () => {
    expect(add(A, B).evaluate().toArray()).toEqual([
      [6, 8],
      [10, 12],
    ]);
  });

  it('throws for incompatible shapes', () => {
    const C = fromRows([[1, 2, 3]]);
    expect(() => add(A, C)).toThrow(ShapeError);
    expect(() => add(A, C)).toThrow(
      'Cannot add expressions with incompatible shapes: expected (2, 2), got (1, 3)'
    );
  });

  it('throws for mixed dtypes', () => {
    const I = fromRows([[1, 2], [3, 4]], int32);
    expect(() => add(A, I)).toThrow(DTypeError);
  });

  it('is associative on integers', () => {
    const C = fromRows([
      [-3, 0],
      [11, 2],
    ]);
    const left = add(add(A, B), C).evaluate();
    const right = add(A, add(B, C)).evaluate();
    expect(left.equals(right)).toBe(true);
    expect(left.toArray()).toEqual([
      [3, 8],
      [21, 14],
    ]);
  });
});

describe('sub', () => {
  it('subtracts elementwise', () => {
    const expr = sub(A, B);
    expect(expr.kind).toBe('difference');
    expect(expr.evaluate().toArray()).toEqual([
      [-4, -4],
      [-4, -4],
    ]);
  });

  it('is anti-commutative', () => {
    const ab = sub(A, B).evaluate();
    const negBa = mul(-1, sub(B, A)).evaluate();
    expect(ab.equals(negBa)).toBe(true);
  });

  it('throws for incompatible shapes', () => {
    expect(() => sub(A, fromRows([[1], [2]]))).toThrow(
      'Cannot subtract expressions with incompatible shapes: expected (2, 2), got (2, 1)'
    );
  });
});

describe('mul', () => {
  describe('matrix × matrix', () => {
    it('computes the matrix product', () => {
      const expr = mul(A, B);
      expect(expr.kind).toBe('product');
      expect(expr.data.kind === 'product' && expr.data.variant).toBe('matrix-matrix');
      expect(expr.evaluate().toArray()).toEqual([
        [19, 22],
        [43, 50],
      ]);
    });

    it('takes its shape from the outer dimensions', () => {
      const L = matrix(2, 3, [1, 2, 3, 4, 5, 6]);
      const R = matrix(3, 1, [1, 0, -1]);
      const P = mul(L, R);
      expect(P.shape.dims).toEqual([2, 1]);
      // [1 - 3, 4 - 6]
      expect(P.evaluate().toArray()).toEqual([[-2], [-2]]);
    });

    it('throws when the shared dimension differs', () => {
      const L = zeros(2, 3);
      const R = zeros(2, 3);
      expect(() => mul(L, R)).toThrow(ShapeError);
      expect(() => mul(L, R)).toThrow(
        'Incompatible dimensions for matrix multiplication: expected inner dimension 3, got 2'
      );
    });

    it('treats a 1x1 matrix as a matrix', () => {
      const one = fromRows([[2]]);
      expect(() => mul(one, A)).toThrow(ShapeError);
      expect(mul(fromRows([[2], [3]]), one).evaluate().toArray()).toEqual([[4], [6]]);
    });

    it('produces an empty matrix for an empty shared dimension', () => {
      const L = zeros(2, 0);
      const R = zeros(0, 3);
      expect(mul(L, R).evaluate().toArray()).toEqual([
        [0, 0, 0],
        [0, 0, 0],
      ]);
    });
  });

  describe('scalar × matrix', () => {
    it('scales from the left', () => {
      const expr = mul(10, A);
      expect(expr.data.kind === 'product' && expr.data.variant).toBe('scalar-matrix');
      expect(expr.evaluate().toArray()).toEqual([
        [10, 20],
        [30, 40],
      ]);
    });

    it('scales from the right', () => {
      const expr = mul(A, 10);
      expect(expr.data.kind === 'product' && expr.data.variant).toBe('matrix-scalar');
      expect(expr.evaluate().toArray()).toEqual([
        [10, 20],
        [30, 40],
      ]);
    });

    it('gives the same result on either side', () => {
      const M = fromRows([
        [1.5, -2],
        [0.25, 8],
      ]);
      expect(mul(3, M).evaluate().equals(mul(M, 3))).toBe(true);
    });

    it('rejects a scalar of another dtype', () => {
      const I = fromRows([[1, 2]], int32);
      expect(() => mul(I, 0.5)).toThrow(DTypeError);
      const L = fromRows([[1n, 2n]], int64);
      expect(() => mul(L, 2n)).not.toThrow();
    });

    it('scales complex matrices by complex scalars', () => {
      const Z = fromRows([[complex(1, 1), complex(0, 2)]], complex128);
      // i * (1 + i) = -1 + i, i * 2i = -2
      expect(mul(complex(0, 1), Z).evaluate().toArray()).toEqual([
        [
          { re: -1, im: 1 },
          { re: -2, im: 0 },
        ],
      ]);
    });
  });

  it('accumulates int32 dot products with 32-bit wrap-around', () => {
    const L = fromRows([[65536, 1]], int32);
    const R = fromRows([[65536], [5]], int32);
    // 65536 * 65536 wraps to 0
    expect(mul(L, R).evaluate().at(0, 0)).toBe(5);
  });

  it('keeps bigint products exact', () => {
    const L = fromRows([[3000000000n, 1n]], int64);
    const R = fromRows([[3000000000n], [1n]], int64);
    expect(mul(L, R).evaluate().at(0, 0)).toBe(9000000000000000001n);
  });
});

describe('composition', () => {
  it('nests expressions without materializing', () => {
    const expr = add(mul(A, B), mul(2, sub(B, A)));
    expect(expr.kind).toBe('sum');
    // A*B = [[19, 22], [43, 50]], 2 * (B - A) = [[8, 8], [8, 8]]
    expect(expr.evaluate().toArray()).toEqual([
      [27, 30],
      [51, 58],
    ]);
  });

  it('chains through the fluent API', () => {
    expect(A.add(B).mul(A).evaluate().toArray()).toEqual([
      // [[6, 8], [10, 12]] * [[1, 2], [3, 4]]
      [30, 44],
      [46, 68],
    ]);
  });

  it('reuses a subtree', () => {
    const s = add(A, B);
    expect(s.mul(s).evaluate().toArray()).toEqual([
      // [[6, 8], [10, 12]]^2
      [116, 144],
      [180, 224],
    ]);
  });
});

describe('operand tagging', () => {
  it('tags matrices and expressions as expressions', () => {
    expect(toOperand(A).kind).toBe('expr');
    expect(toOperand(add(A, B)).kind).toBe('expr');
    expect(toOperand<number>(3).kind).toBe('scalar');
  });

  it('recognizes structural matrix-likes', () => {
    const diagonal: MatrixLike<number> = {
      dtype: float64,
      rows: () => 2,
      cols: () => 2,
      valueAt: (row, col) => (row === col ? 1 : 0),
    };
    expect(isMatrixLike(diagonal)).toBe(true);
    expect(isMatrixLike<number>(1)).toBe(false);
    expect(mul(A, diagonal).evaluate().equals(A)).toBe(true);
  });
});
