import { describe, it, expect } from 'vitest';
import {
  float64,
  int32,
  int64,
  complex128,
  complex,
  convert,
  toScalar,
  checkSameDType,
} from '../../src/dtype/index.js';
import { DTypeError } from '../../src/error.js';

describe('DType', () => {
  describe('float64', () => {
    it('accepts any number', () => {
      expect(float64.isScalar(1.5)).toBe(true);
      expect(float64.isScalar(1n)).toBe(false);
      expect(float64.isScalar('1')).toBe(false);
    });

    it('allocates a Float64Array', () => {
      expect(float64.alloc(3)).toBeInstanceOf(Float64Array);
    });

    it('orders numbers', () => {
      expect(float64.compare?.(1, 2)).toBe(-1);
      expect(float64.compare?.(2, 1)).toBe(1);
      expect(float64.compare?.(2, 2)).toBe(0);
    });
  });

  describe('int32', () => {
    it('accepts only integers', () => {
      expect(int32.isScalar(3)).toBe(true);
      expect(int32.isScalar(3.5)).toBe(false);
    });

    it('wraps on overflow', () => {
      expect(int32.add(2147483647, 1)).toBe(-2147483648);
      expect(int32.sub(-2147483648, 1)).toBe(2147483647);
      expect(int32.mul(65536, 65536)).toBe(0);
      expect(int32.coerce(4294967297)).toBe(1);
    });

    it('rejects non-finite numbers when converting', () => {
      expect(() => int32.fromNumber(Number.NaN)).toThrow(DTypeError);
      expect(() => int32.fromNumber(Number.NEGATIVE_INFINITY)).toThrow(
        'Cannot convert -Infinity to int32'
      );
    });

    it('truncates toward zero when converting', () => {
      expect(int32.fromNumber(7.9)).toBe(7);
      expect(int32.fromNumber(-7.9)).toBe(-7);
    });
  });

  describe('int64', () => {
    it('accepts only bigint', () => {
      expect(int64.isScalar(3n)).toBe(true);
      expect(int64.isScalar(3)).toBe(false);
    });

    it('wraps at 64 bits', () => {
      expect(int64.add(9223372036854775807n, 1n)).toBe(-9223372036854775808n);
    });

    it('converts from finite numbers only', () => {
      expect(int64.fromNumber(-2.5)).toBe(-2n);
      expect(() => int64.fromNumber(Number.POSITIVE_INFINITY)).toThrow(DTypeError);
    });

    it('formats without suffix', () => {
      expect(int64.format(-42n)).toBe('-42');
    });
  });

  describe('complex128', () => {
    it('multiplies', () => {
      // (1 + 2i)(3 + 4i) = 3 + 4i + 6i + 8i^2 = -5 + 10i
      expect(complex128.mul(complex(1, 2), complex(3, 4))).toEqual({ re: -5, im: 10 });
    });

    it('adds and subtracts componentwise', () => {
      expect(complex128.add(complex(1, 2), complex(3, 4))).toEqual({ re: 4, im: 6 });
      expect(complex128.sub(complex(1, 2), complex(3, 4))).toEqual({ re: -2, im: -2 });
    });

    it('is unordered', () => {
      expect(complex128.compare).toBeUndefined();
    });

    it('formats with the sign of the imaginary part', () => {
      expect(complex128.format(complex(1, 2))).toBe('1+2i');
      expect(complex128.format(complex(1, -2))).toBe('1-2i');
    });

    it('converts to a real number only without imaginary part', () => {
      expect(complex128.toNumber(complex(3))).toBe(3);
      expect(() => complex128.toNumber(complex(3, 1))).toThrow(DTypeError);
    });

    it('recognizes complex values', () => {
      expect(complex128.isScalar({ re: 1, im: 0 })).toBe(true);
      expect(complex128.isScalar({ re: 1 })).toBe(false);
      expect(complex128.isScalar(1)).toBe(false);
      expect(complex128.isScalar(null)).toBe(false);
    });
  });

  describe('convert', () => {
    it('passes values of the same dtype through', () => {
      expect(convert(2.5, float64, float64)).toBe(2.5);
    });

    it('converts between dtypes', () => {
      expect(convert(2.5, float64, int32)).toBe(2);
      expect(convert(5n, int64, float64)).toBe(5);
      expect(convert(5, int32, complex128)).toEqual({ re: 5, im: 0 });
    });
  });

  describe('toScalar', () => {
    it('normalizes accepted values', () => {
      expect(toScalar(4294967297, int32)).toBe(1);
    });

    it('rejects values of another type', () => {
      expect(() => toScalar(1.5, int32)).toThrow('Value 1.5 is not a valid int32 element');
      expect(() => toScalar(1, int64)).toThrow(DTypeError);
    });
  });

  describe('checkSameDType', () => {
    it('rejects mixed dtypes', () => {
      expect(() => checkSameDType(float64, int32, 'add')).toThrow(
        'Cannot add float64 and int32 operands'
      );
      expect(() => checkSameDType(int32, int32, 'add')).not.toThrow();
    });
  });
});
