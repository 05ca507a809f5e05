import { DType } from './dtype.js';
import { DTypeError } from '../error.js';

/**
 * A complex number with double precision parts.
 */
export interface Complex {
  readonly re: number;
  readonly im: number;
}

/** Create a complex number */
export function complex(re: number, im = 0): Complex {
  return { re, im };
}

function isComplex(value: unknown): value is Complex {
  return (
    typeof value === 'object' &&
    value !== null &&
    're' in value &&
    'im' in value &&
    typeof value.re === 'number' &&
    typeof value.im === 'number'
  );
}

function formatComplex(value: Complex): string {
  if (value.im < 0 || Object.is(value.im, -0)) {
    return `${value.re}-${-value.im}i`;
  }
  return `${value.re}+${value.im}i`;
}

const ZERO: Complex = { re: 0, im: 0 };

/**
 * Complex numbers. Unordered: `max()` and `min()` are not available.
 */
export const complex128: DType<Complex> = {
  name: 'complex128',
  zero: ZERO,
  one: { re: 1, im: 0 },
  isScalar: isComplex,
  coerce: (value) => ({ re: value.re, im: value.im }),
  add: (a, b) => ({ re: a.re + b.re, im: a.im + b.im }),
  sub: (a, b) => ({ re: a.re - b.re, im: a.im - b.im }),
  mul: (a, b) => ({
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  }),
  equals: (a, b) => a.re === b.re && a.im === b.im,
  format: formatComplex,
  fromNumber: (value) => ({ re: value, im: 0 }),
  toNumber: (value) => {
    if (value.im !== 0) {
      throw new DTypeError(`Cannot convert ${formatComplex(value)} to a real number`);
    }
    return value.re;
  },
  alloc: (length) => new Array<Complex>(length).fill(ZERO),
};
